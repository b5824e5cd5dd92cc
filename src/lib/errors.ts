export type ScheduleErrorCode =
  | 'EMPTY_INPUT'
  | 'NOT_FOUND'
  | 'EMPTY_FRAGMENT'
  | 'MARKER_MISMATCH'
  | 'UNSUPPORTED_DOCUMENT'
  | 'DRAFT_NOT_FOUND'
  | 'INVALID_ENCODING';

export class ScheduleError extends Error {
  readonly code: ScheduleErrorCode;

  constructor(code: ScheduleErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmptyInputError extends ScheduleError {
  constructor(message = 'Nothing to process: input text is empty.') {
    super('EMPTY_INPUT', message);
  }
}

export class NotFoundError extends ScheduleError {
  readonly path: string;

  constructor(filePath: string) {
    super('NOT_FOUND', `File not found: ${filePath}`);
    this.path = filePath;
  }
}

export class EmptyFragmentError extends ScheduleError {
  constructor() {
    super('EMPTY_FRAGMENT', 'Refusing to patch with an empty schedule fragment.');
  }
}

export class MarkerMismatchError extends ScheduleError {
  readonly occurrences: number;

  constructor(filePath: string, occurrences: number) {
    super(
      'MARKER_MISMATCH',
      `Expected the schedule marker exactly twice in ${filePath}, found ${occurrences}.`,
    );
    this.occurrences = occurrences;
  }
}

export class UnsupportedDocumentError extends ScheduleError {
  constructor(filePath: string) {
    super('UNSUPPORTED_DOCUMENT', `Unsupported document type: ${filePath}`);
  }
}

export class InvalidEncodingError extends ScheduleError {
  constructor(filePath: string) {
    super('INVALID_ENCODING', `Refusing to patch ${filePath}: it is not valid UTF-8.`);
  }
}

export class DraftNotFoundError extends ScheduleError {
  constructor(id: string) {
    super('DRAFT_NOT_FOUND', `No saved draft with id ${id}.`);
  }
}

export function isNodeError(err: unknown, code: string): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err as { code?: unknown }).code === code
  );
}
