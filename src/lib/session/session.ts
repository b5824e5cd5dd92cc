import { randomUUID } from 'node:crypto';

import { processScheduleText } from '@/lib/schedule/process';
import { parseReadableText, toReadableText } from '@/lib/schedule/readable';
import type { UpdateSession } from '@/lib/session/types';

export function createUpdateSession(params: {
  text: string;
  source: string;
  now?: Date;
}): UpdateSession {
  return {
    id: randomUUID(),
    source: params.source,
    createdAt: (params.now ?? new Date()).toISOString(),
    taggedText: processScheduleText(params.text),
    editedText: null,
  };
}

export function applyEdits(
  session: UpdateSession,
  readableText: string,
): UpdateSession {
  return { ...session, editedText: parseReadableText(readableText) };
}

export function getFinalText(session: UpdateSession): string {
  return session.editedText ?? session.taggedText;
}

export function readableSession(session: UpdateSession): string {
  return toReadableText(getFinalText(session));
}
