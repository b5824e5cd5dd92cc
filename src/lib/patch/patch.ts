import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { shouldLog } from '@/lib/env';
import {
  EmptyFragmentError,
  InvalidEncodingError,
  MarkerMismatchError,
  NotFoundError,
  isNodeError,
} from '@/lib/errors';
import { createBackup, restoreBackup } from '@/lib/patch/backups';
import {
  SCHEDULE_MARKER,
  countOccurrences,
  replaceMarkedSection,
} from '@/lib/patch/markers';

export type PatchStatus = 'updated' | 'unchanged';

export type PatchResult = {
  status: PatchStatus;
  targetPath: string;
  backupPath: string;
};

const writeChains = new Map<string, Promise<void>>();

async function withWriteLock<T>(
  targetPath: string,
  fn: () => Promise<T>,
): Promise<T> {
  const key = path.resolve(targetPath);
  const previous = writeChains.get(key) ?? Promise.resolve();
  let release: (() => void) | undefined;
  const current = new Promise<void>((resolve) => {
    release = resolve;
  });
  writeChains.set(key, current);

  await previous;
  try {
    return await fn();
  } finally {
    release?.();
    if (writeChains.get(key) === current) writeChains.delete(key);
  }
}

// Bytes outside the marked section are written back as read, so the page
// has to decode cleanly; a BOM is kept as part of the text.
async function readTarget(targetPath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await readFile(targetPath);
  } catch (err) {
    if (isNodeError(err, 'ENOENT')) throw new NotFoundError(targetPath);
    throw err;
  }

  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(
      buffer,
    );
  } catch (err) {
    if (err instanceof TypeError) throw new InvalidEncodingError(targetPath);
    throw err;
  }
}

async function writeFileAtomic(filePath: string, content: string) {
  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.tmp.${process.pid}.${Date.now()}`,
  );
  try {
    await writeFile(tmpPath, content, 'utf8');
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

async function restoreAfterFailure(targetPath: string, backupPath: string) {
  try {
    await restoreBackup({ backupPath, targetPath });
    console.error(`[patch] restored ${targetPath} from ${backupPath}`);
  } catch (restoreErr) {
    console.error(
      `[patch] could not restore ${targetPath} from ${backupPath}:`,
      restoreErr,
    );
  }
}

/**
 * Replaces the marker-delimited schedule section of `targetPath` with
 * `fragment`. A backup is taken first; if anything fails after that, the
 * target is restored from it before the error is rethrown.
 */
export async function patchScheduleSection(params: {
  targetPath: string;
  fragment: string;
  marker?: string;
  backupLimit?: number;
  now?: Date;
}): Promise<PatchResult> {
  const { targetPath, fragment } = params;
  const marker = params.marker ?? SCHEDULE_MARKER;

  return withWriteLock(targetPath, async (): Promise<PatchResult> => {
    const content = await readTarget(targetPath);
    if (fragment.trim().length === 0) throw new EmptyFragmentError();

    const occurrences = countOccurrences(content, marker);
    if (occurrences !== 2) {
      throw new MarkerMismatchError(targetPath, occurrences);
    }

    const backupPath = await createBackup({
      targetPath,
      limit: params.backupLimit,
      now: params.now,
    });

    try {
      const next = replaceMarkedSection({ content, fragment, marker });
      if (next === null) {
        throw new MarkerMismatchError(targetPath, occurrences);
      }

      if (next === content) {
        if (shouldLog()) console.log(`[patch] ${targetPath} already up to date`);
        return { status: 'unchanged', targetPath, backupPath };
      }

      await writeFileAtomic(targetPath, next);
      if (shouldLog()) console.log(`[patch] updated ${targetPath}`);
      return { status: 'updated', targetPath, backupPath };
    } catch (err) {
      await restoreAfterFailure(targetPath, backupPath);
      throw err;
    }
  });
}
