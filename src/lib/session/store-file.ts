import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { getDraftsDir } from '@/lib/env';
import { isNodeError } from '@/lib/errors';
import { updateSessionSchema, type UpdateSession } from '@/lib/session/types';

function getDraftPath(dir: string, id: string): string {
  return path.join(dir, `${id}.json`);
}

function serialize(value: UpdateSession): string {
  return JSON.stringify(value, null, 2) + '\n';
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await readFile(filePath, 'utf8');
  return JSON.parse(text) as unknown;
}

export async function saveDraft(
  draft: UpdateSession,
  dir: string = getDraftsDir(),
): Promise<void> {
  const parsed = updateSessionSchema.safeParse(draft);
  if (!parsed.success) throw new Error('Refusing to persist invalid draft.');

  const filePath = getDraftPath(dir, draft.id);
  const tmpPath = path.join(
    dir,
    `${draft.id}.tmp.${process.pid}.${Date.now()}.json`,
  );

  await mkdir(dir, { recursive: true });
  await writeFile(tmpPath, serialize(parsed.data), 'utf8');
  await rename(tmpPath, filePath);
}

export async function loadDraft(
  id: string,
  dir: string = getDraftsDir(),
): Promise<UpdateSession | null> {
  if (!updateSessionSchema.shape.id.safeParse(id).success) return null;

  try {
    const json: unknown = await readJsonFile(getDraftPath(dir, id));
    const parsed = updateSessionSchema.safeParse(json);
    if (!parsed.success) return null;
    return parsed.data;
  } catch (err) {
    if (isNodeError(err, 'ENOENT')) return null;
    if (err instanceof SyntaxError) return null;
    throw err;
  }
}

export async function deleteDraft(
  id: string,
  dir: string = getDraftsDir(),
): Promise<void> {
  try {
    await unlink(getDraftPath(dir, id));
  } catch (err) {
    if (isNodeError(err, 'ENOENT')) return;
    throw err;
  }
}
