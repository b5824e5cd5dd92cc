import {
  copyFile,
  mkdir,
  readdir,
  stat,
  unlink,
  utimes,
} from 'node:fs/promises';
import path from 'node:path';

import { DateTime } from 'luxon';

import { DEFAULT_BACKUP_LIMIT, shouldLog } from '@/lib/env';
import { isNodeError } from '@/lib/errors';

export type BackupFile = {
  path: string;
  name: string;
  mtimeMs: number;
};

export function getBackupDir(targetPath: string): string {
  return path.join(path.dirname(targetPath), 'backups');
}

export function backupPrefix(targetPath: string): string {
  return `${path.basename(targetPath)}.backup_`;
}

export function backupName(targetPath: string, now: Date): string {
  const stamp = DateTime.fromJSDate(now).toFormat('yyyyMMdd_HHmmss');
  return `${backupPrefix(targetPath)}${stamp}`;
}

/**
 * Backups of `targetPath`, oldest first. Names carry a sortable timestamp,
 * which breaks ties between equal modification times.
 */
export async function listBackups(targetPath: string): Promise<BackupFile[]> {
  const dir = getBackupDir(targetPath);
  const prefix = backupPrefix(targetPath);

  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    if (isNodeError(err, 'ENOENT')) return [];
    throw err;
  }

  const backups: BackupFile[] = [];
  for (const name of names) {
    if (!name.startsWith(prefix)) continue;
    const fullPath = path.join(dir, name);
    const s = await stat(fullPath);
    if (!s.isFile()) continue;
    backups.push({ path: fullPath, name, mtimeMs: s.mtimeMs });
  }

  return backups.sort(
    (a, b) => a.mtimeMs - b.mtimeMs || a.name.localeCompare(b.name),
  );
}

/**
 * Deletes the oldest backups so that, once one more is added, at most
 * `limit` remain.
 */
export async function pruneBackups(
  targetPath: string,
  limit: number = DEFAULT_BACKUP_LIMIT,
): Promise<string[]> {
  const backups = await listBackups(targetPath);
  const keep = Math.max(0, limit - 1);
  const stale = backups.slice(0, Math.max(0, backups.length - keep));

  for (const backup of stale) {
    await unlink(backup.path);
  }

  if (shouldLog() && stale.length > 0) {
    console.log(`[backups] pruned ${stale.length} old backups of ${targetPath}`);
  }

  return stale.map((backup) => backup.path);
}

export async function createBackup(params: {
  targetPath: string;
  limit?: number;
  now?: Date;
}): Promise<string> {
  const dir = getBackupDir(params.targetPath);
  await mkdir(dir, { recursive: true });
  await pruneBackups(params.targetPath, params.limit);

  const now = params.now ?? new Date();
  const backupPath = path.join(dir, backupName(params.targetPath, now));
  await copyFile(params.targetPath, backupPath);
  // retention orders by mtime, so stamp it with the time in the name
  await utimes(backupPath, now, now);

  if (shouldLog()) {
    console.log(`[backups] saved ${backupPath}`);
  }
  return backupPath;
}

export async function restoreBackup(params: {
  backupPath: string;
  targetPath: string;
}): Promise<void> {
  await copyFile(params.backupPath, params.targetPath);
}
