import path from 'node:path';

import { z } from 'zod';

export const DEFAULT_BACKUP_LIMIT = 10;

const envSchema = z.object({
  SCHEDULE_TARGET_PATH: z.string().min(1).optional(),
  SCHEDULE_BACKUP_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_BACKUP_LIMIT),
  SCHEDULE_DRAFTS_DIR: z.string().min(1).optional(),
  SCHEDULE_DEBUG: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

function blankToUndefined(value: string | undefined): string | undefined {
  if (!value || value.trim().length === 0) return undefined;
  return value.trim();
}

function getRawEnv(): Record<string, string | undefined> {
  return {
    SCHEDULE_TARGET_PATH: blankToUndefined(process.env.SCHEDULE_TARGET_PATH),
    SCHEDULE_BACKUP_LIMIT: blankToUndefined(process.env.SCHEDULE_BACKUP_LIMIT),
    SCHEDULE_DRAFTS_DIR: blankToUndefined(process.env.SCHEDULE_DRAFTS_DIR),
    SCHEDULE_DEBUG: blankToUndefined(process.env.SCHEDULE_DEBUG),
  };
}

export function getEnv(): Env {
  const parsed = envSchema.safeParse(getRawEnv());
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Missing/invalid environment variables: ${message}`);
  }
  return parsed.data;
}

export function getDraftsDir(): string {
  return getEnv().SCHEDULE_DRAFTS_DIR ?? path.join(process.cwd(), 'data', 'drafts');
}

export function shouldLog(): boolean {
  return process.env.SCHEDULE_DEBUG === '1';
}
