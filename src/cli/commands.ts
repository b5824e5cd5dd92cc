import { readFile } from 'node:fs/promises';

import { getEnv } from '@/lib/env';
import { DraftNotFoundError } from '@/lib/errors';
import { extractText } from '@/lib/extract/document';
import { listBackups } from '@/lib/patch/backups';
import { publishSession } from '@/lib/pipeline';
import {
  applyEdits,
  createUpdateSession,
  readableSession,
} from '@/lib/session/session';
import { deleteDraft, loadDraft, saveDraft } from '@/lib/session/store-file';
import type { UpdateSession } from '@/lib/session/types';

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export const USAGE = [
  'usage: schedule <command> [args]',
  '',
  '  preview <input>                   print the processed schedule',
  '  draft <input>                     save a draft and print its id',
  '  edit <draft-id> <readable-file>   replace a draft with edited text',
  '  publish <draft-id> [--target f]   patch the page from a draft',
  '  update <input> [--target f]       extract, process and patch in one go',
  '  backups [--target f]              list backups of the page, oldest first',
].join('\n');

function getArg(argv: string[], flag: string): string | null {
  const idx = argv.indexOf(flag);
  if (idx === -1) return null;
  const v = argv[idx + 1];
  if (!v || v.startsWith('--')) return null;
  return String(v);
}

function positionals(argv: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    if (arg.startsWith('--')) {
      i += 1;
      continue;
    }
    out.push(arg);
  }
  return out;
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) throw new Error(`Missing <${name}>.\n${USAGE}`);
  return value;
}

function resolveTarget(argv: string[]): string {
  const target = getArg(argv, '--target') ?? getEnv().SCHEDULE_TARGET_PATH;
  if (!target) {
    throw new Error('No target page: pass --target or set SCHEDULE_TARGET_PATH.');
  }
  return target;
}

async function requireDraft(id: string): Promise<UpdateSession> {
  const draft = await loadDraft(id);
  if (!draft) throw new DraftNotFoundError(id);
  return draft;
}

async function sessionFromInput(input: string): Promise<UpdateSession> {
  const text = await extractText(input);
  return createUpdateSession({ text, source: input });
}

async function publish(
  session: UpdateSession,
  argv: string[],
  io: CliIo,
): Promise<void> {
  const result = await publishSession({
    session,
    targetPath: resolveTarget(argv),
    backupLimit: getEnv().SCHEDULE_BACKUP_LIMIT,
  });
  const verb = result.status === 'updated' ? 'updated' : 'unchanged';
  io.out(
    `${result.targetPath} ${verb}: ${result.entries} entries in ${result.rows} rows (backup ${result.backupPath})`,
  );
}

export async function runCli(
  argv: string[],
  io: CliIo = consoleIo,
): Promise<number> {
  const [command, ...rest] = argv;
  const args = positionals(rest);

  try {
    switch (command) {
      case 'preview': {
        const session = await sessionFromInput(requireArg(args[0], 'input'));
        io.out(readableSession(session));
        return 0;
      }
      case 'draft': {
        const session = await sessionFromInput(requireArg(args[0], 'input'));
        await saveDraft(session);
        io.out(`draft ${session.id}`);
        io.out(readableSession(session));
        return 0;
      }
      case 'edit': {
        const draft = await requireDraft(requireArg(args[0], 'draft-id'));
        const edited = await readFile(
          requireArg(args[1], 'readable-file'),
          'utf8',
        );
        const next = applyEdits(draft, edited);
        await saveDraft(next);
        io.out(readableSession(next));
        return 0;
      }
      case 'publish': {
        const draft = await requireDraft(requireArg(args[0], 'draft-id'));
        await publish(draft, rest, io);
        await deleteDraft(draft.id);
        return 0;
      }
      case 'update': {
        const session = await sessionFromInput(requireArg(args[0], 'input'));
        await publish(session, rest, io);
        return 0;
      }
      case 'backups': {
        const backups = await listBackups(resolveTarget(rest));
        for (const backup of backups) io.out(backup.path);
        return 0;
      }
      default:
        io.err(USAGE);
        return command === undefined || command === 'help' ? 0 : 1;
    }
  } catch (err) {
    if (err instanceof Error) {
      io.err(`error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
