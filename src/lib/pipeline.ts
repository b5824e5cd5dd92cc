import { buildSchedule, type BuiltSchedule } from '@/lib/html/build';
import { patchScheduleSection, type PatchResult } from '@/lib/patch/patch';
import { getFinalText } from '@/lib/session/session';
import type { UpdateSession } from '@/lib/session/types';

export type PublishResult = PatchResult & {
  entries: number;
  rows: number;
};

export function renderSchedule(session: UpdateSession): BuiltSchedule {
  return buildSchedule(getFinalText(session));
}

/**
 * Renders the session's final text and splices it into the target page.
 *
 * @throws EmptyFragmentError when no heading has any content to render
 */
export async function publishSession(params: {
  session: UpdateSession;
  targetPath: string;
  backupLimit?: number;
  now?: Date;
}): Promise<PublishResult> {
  const built = renderSchedule(params.session);
  const result = await patchScheduleSection({
    targetPath: params.targetPath,
    fragment: built.html,
    backupLimit: params.backupLimit,
    now: params.now,
  });
  return { ...result, entries: built.entries, rows: built.rows };
}
