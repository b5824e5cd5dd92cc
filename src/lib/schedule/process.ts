import { normalizeScheduleText } from '@/lib/schedule/normalize';
import { tagScheduleText } from '@/lib/schedule/tag';

/**
 * Raw extracted text to tagged schedule text (`<h3>` headings, `<br />`
 * prefixed content lines).
 *
 * @throws EmptyInputError when the input is blank
 */
export function processScheduleText(raw: string): string {
  return tagScheduleText(normalizeScheduleText(raw));
}
