import type { ScheduleEntry, ScheduleRow } from '@/lib/schedule/types';

// Matches the page grid: col-lg-3 puts four cards on a row.
export const SCHEDULE_ROW_SIZE = 4;

export const ROW_SEPARATOR =
  '<!------------------------------ row ------------------------------>';

const headingSplitRegex = /<h3>(.*?)<\/h3>/;

/**
 * Pairs each heading with the content that follows it. Content before the
 * first heading and headings without content are dropped.
 */
export function splitScheduleEntries(tagged: string): ScheduleEntry[] {
  // [preamble, heading1, content1, heading2, content2, ...]
  const parts = tagged.split(headingSplitRegex);
  const entries: ScheduleEntry[] = [];

  for (let i = 1; i < parts.length; i += 2) {
    const heading = (parts[i] ?? '').trim();
    const content = (parts[i + 1] ?? '').trim();
    if (heading.length === 0 || content.length === 0) continue;
    entries.push({ heading, content });
  }

  return entries;
}

export function groupIntoRows(
  entries: ScheduleEntry[],
  size: number = SCHEDULE_ROW_SIZE,
): ScheduleRow[] {
  const rows: ScheduleRow[] = [];
  for (let i = 0; i < entries.length; i += size) {
    rows.push({ entries: entries.slice(i, i + size) });
  }
  return rows;
}

export function renderCard(entry: ScheduleEntry): string {
  return [
    '',
    '        <div class="col-lg-3 col-sm-6 probootstrap-animate">',
    '          <div class="form-group">',
    `            <h3>${entry.heading}</h3>`,
    `            ${entry.content}`,
    '          </div>',
    '        </div>',
  ].join('\n');
}

export function renderRow(row: ScheduleRow): string {
  const cards = row.entries.map(renderCard).join('');
  return `\n      ${ROW_SEPARATOR}\n      <div class="row">${cards}\n      </div>\n`;
}

export type BuiltSchedule = {
  html: string;
  entries: number;
  rows: number;
};

export function buildSchedule(tagged: string): BuiltSchedule {
  const entries = splitScheduleEntries(tagged);
  const rows = groupIntoRows(entries);
  return {
    html: rows.map(renderRow).join('\n'),
    entries: entries.length,
    rows: rows.length,
  };
}

/**
 * Tagged schedule text to the row-grouped fragment spliced into the page.
 * Returns an empty string when there is nothing to render.
 */
export function buildScheduleHtml(tagged: string): string {
  return buildSchedule(tagged).html;
}
