import { describe, expect, it } from 'vitest';

import {
  ROW_SEPARATOR,
  SCHEDULE_ROW_SIZE,
  buildSchedule,
  buildScheduleHtml,
  groupIntoRows,
  renderCard,
  splitScheduleEntries,
} from '@/lib/html/build';

function taggedDays(count: number): string {
  let out = '';
  for (let i = 1; i <= count; i += 1) {
    out += `<h3>${i} Мая, Среда</h3>\n<br />08:00 Литургия\n`;
  }
  return out;
}

function countOf(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('splitScheduleEntries', () => {
  it('pairs headings with the content after them', () => {
    expect(
      splitScheduleEntries(
        '<h3>A</h3>\n<br />08:00 X\n<br /><br />10:00 Y\n<h3>B</h3>\n<br />09:00 Z\n',
      ),
    ).toEqual([
      { heading: 'A', content: '<br />08:00 X\n<br /><br />10:00 Y' },
      { heading: 'B', content: '<br />09:00 Z' },
    ]);
  });

  // Material before the first heading and headings with nothing under them
  // are dropped without an error.
  it('drops leading content and a trailing heading with no content', () => {
    expect(
      splitScheduleEntries(
        '<br /><br />Intro\n<h3>A</h3>\n<br />08:00 X\n<h3>Last Heading</h3>',
      ),
    ).toEqual([{ heading: 'A', content: '<br />08:00 X' }]);
  });

  it('drops a heading immediately followed by another heading', () => {
    expect(
      splitScheduleEntries('<h3>A</h3>\n<h3>B</h3>\n<br />x\n'),
    ).toEqual([{ heading: 'B', content: '<br />x' }]);
  });
});

describe('groupIntoRows', () => {
  it('fills rows left to right and flushes the partial last row', () => {
    const entries = Array.from({ length: 6 }, (_, i) => ({
      heading: `h${i}`,
      content: `c${i}`,
    }));
    const rows = groupIntoRows(entries);
    expect(rows.map((row) => row.entries.length)).toEqual([4, 2]);
    expect(rows[1]?.entries[0]?.heading).toBe('h4');
  });
});

describe('buildScheduleHtml', () => {
  it('renders the card template', () => {
    expect(renderCard({ heading: 'A', content: '<br />x' })).toBe(
      [
        '',
        '        <div class="col-lg-3 col-sm-6 probootstrap-animate">',
        '          <div class="form-group">',
        '            <h3>A</h3>',
        '            <br />x',
        '          </div>',
        '        </div>',
      ].join('\n'),
    );
  });

  it('wraps cards in a separated row', () => {
    const card = renderCard({ heading: 'A', content: '<br />x' });
    expect(buildScheduleHtml('<h3>A</h3>\n<br />x\n')).toBe(
      `\n      ${ROW_SEPARATOR}\n      <div class="row">${card}\n      </div>\n`,
    );
  });

  it('emits one card per entry in ceil(n / 4) rows', () => {
    const built = buildSchedule(taggedDays(9));
    expect(SCHEDULE_ROW_SIZE).toBe(4);
    expect(built.entries).toBe(9);
    expect(built.rows).toBe(3);
    expect(countOf(built.html, '<h3>')).toBe(9);
    expect(countOf(built.html, '<div class="row">')).toBe(3);
    expect(countOf(built.html, ROW_SEPARATOR)).toBe(3);
  });

  it('is deterministic for the same tagged text', () => {
    const tagged = taggedDays(5);
    expect(buildScheduleHtml(tagged)).toBe(buildScheduleHtml(tagged));
  });

  it('returns an empty fragment when there is nothing to render', () => {
    expect(buildScheduleHtml('')).toBe('');
    expect(buildScheduleHtml('<br /><br />Примечание\n')).toBe('');
  });
});
