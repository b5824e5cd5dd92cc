import { describe, expect, it } from 'vitest';

import {
  SCHEDULE_MARKER as M,
  countOccurrences,
  replaceMarkedSection,
} from '@/lib/patch/markers';

describe('replaceMarkedSection', () => {
  it('replaces both markers and everything between them', () => {
    const content = `<body>\n      ${M}\n      old\n      ${M}\n</body>\n`;
    expect(replaceMarkedSection({ content, fragment: 'NEW' })).toBe(
      `<body>\n      ${M}\nNEW\n      ${M}\n</body>\n`,
    );
  });

  it('refuses unless the marker occurs exactly twice', () => {
    expect(replaceMarkedSection({ content: `a ${M} b`, fragment: 'x' })).toBeNull();
    expect(
      replaceMarkedSection({ content: `${M}${M}${M}`, fragment: 'x' }),
    ).toBeNull();
    expect(replaceMarkedSection({ content: 'plain', fragment: 'x' })).toBeNull();
  });

  it('accepts a custom marker', () => {
    expect(
      replaceMarkedSection({ content: '[#]a[#]', fragment: 'b', marker: '[#]' }),
    ).toBe('[#]\nb\n      [#]');
  });

  it('counts non-overlapping occurrences', () => {
    expect(countOccurrences('aaaa', 'aa')).toBe(2);
    expect(countOccurrences('abc', '')).toBe(0);
  });
});
