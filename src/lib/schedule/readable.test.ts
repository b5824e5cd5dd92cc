import { describe, expect, it } from 'vitest';

import { EmptyInputError } from '@/lib/errors';
import { processScheduleText } from '@/lib/schedule/process';
import { parseReadableText, toReadableText } from '@/lib/schedule/readable';

const tagged =
  '<h3>6 Апреля, Понедельник</h3>\n' +
  '<br />08:00 Литургия\n' +
  '<br /><br />17:00 Вечерня\n';

describe('readable schedule text', () => {
  it('renders headings with asterisks and blank lines before double breaks', () => {
    expect(toReadableText(tagged)).toBe(
      '*6 Апреля, Понедельник*\n08:00 Литургия\n\n17:00 Вечерня',
    );
  });

  it('parses edited text back into the tagged form', () => {
    expect(parseReadableText(toReadableText(tagged))).toBe(tagged);
    expect(parseReadableText('* Дата *\n10:00 Молебен')).toBe(
      '<h3>Дата</h3>\n<br />10:00 Молебен\n',
    );
  });

  it('keeps starred notes as content through an edit', () => {
    const withNote = processScheduleText(
      '6 Апреля, Понедельник\n08:00 Литургия\n*Исповедь накануне*\n',
    );

    expect(withNote).toBe(
      '<h3>6 Апреля, Понедельник</h3>\n' +
        '<br />08:00 Литургия\n' +
        '<br /><br />*Исповедь накануне*\n',
    );
    expect(toReadableText(withNote)).toBe(
      '*6 Апреля, Понедельник*\n08:00 Литургия\n\n\\*Исповедь накануне*',
    );
    expect(parseReadableText(toReadableText(withNote))).toBe(withNote);
  });

  it('escapes content that starts with a backslash', () => {
    const tagged = '<h3>Мая, Среда</h3>\n<br />\\примечание\n';
    expect(toReadableText(tagged)).toBe('*Мая, Среда*\n\\\\примечание');
    expect(parseReadableText(toReadableText(tagged))).toBe(tagged);
  });

  it('rejects an empty edit', () => {
    expect(() => parseReadableText(' \n ')).toThrow(EmptyInputError);
  });
});
