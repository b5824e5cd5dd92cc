import { EmptyInputError } from '@/lib/errors';
import { escapeRegExp } from '@/lib/schedule/vocabulary';

export const BOILERPLATE_PHRASES = ['Расписание Богослужений', 'Прихода'];

const boilerplateLineRegex = new RegExp(
  `^.*(?:${BOILERPLATE_PHRASES.map(escapeRegExp).join('|')}).*(?:\\n|$)`,
  'gm',
);

// "среда (среду)" -> "среда, среду"
const parenthesizedAltRegex =
  /(?<![\p{L}\p{N}_])([а-яё]+)\s*\(\s*([а-яё]+)\s*\)/giu;

const dashTimeRegex = /(\d{1,2})-(\d{2})(?!\d)/g;

const singleDigitHourRegex = /(?<!\d)(\d):(\d{2})(?!\d)/g;

export function removeBoilerplateLines(text: string): string {
  return text.replace(boilerplateLineRegex, '');
}

export function collapseParenthesizedAlternates(text: string): string {
  return text.replace(parenthesizedAltRegex, '$1, $2');
}

export function normalizeDashTimes(text: string): string {
  return text.replace(dashTimeRegex, '$1:$2 -');
}

export function padSingleDigitHours(text: string): string {
  return text.replace(singleDigitHourRegex, '0$1:$2');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\n\s*\n/g, '\n').replace(/ {2,}/g, ' ');
}

/**
 * Cleans raw extracted schedule text. Rules run in a fixed order since the
 * time rules expect boilerplate and alternates to be gone already.
 *
 * @throws EmptyInputError when the input is blank
 */
export function normalizeScheduleText(raw: string): string {
  const text = raw.replaceAll('\r\n', '\n').replaceAll('\u00A0', ' ').trim();
  if (text.length === 0) throw new EmptyInputError();

  return collapseWhitespace(
    padSingleDigitHours(
      normalizeDashTimes(
        collapseParenthesizedAlternates(removeBoilerplateLines(text)),
      ),
    ),
  );
}
