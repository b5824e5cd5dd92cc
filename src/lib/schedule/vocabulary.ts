export type VocabularyTerm = {
  canonical: string;
  // every spelling accepted in a heading, including `canonical`
  forms: readonly string[];
};

export type ScheduleVocabulary = {
  months: readonly VocabularyTerm[];
  weekdays: readonly VocabularyTerm[];
};

export const RUSSIAN_VOCABULARY: ScheduleVocabulary = {
  months: [
    { canonical: 'Январь', forms: ['Январь', 'Января'] },
    { canonical: 'Февраль', forms: ['Февраль', 'Февраля'] },
    { canonical: 'Март', forms: ['Март', 'Марта'] },
    { canonical: 'Апрель', forms: ['Апрель', 'Апреля'] },
    { canonical: 'Май', forms: ['Май', 'Мая'] },
    { canonical: 'Июнь', forms: ['Июнь', 'Июня'] },
    { canonical: 'Июль', forms: ['Июль', 'Июля'] },
    { canonical: 'Август', forms: ['Август', 'Августа'] },
    { canonical: 'Сентябрь', forms: ['Сентябрь', 'Сентября'] },
    { canonical: 'Октябрь', forms: ['Октябрь', 'Октября'] },
    { canonical: 'Ноябрь', forms: ['Ноябрь', 'Ноября'] },
    { canonical: 'Декабрь', forms: ['Декабрь', 'Декабря'] },
  ],
  weekdays: [
    { canonical: 'Понедельник', forms: ['Понедельник'] },
    { canonical: 'Вторник', forms: ['Вторник'] },
    { canonical: 'Среда', forms: ['Среда', 'Среду'] },
    { canonical: 'Четверг', forms: ['Четверг'] },
    { canonical: 'Пятница', forms: ['Пятница', 'Пятницу'] },
    { canonical: 'Суббота', forms: ['Суббота', 'Субботу'] },
    { canonical: 'Воскресенье', forms: ['Воскресенье'] },
  ],
};

export type HeadingParts = {
  month: string;
  weekday: string;
};

export type HeadingMatcher = {
  test(line: string): boolean;
  match(line: string): HeadingParts | null;
};

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function alternation(terms: readonly VocabularyTerm[]): string {
  const forms = terms.flatMap((term) => term.forms);
  // longest first so "Марта" wins over "Март"
  return [...forms]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

function canonicalFor(
  terms: readonly VocabularyTerm[],
  form: string,
): string | null {
  const needle = form.toLowerCase();
  const term = terms.find((t) =>
    t.forms.some((f) => f.toLowerCase() === needle),
  );
  return term?.canonical ?? null;
}

export function createHeadingMatcher(
  vocabulary: ScheduleVocabulary = RUSSIAN_VOCABULARY,
): HeadingMatcher {
  const pattern = new RegExp(
    `(?<![\\p{L}\\p{N}_])(${alternation(vocabulary.months)})\\s*,\\s*(${alternation(vocabulary.weekdays)})`,
    'iu',
  );

  return {
    test(line) {
      return pattern.test(line);
    },
    match(line) {
      const found = line.match(pattern);
      if (!found) return null;
      const month = canonicalFor(vocabulary.months, found[1] ?? '');
      const weekday = canonicalFor(vocabulary.weekdays, found[2] ?? '');
      if (!month || !weekday) return null;
      return { month, weekday };
    },
  };
}

const defaultMatcher = createHeadingMatcher();

export function isHeadingLine(line: string): boolean {
  return defaultMatcher.test(line);
}

export function findHeadingParts(line: string): HeadingParts | null {
  return defaultMatcher.match(line);
}
