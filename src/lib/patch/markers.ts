export const SCHEDULE_MARKER =
  '<!------------------------------ Insert Schedule ------------------------------>';

export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = 0;
  for (;;) {
    const index = haystack.indexOf(needle, from);
    if (index === -1) return count;
    count += 1;
    from = index + needle.length;
  }
}

/**
 * Replaces everything from the first marker through the second (both
 * included) with the fragment, re-emitting the marker on both sides.
 * Returns null unless the marker occurs exactly twice.
 */
export function replaceMarkedSection(params: {
  content: string;
  fragment: string;
  marker?: string;
}): string | null {
  const marker = params.marker ?? SCHEDULE_MARKER;
  if (countOccurrences(params.content, marker) !== 2) return null;

  const start = params.content.indexOf(marker);
  const end = params.content.indexOf(marker, start + marker.length);
  const section = `${marker}\n${params.fragment}\n      ${marker}`;

  return (
    params.content.slice(0, start) +
    section +
    params.content.slice(end + marker.length)
  );
}
