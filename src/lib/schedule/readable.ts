import { EmptyInputError } from '@/lib/errors';
import {
  DOUBLE_BREAK,
  SINGLE_BREAK,
  splitLines,
  tagClassifiedLines,
} from '@/lib/schedule/tag';
import type { ClassifiedLine } from '@/lib/schedule/types';

const taggedHeadingRegex = /^<h3>(.*)<\/h3>$/;
const readableHeadingRegex = /^\*(.+)\*$/;

// A content line that would read as a heading, or as an escape, gets a
// leading backslash.
function escapeContent(line: string): string {
  return line.startsWith('*') || line.startsWith('\\') ? `\\${line}` : line;
}

function unescapeContent(line: string): string {
  return line.startsWith('\\') ? line.slice(1) : line;
}

/**
 * Renders tagged schedule text for a person to review and edit: headings as
 * `*heading*`, a blank line before each double-spaced content line. Content
 * starting with `*` or `\` is escaped with a backslash.
 */
export function toReadableText(tagged: string): string {
  const out: string[] = [];

  for (const line of splitLines(tagged)) {
    const heading = line.match(taggedHeadingRegex);
    if (heading) {
      out.push(`*${heading[1] ?? ''}*`);
      continue;
    }
    if (line.startsWith(DOUBLE_BREAK)) {
      out.push('', escapeContent(line.slice(DOUBLE_BREAK.length)));
      continue;
    }
    out.push(
      escapeContent(
        line.startsWith(SINGLE_BREAK) ? line.slice(SINGLE_BREAK.length) : line,
      ),
    );
  }

  return out.join('\n');
}

export function parseReadableText(text: string): string {
  const lines = splitLines(text).map((line): ClassifiedLine => {
    const heading = line.match(readableHeadingRegex);
    return heading
      ? { role: 'heading', text: (heading[1] ?? '').trim() }
      : { role: 'content', text: unescapeContent(line) };
  });
  if (lines.length === 0) {
    throw new EmptyInputError('Nothing to process: edited text is empty.');
  }
  return tagClassifiedLines(lines);
}
