import { shouldLog } from '@/lib/env';
import { findHeadingParts, isHeadingLine } from '@/lib/schedule/vocabulary';
import type { ClassifiedLine } from '@/lib/schedule/types';

export const SINGLE_BREAK = '<br />';
export const DOUBLE_BREAK = '<br /><br />';

export function splitLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function classifyLines(
  text: string,
  isHeading: (line: string) => boolean = isHeadingLine,
): ClassifiedLine[] {
  return splitLines(text).map((line): ClassifiedLine => ({
    role: isHeading(line) ? 'heading' : 'content',
    text: line,
  }));
}

/**
 * The first content line under a heading gets a single break. Every other
 * content line is double-spaced, whether it starts with a time (a new
 * service slot) or not (a standalone note).
 */
export function breakBefore(afterHeading: boolean): string {
  return afterHeading ? SINGLE_BREAK : DOUBLE_BREAK;
}

export function tagClassifiedLines(lines: ClassifiedLine[]): string {
  let out = '';
  let afterHeading = false;

  for (const line of lines) {
    if (line.role === 'heading') {
      out += `<h3>${line.text}</h3>\n`;
      afterHeading = true;
      continue;
    }
    out += `${breakBefore(afterHeading)}${line.text}\n`;
    afterHeading = false;
  }

  return out.replace(/<br \/>\s*/g, SINGLE_BREAK).replace(/<h3>\s*/g, '<h3>');
}

export function tagScheduleText(normalized: string): string {
  const lines = classifyLines(normalized);
  if (shouldLog()) {
    for (const line of lines) {
      const parts = line.role === 'heading' ? findHeadingParts(line.text) : null;
      if (parts) {
        console.log(
          `[schedule] heading ${line.text} (${parts.month}, ${parts.weekday})`,
        );
      }
    }
  }
  return tagClassifiedLines(lines);
}
