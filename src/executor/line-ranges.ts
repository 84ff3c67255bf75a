/**
 * Line addressing shared by the line editor and the file reader
 *
 * Ranges are 1-based and inclusive. Splicing and slicing follow slice
 * semantics clamped to the file: an interval past the end never fails.
 */

/**
 * Literal range that replaces the whole file
 */
export const FULL_OVERWRITE_RANGE = '0-999999';

export type EditRange =
  | { kind: 'overwrite' }
  | { kind: 'append' }
  | { kind: 'lines'; start: number; end: number };

export interface LineInterval {
  start: number;
  end: number;
}

const INTEGER_PATTERN = /^\s*\+?\d+\s*$/;

function parseLineNumber(token: string): number | null {
  if (!INTEGER_PATTERN.test(token)) {
    return null;
  }
  return parseInt(token, 10);
}

/**
 * Parse "start-end" or a single line number "n" (meaning n-n)
 * A start of 0 is well-formed; users clamp it to the first line
 */
export function parseLineInterval(spec: string): LineInterval | null {
  let start: number | null;
  let end: number | null;

  if (spec.includes('-')) {
    const parts = spec.split('-');
    if (parts.length !== 2) {
      return null;
    }
    start = parseLineNumber(parts[0]);
    end = parseLineNumber(parts[1]);
  } else {
    start = parseLineNumber(spec);
    end = start;
  }

  if (start === null || end === null) {
    return null;
  }
  return { start, end };
}

/**
 * Parse an edit range: full overwrite, append, or a line interval
 * Empty input means append
 */
export function parseEditRange(spec: string): EditRange | null {
  if (spec === FULL_OVERWRITE_RANGE) {
    return { kind: 'overwrite' };
  }
  if (spec.trim() === '' || spec.trim().toLowerCase() === 'append') {
    return { kind: 'append' };
  }

  const interval = parseLineInterval(spec);
  return interval ? { kind: 'lines', ...interval } : null;
}

/**
 * Split text into lines, each keeping its terminator (\n, \r\n or \r).
 * The last line may lack one.
 */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\r\n]*(?:\r\n|\n|\r)|[^\r\n]+$/g) ?? [];
}

/**
 * Split content into bare lines; a trailing terminator does not add an empty line
 */
export function splitContentLines(content: string): string[] {
  if (content === '') {
    return [];
  }
  const parts = content.split(/\r\n|\n|\r/);
  if (parts[parts.length - 1] === '') {
    parts.pop();
  }
  return parts;
}

export function hasTerminator(line: string): boolean {
  return line.endsWith('\n') || line.endsWith('\r');
}

/**
 * Select lines [start, end] (1-based, inclusive), clamped to the array
 */
export function sliceLines(lines: string[], interval: LineInterval): string[] {
  return lines.slice(Math.max(interval.start, 1) - 1, interval.end);
}
