/**
 * Line Editor
 *
 * Applies a line-range-addressed mutation to a file:
 * - "0-999999": replace the file with the literal content
 * - "" / "append": append content after the last line
 * - "start-end" / "n": replace lines start..end (1-based, inclusive)
 *
 * Every line written from `content` ends with exactly one "\n", and the line
 * in front of an insertion point gains a terminator if it lacked one, so no
 * edit can glue two lines together.
 */

import * as fs from 'fs';
import { describeError } from '../errors';
import {
  EditRange,
  hasTerminator,
  parseEditRange,
  splitContentLines,
  splitLinesKeepEnds,
} from './line-ranges';

export interface EditOutcome {
  success: boolean;
  message: string;
}

export const INVALID_EDIT_RANGE_MESSAGE = "Invalid line range. Use 'start-end' or 'append'.";

/**
 * Decode strictly so a non-UTF-8 file is never rewritten lossily
 */
const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Apply an append or line-interval edit to file content
 * (a full overwrite never reaches here: it bypasses line handling)
 */
export function applyLineEdit(
  original: string,
  range: Exclude<EditRange, { kind: 'overwrite' }>,
  content: string
): string {
  const lines = splitLinesKeepEnds(original);
  const newLines = splitContentLines(content).map(line => line + '\n');

  if (range.kind === 'append') {
    const last = lines.length - 1;
    if (last >= 0 && !hasTerminator(lines[last])) {
      lines[last] += '\n';
    }
    lines.push(...newLines);
    return lines.join('');
  }

  const insertAt = Math.min(Math.max(range.start, 1) - 1, lines.length);
  if (insertAt > 0 && !hasTerminator(lines[insertAt - 1])) {
    lines[insertAt - 1] += '\n';
  }
  const deleteCount = Math.max(0, Math.min(range.end, lines.length) - insertAt);
  lines.splice(insertAt, deleteCount, ...newLines);
  return lines.join('');
}

/**
 * Edit a file in place
 * I/O errors other than on the overwrite path propagate to the caller
 */
export async function updateFile(
  absPath: string,
  rangeSpec: string,
  content: string
): Promise<EditOutcome> {
  if (!fs.existsSync(absPath)) {
    return { success: false, message: 'File not found.' };
  }

  const range = parseEditRange(rangeSpec);
  if (!range) {
    return { success: false, message: INVALID_EDIT_RANGE_MESSAGE };
  }

  if (range.kind === 'overwrite') {
    try {
      await fs.promises.writeFile(absPath, content, 'utf-8');
      return { success: true, message: 'File overwritten successfully.' };
    } catch (error) {
      return { success: false, message: `Overwrite failed: ${describeError(error)}` };
    }
  }

  const original = strictDecoder.decode(await fs.promises.readFile(absPath));
  await fs.promises.writeFile(absPath, applyLineEdit(original, range, content), 'utf-8');

  if (range.kind === 'append') {
    return { success: true, message: 'Content successfully appended to end of file.' };
  }
  return { success: true, message: `Lines ${range.start}-${range.end} updated.` };
}
