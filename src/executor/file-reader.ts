/**
 * File Reader
 *
 * Reads at most `maxBytes` of a file and decodes it permissively, so binary
 * files never make a read fail. Bytes past the ceiling are dropped and
 * reported through `truncated`.
 */

import * as fs from 'fs';
import { describeError } from '../errors';
import { parseLineInterval, sliceLines, splitLinesKeepEnds } from './line-ranges';

export const DEFAULT_READ_LIMIT_BYTES = 5 * 1024 * 1024;

export const INVALID_READ_RANGE_MESSAGE = "Invalid range format. Use 'start-end'.";

export type ReadOutcome =
  | { success: true; content: string; truncated: boolean }
  | { success: false; message: string };

/**
 * Read up to `maxBytes` from the start of a file
 */
async function readPrefix(absPath: string, maxBytes: number): Promise<{ data: Buffer; truncated: boolean }> {
  const handle = await fs.promises.open(absPath, 'r');
  try {
    const { size } = await handle.stat();
    const length = Math.min(size, maxBytes);
    const data = Buffer.alloc(length);

    let offset = 0;
    while (offset < length) {
      const { bytesRead } = await handle.read(data, offset, length - offset, offset);
      if (bytesRead === 0) {
        break;
      }
      offset += bytesRead;
    }

    return { data: data.subarray(0, offset), truncated: size > maxBytes };
  } finally {
    await handle.close();
  }
}

/**
 * Encoding of U+FFFD; always decodes as itself, whatever precedes it
 */
const REPLACEMENT_BYTES = Buffer.from([0xef, 0xbf, 0xbd]);

/**
 * Decode without ever throwing. Undecodable byte sequences are dropped, and
 * an incomplete sequence at the very end (cut off by the ceiling) is held
 * back. U+FFFD characters present in the file are kept.
 */
export function decodePermissive(data: Buffer): string {
  const pieces: string[] = [];
  let start = 0;

  for (;;) {
    const decoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });
    const at = data.indexOf(REPLACEMENT_BYTES, start);
    if (at === -1) {
      pieces.push(decoder.decode(data.subarray(start), { stream: true }).replace(/\uFFFD/g, ''));
      return pieces.join('\uFFFD');
    }
    pieces.push(decoder.decode(data.subarray(start, at)).replace(/\uFFFD/g, ''));
    start = at + REPLACEMENT_BYTES.length;
  }
}

export async function readFile(
  absPath: string,
  rangeSpec?: string,
  maxBytes: number = DEFAULT_READ_LIMIT_BYTES
): Promise<ReadOutcome> {
  if (!fs.existsSync(absPath)) {
    return { success: false, message: 'File not found.' };
  }

  let text: string;
  let truncated: boolean;
  try {
    const prefix = await readPrefix(absPath, maxBytes);
    text = decodePermissive(prefix.data);
    truncated = prefix.truncated;
  } catch (error) {
    return { success: false, message: `Read error: ${describeError(error)}` };
  }

  if (rangeSpec === undefined || rangeSpec.trim() === '') {
    return { success: true, content: text, truncated };
  }

  const interval = parseLineInterval(rangeSpec);
  if (!interval) {
    return { success: false, message: INVALID_READ_RANGE_MESSAGE };
  }

  return {
    success: true,
    content: sliceLines(splitLinesKeepEnds(text), interval).join(''),
    truncated,
  };
}
