/**
 * Line Editor Unit Tests
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { INVALID_EDIT_RANGE_MESSAGE, applyLineEdit, updateFile } from '../../../src/executor/line-editor';

describe('Line Editor', () => {
  describe('applyLineEdit', () => {
    it('replaces an inclusive interval', () => {
      assert.equal(applyLineEdit('1\n2\n3\n4\n', { kind: 'lines', start: 2, end: 3 }, 'X\nY'), '1\nX\nY\n4\n');
    });

    it('terminates an unterminated last line before appending', () => {
      assert.equal(applyLineEdit('1\n2', { kind: 'append' }, 'Z'), '1\n2\nZ\n');
    });

    it('appends to an empty file', () => {
      assert.equal(applyLineEdit('', { kind: 'append' }, 'a\nb'), 'a\nb\n');
    });

    it('appends when the start lies past the end', () => {
      assert.equal(applyLineEdit('1\n2', { kind: 'lines', start: 5, end: 6 }, 'Z'), '1\n2\nZ\n');
    });

    it('inserts before start when end < start', () => {
      assert.equal(applyLineEdit('1\n2\n3\n', { kind: 'lines', start: 3, end: 1 }, 'X'), '1\n2\nX\n3\n');
    });

    it('drops the tail when end lies past the end', () => {
      assert.equal(applyLineEdit('1\n2\n3\n', { kind: 'lines', start: 2, end: 10 }, 'X'), '1\nX\n');
    });

    it('deletes lines when content is empty', () => {
      assert.equal(applyLineEdit('1\n2\n3\n', { kind: 'lines', start: 2, end: 2 }, ''), '1\n3\n');
    });

    it('keeps untouched terminators and normalizes new lines to \\n', () => {
      assert.equal(applyLineEdit('a\r\nb\r\nc\r\n', { kind: 'lines', start: 2, end: 2 }, 'B\r\n'), 'a\r\nB\nc\r\n');
    });
  });

  describe('updateFile', () => {
    let tempDir: string;
    let target: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'line-editor-test-'));
      target = path.join(tempDir, 'a.txt');
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('updates a line interval', async () => {
      fs.writeFileSync(target, '1\n2\n3\n4\n');

      const outcome = await updateFile(target, '2-3', 'X\nY');

      assert.deepEqual(outcome, { success: true, message: 'Lines 2-3 updated.' });
      assert.equal(fs.readFileSync(target, 'utf-8'), '1\nX\nY\n4\n');
    });

    it('treats a single number as a one-line interval', async () => {
      fs.writeFileSync(target, '1\n2\n3\n');

      const outcome = await updateFile(target, '2', 'two');

      assert.deepEqual(outcome, { success: true, message: 'Lines 2-2 updated.' });
      assert.equal(fs.readFileSync(target, 'utf-8'), '1\ntwo\n3\n');
    });

    it('clamps a range starting at line 0 to the first line', async () => {
      fs.writeFileSync(target, 'a\nb\nc\n');

      const outcome = await updateFile(target, '0-1', 'X');

      assert.deepEqual(outcome, { success: true, message: 'Lines 0-1 updated.' });
      assert.equal(fs.readFileSync(target, 'utf-8'), 'X\nb\nc\n');
    });

    it('appends', async () => {
      fs.writeFileSync(target, '1\n2');

      const outcome = await updateFile(target, 'append', 'Z');

      assert.deepEqual(outcome, { success: true, message: 'Content successfully appended to end of file.' });
      assert.equal(fs.readFileSync(target, 'utf-8'), '1\n2\nZ\n');
    });

    it('overwrites with the literal content', async () => {
      fs.writeFileSync(target, 'old\n');

      const outcome = await updateFile(target, '0-999999', 'no newline');

      assert.deepEqual(outcome, { success: true, message: 'File overwritten successfully.' });
      assert.equal(fs.readFileSync(target, 'utf-8'), 'no newline');
    });

    it('reports a missing file', async () => {
      assert.deepEqual(await updateFile(path.join(tempDir, 'absent.txt'), '1-2', 'x'), {
        success: false,
        message: 'File not found.',
      });
    });

    it('reports a malformed range and leaves the file alone', async () => {
      fs.writeFileSync(target, '1\n');

      assert.deepEqual(await updateFile(target, 'two-three', 'x'), {
        success: false,
        message: INVALID_EDIT_RANGE_MESSAGE,
      });
      assert.equal(INVALID_EDIT_RANGE_MESSAGE, "Invalid line range. Use 'start-end' or 'append'.");
      assert.equal(fs.readFileSync(target, 'utf-8'), '1\n');
    });

    it('refuses to rewrite a file that is not UTF-8', async () => {
      fs.writeFileSync(target, Buffer.from([0x61, 0xff, 0x0a]));

      await assert.rejects(updateFile(target, 'append', 'x'));
      assert.deepEqual(fs.readFileSync(target), Buffer.from([0x61, 0xff, 0x0a]));
    });
  });
});
