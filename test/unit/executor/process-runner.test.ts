/**
 * Process Runner Unit Tests
 * Spawns the running Node binary as a stand-in subprocess.
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { SpawnProcessRunner } from '../../../src/executor/process-runner';
import { ErrorCode, RelayError } from '../../../src/errors';

describe('SpawnProcessRunner', () => {
  const runner = new SpawnProcessRunner();

  it('captures stdout, stderr and the exit code separately', async function () {
    this.timeout(10_000);
    const outcome = await runner.run(
      process.execPath,
      ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'],
      { timeoutMs: 5000 }
    );

    assert.deepEqual(outcome, { stdout: 'out', stderr: 'err', exitCode: 3, signal: null, timedOut: false });
  });

  it('passes arguments through', async function () {
    this.timeout(10_000);
    const outcome = await runner.run(
      process.execPath,
      ['-e', 'console.log(process.argv.slice(1).join("|"))', 'a b', 'c'],
      { timeoutMs: 5000 }
    );

    assert.equal(outcome.stdout, 'a b|c\n');
  });

  it('terminates a process that outlives its limit', async function () {
    this.timeout(10_000);
    const outcome = await runner.run(process.execPath, ['-e', 'setTimeout(() => {}, 30000)'], {
      timeoutMs: 300,
    });

    assert.equal(outcome.timedOut, true);
    assert.equal(outcome.exitCode, null);
    assert.equal(outcome.signal, 'SIGTERM');
  });

  it('force kills a process that ignores SIGTERM', async function () {
    this.timeout(10_000);
    const outcome = await runner.run(
      process.execPath,
      ['-e', 'process.on("SIGTERM", () => {}); console.log("ready"); setTimeout(() => {}, 30000)'],
      { timeoutMs: 1000, killGraceMs: 300 }
    );

    assert.equal(outcome.timedOut, true);
    assert.equal(outcome.signal, 'SIGKILL');
  });

  it('rejects with E502 when the binary cannot be started', async () => {
    await assert.rejects(
      runner.run('/nonexistent/relay-test-binary', [], { timeoutMs: 1000 }),
      (error: unknown) => error instanceof RelayError && error.code === ErrorCode.E502_PROCESS_SPAWN_FAILURE
    );
  });
});
