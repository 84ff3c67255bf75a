/**
 * Coordinator Client
 *
 * Enqueues command documents and collects their results.
 * A command and its result share a filename: <epoch-ms>-<uuid>.yaml
 */

import { v4 as uuidv4 } from 'uuid';
import { ErrorCode, RelayError } from '../errors';
import { IQueueStore, QUEUE_FILE_SUFFIX } from '../queue/queue-store';
import { CommandResult, RelayCommand, decodeResultDocument, encodeCommand } from '../executor/command-codec';

export interface CoordinatorClientConfig {
  store: IQueueStore;
  /** Delay between result checks (default: 1000ms) */
  pollIntervalMs?: number;
  /** Clock, for tests */
  now?: () => number;
  /** Sleep, for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface WaitOptions {
  /** Give up after this long (default: 60000ms) */
  timeoutMs?: number;
  /** Delete the result once read (default: true) */
  consume?: boolean;
}

export function createCommandFilename(now: number = Date.now()): string {
  return `${now}-${uuidv4()}${QUEUE_FILE_SUFFIX}`;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class CoordinatorClient {
  private readonly store: IQueueStore;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: CoordinatorClientConfig) {
    this.store = config.store;
    this.pollIntervalMs = config.pollIntervalMs ?? 1000;
    this.now = config.now ?? Date.now;
    this.sleep = config.sleep ?? defaultSleep;
  }

  /**
   * Enqueue a command; returns its filename
   */
  async submit(command: RelayCommand): Promise<string> {
    const filename = createCommandFilename(this.now());
    const saved = await this.store.saveFile('command', filename, encodeCommand(command));
    if (!saved.success) {
      throw new RelayError(ErrorCode.E205_QUEUE_STORE_REFUSED, `save_file: ${saved.error ?? 'unknown error'}`);
    }
    return filename;
  }

  /**
   * Read a result if it exists yet; null while the command is pending
   */
  async fetchResult(filename: string): Promise<CommandResult | null> {
    const listing = await this.store.listFiles('result');
    if (!listing.success || !listing.files.includes(filename)) {
      return null;
    }
    const reply = await this.store.readFile('result', filename);
    if (!reply.success || reply.content === undefined) {
      return null;
    }
    return decodeResultDocument(reply.content);
  }

  /**
   * Poll until the result appears, then (by default) delete it
   */
  async waitForResult(filename: string, options: WaitOptions = {}): Promise<CommandResult> {
    const timeoutMs = options.timeoutMs ?? 60_000;
    const deadline = this.now() + timeoutMs;

    for (;;) {
      const result = await this.fetchResult(filename);
      if (result) {
        if (options.consume ?? true) {
          await this.store.deleteFile('result', filename);
        }
        return result;
      }
      if (this.now() >= deadline) {
        throw new RelayError(ErrorCode.E602_RESULT_WAIT_TIMEOUT, `${filename} after ${timeoutMs}ms`);
      }
      await this.sleep(this.pollIntervalMs);
    }
  }

  /**
   * Submit and wait in one call
   */
  async run(command: RelayCommand, options: WaitOptions = {}): Promise<{ filename: string; result: CommandResult }> {
    const filename = await this.submit(command);
    const result = await this.waitForResult(filename, options);
    return { filename, result };
  }
}
