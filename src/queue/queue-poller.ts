/**
 * Queue Poller - lists pending commands and hands them to the dispatcher
 *
 * Features:
 * - Polling interval configurable (default 1000ms)
 * - Every listed command is processed, one at a time, in listing order
 * - In-flight limit: 1 (a tick is skipped while the previous batch runs)
 * - A failed listing is logged and retried on the next tick
 */

import { EventEmitter } from 'events';
import { describeError } from '../errors';
import { RelayLogger } from '../logging';
import { DispatchOutcome, ICommandProcessor } from '../executor/dispatcher';
import { IQueueStore } from './queue-store';

/**
 * Poller configuration
 */
export interface QueuePollerConfig {
  /** Polling interval in milliseconds (default: 1000) */
  pollIntervalMs?: number;
}

/**
 * Poller state
 */
export interface QueuePollerState {
  isRunning: boolean;
  inFlight: string | null;
  lastPollAt: string | null;
  commandsProcessed: number;
  transportErrors: number;
  errors: number;
}

/**
 * Poller events
 */
export interface QueuePollerEvents {
  started: [];
  stopped: [];
  poll: [{ pendingCount: number }];
  processed: [DispatchOutcome];
  'transport-error': [Error];
  'dispatch-error': [string, Error];
}

export class QueuePoller extends EventEmitter {
  private readonly store: IQueueStore;
  private readonly dispatcher: ICommandProcessor;
  private readonly logger: RelayLogger;
  private readonly pollIntervalMs: number;

  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private currentBatch: Promise<void> | null = null;
  private inFlight: string | null = null;
  private isRunning: boolean = false;
  private lastPollAt: string | null = null;
  private commandsProcessed: number = 0;
  private transportErrors: number = 0;
  private errors: number = 0;

  constructor(
    store: IQueueStore,
    dispatcher: ICommandProcessor,
    logger: RelayLogger,
    config: QueuePollerConfig = {}
  ) {
    super();
    this.store = store;
    this.dispatcher = dispatcher;
    this.logger = logger;
    this.pollIntervalMs = config.pollIntervalMs ?? 1000;
  }

  /**
   * Start polling
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    this.logger.info('POLL', `Polling every ${this.pollIntervalMs}ms`);
    this.emit('started');

    this.pollTimer = setInterval(() => {
      this.poll().catch(error => {
        this.logger.error('POLL', `Poll error: ${describeError(error)}`);
      });
    }, this.pollIntervalMs);

    // Immediate first poll
    await this.poll();
  }

  /**
   * Stop polling; waits for the command in flight to finish
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }

    if (this.currentBatch) {
      await this.currentBatch;
    }

    this.logger.info('POLL', 'Stopped');
    this.emit('stopped');
  }

  /**
   * Single poll iteration
   */
  async poll(): Promise<void> {
    if (!this.isRunning || this.currentBatch) {
      return;
    }

    this.currentBatch = this.runBatch();
    try {
      await this.currentBatch;
    } finally {
      this.currentBatch = null;
    }
  }

  private async runBatch(): Promise<void> {
    this.lastPollAt = new Date().toISOString();

    let pending: string[];
    try {
      const listing = await this.store.listFiles('command');
      if (!listing.success) {
        this.logger.warn('POLL', `Failed to fetch command list: ${listing.error ?? 'unknown error'}`);
        return;
      }
      pending = listing.files;
    } catch (error) {
      this.transportErrors++;
      this.logger.error('TRANSPORT', `Server unreachable: ${describeError(error)}`);
      this.emit('transport-error', error instanceof Error ? error : new Error(String(error)));
      return;
    }

    this.emit('poll', { pendingCount: pending.length });
    if (pending.length > 0) {
      this.logger.info('POLL', `Found ${pending.length} new command(s)`);
    }

    for (const commandId of pending) {
      if (!this.isRunning) {
        break;
      }

      this.inFlight = commandId;
      try {
        const outcome = await this.dispatcher.process(commandId);
        this.commandsProcessed++;
        this.emit('processed', outcome);
      } catch (error) {
        this.errors++;
        this.logger.error('DISPATCH', `Critical failure: ${describeError(error)}`, { commandId });
        this.emit('dispatch-error', commandId, error instanceof Error ? error : new Error(String(error)));
      } finally {
        this.inFlight = null;
      }
    }
  }

  /**
   * Get current state
   */
  getState(): QueuePollerState {
    return {
      isRunning: this.isRunning,
      inFlight: this.inFlight,
      lastPollAt: this.lastPollAt,
      commandsProcessed: this.commandsProcessed,
      transportErrors: this.transportErrors,
      errors: this.errors,
    };
  }

  isActive(): boolean {
    return this.isRunning;
  }
}
