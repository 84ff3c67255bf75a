/**
 * Dispatcher - decodes one command, runs it, finalizes it
 *
 * process(id):
 * 1. Fetch the command document (transport failure: leave it queued)
 * 2. Decode YAML (failure: delete the command, write no result)
 * 3. Missing action: failure result "missing action"
 * 4. Route to the verb's handler; any throw becomes a failure result
 * 5. Finalize: save the result, then delete the command
 *
 * Finalization that did not complete is remembered per command id. When the
 * same id is listed again, finalization is retried with the remembered result
 * instead of executing the action a second time.
 */

import { ErrorCode, describeError, getErrorMessage } from '../errors';
import { RelayLogger } from '../logging';
import { RelayConfig } from '../config';
import { IQueueStore } from '../queue/queue-store';
import {
  CommandDocument,
  CommandResult,
  decodeCommandDocument,
  encodeResult,
  isActionVerb,
  readActionField,
} from './command-codec';
import {
  ACTION_HANDLERS,
  ACTION_LABELS,
  ActionContext,
  ActionHandlerRegistry,
  runAction,
  unknownActionResult,
} from './action-handlers';
import { PackageManager } from './package-manager';
import { IProcessRunner } from './process-runner';

/**
 * FETCH_FAILED: document could not be fetched, command left queued
 * DISCARDED:    document undecodable, command deleted without a result
 * COMPLETE:     result with success=true
 * ERROR:        result with success=false
 */
export type DispatchStatus = 'FETCH_FAILED' | 'DISCARDED' | 'COMPLETE' | 'ERROR';

export interface DispatchOutcome {
  commandId: string;
  status: DispatchStatus;
  result?: CommandResult;
  /** Result saved (if any) and command deleted */
  finalized: boolean;
  /** Finalization retried for an already executed command */
  redelivered: boolean;
}

/**
 * What the poller needs from a dispatcher
 */
export interface ICommandProcessor {
  process(commandId: string): Promise<DispatchOutcome>;
}

export interface DispatcherConfig {
  store: IQueueStore;
  context: ActionContext;
  logger: RelayLogger;
  handlers?: ActionHandlerRegistry;
  /** Max remembered unfinished finalizations (default: 1000) */
  maxPendingFinalizations?: number;
}

/**
 * Build the handler context from the startup configuration
 */
export function buildActionContext(config: RelayConfig, runner: IProcessRunner): ActionContext {
  return {
    sandboxDir: config.sandboxDir,
    interpreterPath: config.interpreterPath,
    processTimeoutMs: config.processTimeoutMs,
    maxReadBytes: config.maxReadBytes,
    runner,
    packageManager: new PackageManager(runner, {
      executablePath: config.packageManagerPath,
      timeoutMs: config.processTimeoutMs,
    }),
  };
}

export class Dispatcher implements ICommandProcessor {
  private readonly store: IQueueStore;
  private readonly context: ActionContext;
  private readonly logger: RelayLogger;
  private readonly handlers: ActionHandlerRegistry;
  private readonly maxPendingFinalizations: number;
  private readonly pendingFinalizations: Map<string, CommandResult> = new Map();

  constructor(config: DispatcherConfig) {
    this.store = config.store;
    this.context = config.context;
    this.logger = config.logger;
    this.handlers = config.handlers ?? ACTION_HANDLERS;
    this.maxPendingFinalizations = config.maxPendingFinalizations ?? 1000;
  }

  async process(commandId: string): Promise<DispatchOutcome> {
    const remembered = this.pendingFinalizations.get(commandId);
    if (remembered) {
      this.logger.info('DISPATCH', 'Already executed; retrying finalization', { commandId });
      return this.complete(commandId, remembered, true);
    }

    let raw: string;
    try {
      const reply = await this.store.readFile('command', commandId);
      if (!reply.success) {
        this.logger.warn('DISPATCH', `Command could not be read: ${reply.error ?? 'unknown error'}`, { commandId });
      }
      raw = reply.success ? reply.content ?? '' : '';
    } catch (error) {
      this.logger.error('TRANSPORT', `Network error: ${describeError(error)}`, { commandId });
      return { commandId, status: 'FETCH_FAILED', finalized: false, redelivered: false };
    }

    let document: CommandDocument;
    try {
      document = decodeCommandDocument(raw);
    } catch (error) {
      this.logger.warn('DECODE', `Skipping corrupted command: ${describeError(error)}`, { commandId });
      const deleted = await this.deleteCommand(commandId);
      return { commandId, status: 'DISCARDED', finalized: deleted, redelivered: false };
    }

    const result = await this.execute(commandId, document);
    return this.complete(commandId, result, false);
  }

  /**
   * Number of commands whose finalization is still outstanding
   */
  getPendingFinalizationCount(): number {
    return this.pendingFinalizations.size;
  }

  private async execute(commandId: string, document: CommandDocument): Promise<CommandResult> {
    const verb = readActionField(document);
    if (verb === null) {
      this.logger.warn('DISPATCH', 'Command has no action', { commandId });
      return { success: false, error: getErrorMessage(ErrorCode.E401_MISSING_ACTION) };
    }

    if (!isActionVerb(verb)) {
      this.logger.warn('DISPATCH', `Unknown action: ${verb}`, { commandId });
      return unknownActionResult(verb);
    }

    this.logger.info('ACTION', `Running ${verb}`, { commandId });
    try {
      const result = await runAction(verb, document, this.context, this.handlers);
      this.logger.info('ACTION', `${verb} ${result.success ? 'succeeded' : 'failed'}`, {
        commandId,
        details: result.success ? undefined : { error: result.error ?? result.message },
      });
      return result;
    } catch (error) {
      const message = `${ACTION_LABELS[verb]}: ${describeError(error)}`;
      this.logger.error('ACTION', message, { commandId });
      return { success: false, error: message };
    }
  }

  private async complete(commandId: string, result: CommandResult, redelivered: boolean): Promise<DispatchOutcome> {
    const finalized = await this.finalize(commandId, result);
    if (finalized) {
      this.pendingFinalizations.delete(commandId);
    } else {
      this.rememberFinalization(commandId, result);
    }
    return {
      commandId,
      status: result.success ? 'COMPLETE' : 'ERROR',
      result,
      finalized,
      redelivered,
    };
  }

  /**
   * Save the result, then delete the command; the command is only deleted
   * once its result is stored
   */
  private async finalize(commandId: string, result: CommandResult): Promise<boolean> {
    try {
      const saved = await this.store.saveFile('result', commandId, encodeResult(result));
      if (!saved.success) {
        this.logger.error('FINALIZE', `Saving result failed: ${saved.error ?? 'unknown error'}`, { commandId });
        return false;
      }
    } catch (error) {
      this.logger.error('FINALIZE', `Finalization failed: ${describeError(error)}`, { commandId });
      return false;
    }

    return this.deleteCommand(commandId);
  }

  private async deleteCommand(commandId: string): Promise<boolean> {
    try {
      const deleted = await this.store.deleteFile('command', commandId);
      if (!deleted.success) {
        this.logger.error('FINALIZE', `Deleting command failed: ${deleted.error ?? 'unknown error'}`, { commandId });
      }
      return deleted.success;
    } catch (error) {
      this.logger.error('FINALIZE', `Deleting command failed: ${describeError(error)}`, { commandId });
      return false;
    }
  }

  private rememberFinalization(commandId: string, result: CommandResult): void {
    this.pendingFinalizations.delete(commandId);
    this.pendingFinalizations.set(commandId, result);
    if (this.pendingFinalizations.size > this.maxPendingFinalizations) {
      const oldest = this.pendingFinalizations.keys().next();
      if (!oldest.done) {
        this.pendingFinalizations.delete(oldest.value);
      }
    }
  }
}
