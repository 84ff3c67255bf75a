/**
 * CLI argument parsing
 *
 * Parsers are pure: bad input throws CliUsageError and the entry point
 * decides how to exit.
 */

import * as fs from 'fs';
import { RelayConfig, RelayConfigOverrides } from '../config';
import { ActionVerb, ACTION_VERBS, CommandDocument, isActionVerb } from '../executor/command-codec';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

type MutableOverrides = { -readonly [K in keyof RelayConfig]?: RelayConfig[K] };

export interface ServeArguments {
  configPath?: string;
  overrides: RelayConfigOverrides;
}

export interface ExecutorArguments {
  configPath?: string;
  overrides: RelayConfigOverrides;
}

export interface SubmitArguments {
  configPath?: string;
  overrides: RelayConfigOverrides;
  action: ActionVerb;
  document: CommandDocument;
  wait: boolean;
  /** Wait limit in milliseconds */
  timeoutMs?: number;
}

/**
 * Value following a flag; throws if it is missing
 */
function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
}

export function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new CliUsageError(`Invalid port: ${raw}. Must be a number between 1 and 65535.`);
  }
  return port;
}

export function parsePositiveNumber(raw: string, flag: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new CliUsageError(`Invalid ${flag}: ${raw}. Must be a positive number.`);
  }
  return value;
}

/**
 * Parse `relay serve` options
 */
export function parseServeArgs(args: string[]): ServeArguments {
  const overrides: MutableOverrides = {};
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--port') {
      overrides.port = parsePort(takeValue(args, i++, arg));
    } else if (arg === '--host') {
      overrides.host = takeValue(args, i++, arg);
    } else if (arg === '--storage') {
      overrides.storageDir = takeValue(args, i++, arg);
    } else if (arg === '--token') {
      overrides.apiToken = takeValue(args, i++, arg);
    } else if (arg === '--config') {
      configPath = takeValue(args, i++, arg);
    } else {
      throw new CliUsageError(`Unknown option for serve: ${arg}`);
    }
  }

  return { configPath, overrides };
}

/**
 * Parse `relay executor` options
 */
export function parseExecutorArgs(args: string[]): ExecutorArguments {
  const overrides: MutableOverrides = {};
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--server') {
      overrides.serverUrl = takeValue(args, i++, arg);
    } else if (arg === '--token') {
      overrides.apiToken = takeValue(args, i++, arg);
    } else if (arg === '--sandbox') {
      overrides.sandboxDir = takeValue(args, i++, arg);
    } else if (arg === '--interval') {
      overrides.pollIntervalMs = Math.round(parsePositiveNumber(takeValue(args, i++, arg), 'interval'));
    } else if (arg === '--config') {
      configPath = takeValue(args, i++, arg);
    } else {
      throw new CliUsageError(`Unknown option for executor: ${arg}`);
    }
  }

  return { configPath, overrides };
}

/**
 * Parse `relay submit` options into a command document
 */
export function parseSubmitArgs(args: string[]): SubmitArguments {
  const overrides: MutableOverrides = {};
  const document: CommandDocument = {};
  let configPath: string | undefined;
  let wait = false;
  let timeoutMs: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--server') {
      overrides.serverUrl = takeValue(args, i++, arg);
    } else if (arg === '--token') {
      overrides.apiToken = takeValue(args, i++, arg);
    } else if (arg === '--config') {
      configPath = takeValue(args, i++, arg);
    } else if (arg === '--action') {
      document.action = takeValue(args, i++, arg);
    } else if (arg === '--file') {
      document.file = takeValue(args, i++, arg);
    } else if (arg === '--package') {
      document.package = takeValue(args, i++, arg);
    } else if (arg === '--range') {
      document.range = takeValue(args, i++, arg);
    } else if (arg === '--content') {
      document.content = args[i + 1] ?? '';
      i++;
    } else if (arg === '--content-file') {
      const source = takeValue(args, i++, arg);
      try {
        document.content = fs.readFileSync(source, 'utf-8');
      } catch (error) {
        throw new CliUsageError(`Cannot read ${source}: ${error instanceof Error ? error.message : String(error)}`);
      }
    } else if (arg === '--args') {
      document.args = args[i + 1] ?? '';
      i++;
    } else if (arg === '--wait') {
      wait = true;
    } else if (arg === '--timeout') {
      timeoutMs = Math.round(parsePositiveNumber(takeValue(args, i++, arg), 'timeout') * 1000);
    } else {
      throw new CliUsageError(`Unknown option for submit: ${arg}`);
    }
  }

  const action = document.action;
  if (typeof action !== 'string') {
    throw new CliUsageError('Missing --action');
  }
  if (!isActionVerb(action)) {
    throw new CliUsageError(`Unknown action: ${action}. Expected one of: ${ACTION_VERBS.join(', ')}`);
  }

  return { configPath, overrides, action, document, wait, timeoutMs };
}
