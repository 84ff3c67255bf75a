/**
 * Relay Configuration
 *
 * Built once at startup and passed to the server, poller and dispatcher.
 *
 * Priority order (highest wins):
 * 1. Explicit overrides (CLI flags)
 * 2. RELAY_* environment variables
 * 3. JSON config file (--config or RELAY_CONFIG)
 * 4. Built-in defaults
 *
 * Fail-closed: invalid values throw RelayError (E1xx)
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorCode, RelayError } from '../errors';
import { DEFAULT_READ_LIMIT_BYTES } from '../executor/file-reader';

export interface RelayConfig {
  /** Relay server base URL used by the executor and coordinator */
  readonly serverUrl: string;
  /** Shared bearer token */
  readonly apiToken: string;
  /** Relay server bind host */
  readonly host: string;
  /** Relay server port */
  readonly port: number;
  /** Root of the command/ and result/ collections */
  readonly storageDir: string;
  /** Dashboard assets served under /ui and /static */
  readonly staticDir: string;
  /** Executor sandbox root */
  readonly sandboxDir: string;
  /** Interpreter used by the execute action */
  readonly interpreterPath: string;
  /** Package manager binary used by install/uninstall */
  readonly packageManagerPath: string;
  readonly pollIntervalMs: number;
  /** Timeout of the poll-list call */
  readonly listTimeoutMs: number;
  /** Timeout of every other Queue Store call */
  readonly requestTimeoutMs: number;
  /** Hard limit for subprocesses and package-manager runs */
  readonly processTimeoutMs: number;
  /** Byte ceiling of a file read */
  readonly maxReadBytes: number;
}

export type RelayConfigOverrides = Partial<RelayConfig>;

export const DEFAULT_PORT = 8000;
export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_LIST_TIMEOUT_MS = 10_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_PROCESS_TIMEOUT_MS = 300_000;
export const DEFAULT_MAX_READ_BYTES = DEFAULT_READ_LIMIT_BYTES;

/**
 * Bundled dashboard directory
 */
export const DEFAULT_STATIC_DIR = path.join(__dirname, '..', 'web', 'public');

export const DEFAULT_CONFIG: Omit<RelayConfig, 'apiToken'> = {
  serverUrl: `http://127.0.0.1:${DEFAULT_PORT}`,
  host: '0.0.0.0',
  port: DEFAULT_PORT,
  storageDir: './storage',
  staticDir: DEFAULT_STATIC_DIR,
  sandboxDir: './project',
  interpreterPath: 'python3',
  packageManagerPath: 'pip',
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  listTimeoutMs: DEFAULT_LIST_TIMEOUT_MS,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  processTimeoutMs: DEFAULT_PROCESS_TIMEOUT_MS,
  maxReadBytes: DEFAULT_MAX_READ_BYTES,
};

const STRING_KEYS = [
  'serverUrl',
  'apiToken',
  'host',
  'storageDir',
  'staticDir',
  'sandboxDir',
  'interpreterPath',
  'packageManagerPath',
] as const;

const NUMBER_KEYS = [
  'port',
  'pollIntervalMs',
  'listTimeoutMs',
  'requestTimeoutMs',
  'processTimeoutMs',
  'maxReadBytes',
] as const;

type StringKey = (typeof STRING_KEYS)[number];
type NumberKey = (typeof NUMBER_KEYS)[number];

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Environment variable for each key that can be set from the environment
 */
const ENV_STRING_KEYS: Partial<Record<StringKey, string>> = {
  serverUrl: 'RELAY_SERVER_URL',
  apiToken: 'RELAY_API_TOKEN',
  host: 'RELAY_HOST',
  storageDir: 'RELAY_STORAGE_DIR',
  staticDir: 'RELAY_STATIC_DIR',
  sandboxDir: 'RELAY_SANDBOX_DIR',
  interpreterPath: 'RELAY_INTERPRETER',
  packageManagerPath: 'RELAY_PACKAGE_MANAGER',
};

const ENV_NUMBER_KEYS: Partial<Record<NumberKey, string>> = {
  port: 'RELAY_PORT',
  pollIntervalMs: 'RELAY_POLL_INTERVAL_MS',
  requestTimeoutMs: 'RELAY_REQUEST_TIMEOUT_MS',
  processTimeoutMs: 'RELAY_PROCESS_TIMEOUT_MS',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a positive integer, fail-closed
 */
function parsePositiveInt(raw: string | number, key: string): number {
  const value = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    const code = key === 'port' ? ErrorCode.E102_INVALID_PORT : ErrorCode.E103_INVALID_INTERVAL;
    throw new RelayError(code, `${key}=${String(raw)}`);
  }
  return value;
}

/**
 * Read a JSON config file into overrides
 * Unknown keys are ignored; known keys must have the right type
 */
export function readConfigFile(filePath: string): RelayConfigOverrides {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RelayError(ErrorCode.E104_CONFIG_FILE_UNREADABLE, `${filePath}: ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new RelayError(ErrorCode.E104_CONFIG_FILE_UNREADABLE, `${filePath}: expected a JSON object`);
  }

  const result: Partial<Mutable<RelayConfig>> = {};

  for (const key of STRING_KEYS) {
    const value = parsed[key];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw new RelayError(ErrorCode.E105_INVALID_CONFIG_VALUE, `${key} must be a string`);
    }
    result[key] = value;
  }

  for (const key of NUMBER_KEYS) {
    const value = parsed[key];
    if (value === undefined) continue;
    if (typeof value !== 'number') {
      throw new RelayError(ErrorCode.E105_INVALID_CONFIG_VALUE, `${key} must be a number`);
    }
    result[key] = parsePositiveInt(value, key);
  }

  return result;
}

/**
 * Collect overrides from RELAY_* environment variables
 */
export function readEnvironment(env: NodeJS.ProcessEnv): RelayConfigOverrides {
  const result: Partial<Mutable<RelayConfig>> = {};

  for (const key of STRING_KEYS) {
    const envName = ENV_STRING_KEYS[key];
    const value = envName ? env[envName] : undefined;
    if (value) {
      result[key] = value;
    }
  }

  for (const key of NUMBER_KEYS) {
    const envName = ENV_NUMBER_KEYS[key];
    const value = envName ? env[envName] : undefined;
    if (value) {
      result[key] = parsePositiveInt(value, key);
    }
  }

  return result;
}

export interface LoadRelayConfigOptions {
  /** JSON config file; falls back to RELAY_CONFIG */
  configPath?: string;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-priority values, usually from CLI flags */
  overrides?: RelayConfigOverrides;
  /** Fail when no token is configured (default: true) */
  requireToken?: boolean;
}

/**
 * Build the immutable configuration value
 */
export function loadRelayConfig(options: LoadRelayConfigOptions = {}): Readonly<RelayConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.RELAY_CONFIG;
  const fromFile = configPath ? readConfigFile(configPath) : {};

  const merged: RelayConfig = {
    apiToken: '',
    ...DEFAULT_CONFIG,
    ...fromFile,
    ...readEnvironment(env),
    ...stripUndefined(options.overrides ?? {}),
  };

  if (merged.port > 65535) {
    throw new RelayError(ErrorCode.E102_INVALID_PORT, String(merged.port));
  }
  for (const key of NUMBER_KEYS) {
    parsePositiveInt(merged[key], key);
  }

  if ((options.requireToken ?? true) && !merged.apiToken) {
    throw new RelayError(
      ErrorCode.E101_MISSING_API_TOKEN,
      'set RELAY_API_TOKEN, apiToken in the config file, or --token'
    );
  }

  return Object.freeze({
    ...merged,
    serverUrl: merged.serverUrl.replace(/\/+$/, ''),
    storageDir: path.resolve(merged.storageDir),
    staticDir: path.resolve(merged.staticDir),
    sandboxDir: path.resolve(merged.sandboxDir),
  });
}

function stripUndefined(overrides: RelayConfigOverrides): RelayConfigOverrides {
  const result: Partial<Mutable<RelayConfig>> = {};
  for (const key of STRING_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  for (const key of NUMBER_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
