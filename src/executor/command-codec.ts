/**
 * Command Codec
 *
 * Command and result documents are YAML mappings. Decoding runs in stages so
 * the dispatcher can tell the failure kinds apart:
 * 1. decodeCommandDocument - YAML -> mapping (DecodeError: E3xx)
 * 2. readActionField       - mapping -> verb (missing action: E401)
 * 3. decodeCommand         - mapping -> tagged command (missing/invalid field: E402/E403)
 */

import * as yaml from 'js-yaml';
import { ErrorCode, RelayError, describeError } from '../errors';

export const ACTION_VERBS = [
  'install_pip',
  'uninstall_pip',
  'create_file',
  'delete_file',
  'update_file',
  'read_file',
  'execute',
  'list_executor_dir',
] as const;

export type ActionVerb = (typeof ACTION_VERBS)[number];

export function isActionVerb(value: string): value is ActionVerb {
  return ACTION_VERBS.some(verb => verb === value);
}

export type RelayCommand =
  | { action: 'install_pip'; package: string }
  | { action: 'uninstall_pip'; package: string }
  | { action: 'create_file'; file: string; content: string }
  | { action: 'delete_file'; file: string }
  | { action: 'update_file'; file: string; range: string; content: string }
  | { action: 'read_file'; file: string; range?: string }
  | { action: 'execute'; file: string; args: string[] }
  | { action: 'list_executor_dir' };

export type CommandOf<V extends ActionVerb> = Extract<RelayCommand, { action: V }>;

/**
 * A decoded, not yet validated command document
 */
export type CommandDocument = Record<string, unknown>;

/**
 * Result document written back under the command's filename
 */
export interface CommandResult {
  success: boolean;
  message?: string;
  content?: string;
  truncated?: boolean;
  error?: string;
  stdout?: string;
  stderr?: string;
  exit_code?: number | null;
  files?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Stage 1: parse YAML into a non-empty mapping
 */
export function decodeCommandDocument(raw: string): CommandDocument {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    throw new RelayError(ErrorCode.E301_COMMAND_UNPARSABLE, describeError(error));
  }

  if (parsed === null || parsed === undefined || parsed === '') {
    throw new RelayError(ErrorCode.E302_COMMAND_EMPTY);
  }
  if (!isRecord(parsed)) {
    throw new RelayError(ErrorCode.E303_COMMAND_NOT_MAPPING, `got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
  }
  if (Object.keys(parsed).length === 0) {
    throw new RelayError(ErrorCode.E302_COMMAND_EMPTY);
  }
  return parsed;
}

/**
 * Stage 2: the action verb as written, or null unless it is a non-empty string
 */
export function readActionField(document: CommandDocument): string | null {
  const action = document.action;
  return typeof action === 'string' && action !== '' ? action : null;
}

function scalarToString(key: string, value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  throw new RelayError(ErrorCode.E403_INVALID_PARAMETER, `'${key}' must be a scalar`);
}

function requireField(document: CommandDocument, key: string): string {
  const value = document[key];
  if (value === undefined || value === null) {
    throw new RelayError(ErrorCode.E402_MISSING_PARAMETER, `'${key}'`);
  }
  return scalarToString(key, value);
}

function optionalField(document: CommandDocument, key: string): string | undefined {
  const value = document[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return scalarToString(key, value);
}

/**
 * `args` may be a whitespace-separated string or a list
 */
function decodeArgs(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.map(item => scalarToString('args', item));
  }
  return scalarToString('args', value).split(/\s+/).filter(arg => arg.length > 0);
}

const DECODERS: { [V in ActionVerb]: (document: CommandDocument) => CommandOf<V> } = {
  install_pip: document => ({ action: 'install_pip', package: requireField(document, 'package') }),
  uninstall_pip: document => ({ action: 'uninstall_pip', package: requireField(document, 'package') }),
  create_file: document => ({
    action: 'create_file',
    file: requireField(document, 'file'),
    content: optionalField(document, 'content') ?? '',
  }),
  delete_file: document => ({ action: 'delete_file', file: requireField(document, 'file') }),
  update_file: document => ({
    action: 'update_file',
    file: requireField(document, 'file'),
    range: requireField(document, 'range'),
    content: optionalField(document, 'content') ?? '',
  }),
  read_file: document => ({
    action: 'read_file',
    file: requireField(document, 'file'),
    range: optionalField(document, 'range'),
  }),
  execute: document => ({
    action: 'execute',
    file: requireField(document, 'file'),
    args: decodeArgs(document.args),
  }),
  list_executor_dir: () => ({ action: 'list_executor_dir' }),
};

/**
 * Stage 3: validate the fields of a known verb
 */
export function decodeCommand<V extends ActionVerb>(verb: V, document: CommandDocument): CommandOf<V> {
  return DECODERS[verb](document);
}

/**
 * YAML of a flat document, leaving out absent fields
 */
function dumpDocument(document: object): string {
  const present = Object.fromEntries(
    Object.entries(document).filter(([, value]) => value !== undefined)
  );
  return yaml.dump(present, { lineWidth: -1, noRefs: true });
}

/**
 * Serialize a result document
 */
export function encodeResult(result: CommandResult): string {
  return dumpDocument(result);
}

/**
 * Serialize a command for the command collection
 */
export function encodeCommand(command: RelayCommand): string {
  return dumpDocument(command);
}

/**
 * Parse a result document read back from the result collection
 */
export function decodeResultDocument(raw: string): CommandResult {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    throw new RelayError(ErrorCode.E301_COMMAND_UNPARSABLE, describeError(error));
  }
  if (!isRecord(parsed) || typeof parsed.success !== 'boolean') {
    throw new RelayError(ErrorCode.E303_COMMAND_NOT_MAPPING, 'result document needs a boolean success field');
  }

  const result: CommandResult = { success: parsed.success };
  for (const key of ['message', 'content', 'error', 'stdout', 'stderr'] as const) {
    const value = parsed[key];
    if (typeof value === 'string') {
      result[key] = value;
    }
  }
  if (typeof parsed.truncated === 'boolean') {
    result.truncated = parsed.truncated;
  }
  if (typeof parsed.exit_code === 'number' || parsed.exit_code === null) {
    result.exit_code = parsed.exit_code;
  }
  if (Array.isArray(parsed.files)) {
    result.files = parsed.files.filter((name): name is string => typeof name === 'string');
  }
  return result;
}
