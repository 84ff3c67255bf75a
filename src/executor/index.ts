/**
 * Executor Module Index
 */

export {
  ACTION_VERBS,
  isActionVerb,
  decodeCommandDocument,
  readActionField,
  decodeCommand,
  encodeResult,
  encodeCommand,
  decodeResultDocument,
  type ActionVerb,
  type RelayCommand,
  type CommandOf,
  type CommandDocument,
  type CommandResult,
} from './command-codec';
export {
  ACTION_HANDLERS,
  ACTION_LABELS,
  listTree,
  resolveSandboxPath,
  runAction,
  unknownActionResult,
  type ActionContext,
  type ActionHandler,
  type ActionHandlerRegistry,
} from './action-handlers';
export {
  Dispatcher,
  buildActionContext,
  type DispatchOutcome,
  type DispatchStatus,
  type DispatcherConfig,
  type ICommandProcessor,
} from './dispatcher';
export { updateFile, applyLineEdit, type EditOutcome } from './line-editor';
export { readFile, type ReadOutcome } from './file-reader';
export {
  FULL_OVERWRITE_RANGE,
  parseEditRange,
  parseLineInterval,
  splitLinesKeepEnds,
  type EditRange,
  type LineInterval,
} from './line-ranges';
export { PackageManager, type PackageCommand, type PackageManagerConfig } from './package-manager';
export {
  SpawnProcessRunner,
  SIGTERM_GRACE_MS,
  type IProcessRunner,
  type ProcessOutcome,
  type ProcessRunOptions,
} from './process-runner';
