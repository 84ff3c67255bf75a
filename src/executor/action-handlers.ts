/**
 * Action Handlers
 *
 * One handler per verb of the closed action enum. Handlers report expected
 * failures (file not found, bad range, timeout) as { success: false } and let
 * everything else throw; the dispatcher turns a throw into a failure result
 * prefixed with the verb's label.
 *
 * Paths are joined under the sandbox root without containment checks: the
 * coordinator is trusted.
 */

import * as fs from 'fs';
import * as path from 'path';
import { describeError } from '../errors';
import {
  ActionVerb,
  CommandDocument,
  CommandOf,
  CommandResult,
  decodeCommand,
} from './command-codec';
import { readFile } from './file-reader';
import { updateFile } from './line-editor';
import { PackageManager } from './package-manager';
import { IProcessRunner } from './process-runner';

export interface ActionContext {
  sandboxDir: string;
  interpreterPath: string;
  processTimeoutMs: number;
  maxReadBytes: number;
  runner: IProcessRunner;
  packageManager: PackageManager;
}

export type ActionHandler<V extends ActionVerb> = (
  command: CommandOf<V>,
  context: ActionContext
) => Promise<CommandResult>;

export type ActionHandlerRegistry = { [V in ActionVerb]: ActionHandler<V> };

/**
 * Prefix of the error message when a handler throws
 */
export const ACTION_LABELS: Record<ActionVerb, string> = {
  install_pip: 'Package install error',
  uninstall_pip: 'Package uninstall error',
  create_file: 'Create file error',
  delete_file: 'Delete file error',
  update_file: 'Update file error',
  read_file: 'Read file error',
  execute: 'Execution error',
  list_executor_dir: 'Directory listing error',
};

export function resolveSandboxPath(sandboxDir: string, file: string): string {
  return path.join(sandboxDir, file);
}

/**
 * Every file below `root`, relative to it, with forward slashes.
 * Symlinked directories are listed as neither files nor descended into.
 */
export async function listTree(root: string): Promise<string[]> {
  if (!fs.existsSync(root)) {
    return [];
  }

  const files: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }
      if (entry.isSymbolicLink()) {
        const target = await fs.promises.stat(fullPath).catch(() => null);
        if (target?.isDirectory()) {
          continue;
        }
      }
      files.push(path.relative(root, fullPath).split(path.sep).join('/'));
    }
  };

  await walk(root);
  return files.sort();
}

export const ACTION_HANDLERS: ActionHandlerRegistry = {
  install_pip: async (command, context) => {
    return context.packageManager.runPackageCommand('install', command.package);
  },

  uninstall_pip: async (command, context) => {
    return context.packageManager.runPackageCommand('uninstall', command.package);
  },

  create_file: async (command, context) => {
    const absPath = resolveSandboxPath(context.sandboxDir, command.file);
    await fs.promises.mkdir(path.dirname(absPath), { recursive: true });

    try {
      await fs.promises.writeFile(absPath, command.content, 'utf-8');
      return { success: true, message: `File '${command.file}' created successfully.` };
    } catch (error) {
      return { success: false, message: `Failed to create file: ${describeError(error)}` };
    }
  },

  delete_file: async (command, context) => {
    const absPath = resolveSandboxPath(context.sandboxDir, command.file);

    try {
      if (!fs.existsSync(absPath)) {
        return { success: false, message: 'Delete failed: File not found.' };
      }
      await fs.promises.unlink(absPath);
      return { success: true, message: `File '${command.file}' deleted successfully.` };
    } catch (error) {
      return { success: false, message: `Delete failed: ${describeError(error)}` };
    }
  },

  update_file: async (command, context) => {
    const absPath = resolveSandboxPath(context.sandboxDir, command.file);
    return updateFile(absPath, command.range, command.content);
  },

  read_file: async (command, context) => {
    const absPath = resolveSandboxPath(context.sandboxDir, command.file);
    const outcome = await readFile(absPath, command.range, context.maxReadBytes);
    if (!outcome.success) {
      return { success: false, error: outcome.message };
    }
    return { success: true, content: outcome.content, truncated: outcome.truncated };
  },

  execute: async (command, context) => {
    const absPath = resolveSandboxPath(context.sandboxDir, command.file);
    if (!fs.existsSync(absPath)) {
      return { success: false, error: 'File not found.' };
    }

    const limitSeconds = Math.round(context.processTimeoutMs / 1000);
    const outcome = await context.runner.run(context.interpreterPath, [absPath, ...command.args], {
      timeoutMs: context.processTimeoutMs,
    });

    if (outcome.timedOut) {
      return { success: false, error: `Execution failed: Script timed out (limit: ${limitSeconds}s).` };
    }
    return {
      success: true,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      exit_code: outcome.exitCode,
    };
  },

  list_executor_dir: async (_command, context) => {
    return { success: true, files: await listTree(context.sandboxDir) };
  },
};

/**
 * Validate the fields of a known verb and run its handler
 */
export async function runAction<V extends ActionVerb>(
  verb: V,
  document: CommandDocument,
  context: ActionContext,
  handlers: ActionHandlerRegistry = ACTION_HANDLERS
): Promise<CommandResult> {
  const command = decodeCommand(verb, document);
  return handlers[verb](command, context);
}

/**
 * Default handler for verbs outside the enum
 */
export function unknownActionResult(verb: string): CommandResult {
  return { success: false, error: `Unknown action: ${verb}` };
}
