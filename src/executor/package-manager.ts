/**
 * Package Manager
 *
 * Installs and uninstalls packages through the configured package-manager
 * binary. Success means the process ran to completion; its exit code is not
 * inspected. The message is stdout followed by stderr.
 */

import { describeError } from '../errors';
import { IProcessRunner } from './process-runner';

export type PackageCommand = 'install' | 'uninstall';

export interface PackageManagerConfig {
  /** Package manager binary, e.g. "pip" */
  executablePath: string;
  timeoutMs: number;
  /** Extra flags for uninstall so it never prompts (default: ["-y"]) */
  uninstallArgs?: string[];
}

export interface PackageCommandOutcome {
  success: boolean;
  message: string;
}

export class PackageManager {
  private readonly executablePath: string;
  private readonly timeoutMs: number;
  private readonly uninstallArgs: string[];

  constructor(
    private readonly runner: IProcessRunner,
    config: PackageManagerConfig
  ) {
    this.executablePath = config.executablePath;
    this.timeoutMs = config.timeoutMs;
    this.uninstallArgs = config.uninstallArgs ?? ['-y'];
  }

  /**
   * Arguments passed to the package manager
   */
  buildArgs(command: PackageCommand, packageName: string): string[] {
    const args = [command, packageName];
    if (command === 'uninstall') {
      args.push(...this.uninstallArgs);
    }
    return args;
  }

  async runPackageCommand(command: PackageCommand, packageName: string): Promise<PackageCommandOutcome> {
    try {
      const outcome = await this.runner.run(this.executablePath, this.buildArgs(command, packageName), {
        timeoutMs: this.timeoutMs,
      });

      if (outcome.timedOut) {
        return {
          success: false,
          message: `Package manager timed out (limit: ${Math.round(this.timeoutMs / 1000)}s).`,
        };
      }
      return { success: true, message: outcome.stdout + outcome.stderr };
    } catch (error) {
      return { success: false, message: `Package manager execution failed: ${describeError(error)}` };
    }
  }
}
