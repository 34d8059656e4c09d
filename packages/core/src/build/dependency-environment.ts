/**
 * Dependency Environment
 * An isolated Python virtual environment owned by one pipeline run
 */

import {
  createChildLogger,
  DependencyInstallError,
  EnvironmentSetupError,
  errorMessage,
} from '@apppack/shared';
import { rm } from 'node:fs/promises';
import { delimiter, join } from 'node:path';
import { commandDiagnostics } from './command-runner.js';
import type { CommandResult, CommandRunner } from './types.js';

export interface DependencyEnvironmentOptions {
  projectDir: string;
  dirName: string;
  /** Interpreter used to create the environment */
  python: string;
  runner: CommandRunner;
  timeoutMs?: number;
}

export class DependencyEnvironment {
  readonly path: string;
  private options: DependencyEnvironmentOptions;
  private logger = createChildLogger({ component: 'DependencyEnvironment' });

  constructor(options: DependencyEnvironmentOptions) {
    this.options = options;
    this.path = join(options.projectDir, options.dirName);
  }

  get binDir(): string {
    return join(this.path, process.platform === 'win32' ? 'Scripts' : 'bin');
  }

  /** The environment's own interpreter */
  get interpreter(): string {
    return join(this.binDir, process.platform === 'win32' ? 'python.exe' : 'python');
  }

  /**
   * Variables that activate the environment for a single child process
   */
  activationEnv(): Record<string, string> {
    return {
      VIRTUAL_ENV: this.path,
      PATH: [this.binDir, process.env.PATH].filter(Boolean).join(delimiter),
    };
  }

  /**
   * Create a fresh environment, discarding any left over from an earlier run
   */
  async create(): Promise<void> {
    try {
      await rm(this.path, { recursive: true, force: true });
    } catch (error) {
      throw new EnvironmentSetupError(
        `Cannot remove stale environment ${this.path}: ${errorMessage(error)}`,
        { path: this.path },
        { cause: error }
      );
    }

    this.logger.info({ path: this.path, python: this.options.python }, 'Creating dependency environment');

    const result = await this.options.runner(
      this.options.python,
      ['-m', 'venv', this.path],
      { cwd: this.options.projectDir, timeoutMs: this.options.timeoutMs }
    );
    if (result.exitCode !== 0) {
      throw new EnvironmentSetupError(
        `Creating environment with ${this.options.python} failed: ${commandDiagnostics(result)}`,
        { path: this.path, exitCode: result.exitCode }
      );
    }
  }

  async upgradeInstaller(): Promise<void> {
    const result = await this.run(['-m', 'pip', 'install', '-U', 'pip']);
    if (result.exitCode !== 0) {
      throw new DependencyInstallError(
        `Upgrading pip failed: ${commandDiagnostics(result)}`,
        { exitCode: result.exitCode }
      );
    }
  }

  async install(requirementsPath: string): Promise<void> {
    this.logger.info({ requirements: requirementsPath }, 'Installing dependencies');

    const result = await this.run(['-m', 'pip', 'install', '-r', requirementsPath]);
    if (result.exitCode !== 0) {
      throw new DependencyInstallError(
        `Installing ${requirementsPath} failed: ${commandDiagnostics(result)}`,
        { exitCode: result.exitCode, requirements: requirementsPath }
      );
    }
  }

  /**
   * Run the environment's interpreter in the project directory
   */
  run(args: string[]): Promise<CommandResult> {
    return this.options.runner(this.interpreter, args, {
      cwd: this.options.projectDir,
      env: this.activationEnv(),
      timeoutMs: this.options.timeoutMs,
    });
  }

  async dispose(): Promise<void> {
    this.logger.debug({ path: this.path }, 'Removing dependency environment');
    await rm(this.path, { recursive: true, force: true });
  }
}
