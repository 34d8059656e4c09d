/**
 * Build Orchestrator
 * Runs the packaging pipeline: environment → install → clean → package →
 * teardown → (archive → relocate → final cleanup)
 *
 * Assumes it is the only process touching the project's build directories,
 * its environment directory and the destination entries. There is no lock.
 */

import {
  CleanupWarning,
  ConfigurationError,
  createChildLogger,
  errorMessage,
  expandHome,
  logStageTransition,
  wrapError,
} from '@apppack/shared';
import type { AppPackError, BuildLog, BuildLogLevel, BuildStage } from '@apppack/shared';
import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import { rm, stat } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';
import { createArchive } from './archiver.js';
import { loadBuildDescriptor, resolveBundleName } from './build-descriptor.js';
import { runCommand } from './command-runner.js';
import { DependencyEnvironment } from './dependency-environment.js';
import { Packager } from './packager.js';
import { relocateArtifacts } from './relocator.js';
import type {
  BuildContext,
  BuildDescriptor,
  BuildOrchestratorConfig,
  BuildResult,
  CommandRunner,
} from './types.js';
import { BUILD_DIR, DEFAULT_BUILD_CONFIG, DEFAULT_PACKAGER, DIST_DIR } from './types.js';

interface BuildOrchestratorEvents {
  stageChange: (context: BuildContext, stage: BuildStage) => void;
  log: (context: BuildContext, log: BuildLog) => void;
  warning: (context: BuildContext, warning: CleanupWarning) => void;
  complete: (context: BuildContext, result: BuildResult) => void;
  error: (context: BuildContext, error: AppPackError) => void;
}

export interface BuildOrchestratorDeps {
  /** Replaces process spawning, e.g. in tests */
  runner?: CommandRunner;
}

export class BuildOrchestrator extends EventEmitter<BuildOrchestratorEvents> {
  private config: BuildOrchestratorConfig;
  private runner: CommandRunner;
  private logger = createChildLogger({ component: 'BuildOrchestrator' });

  constructor(config: Partial<BuildOrchestratorConfig> = {}, deps: BuildOrchestratorDeps = {}) {
    super();
    const merged = { ...DEFAULT_BUILD_CONFIG, ...config };
    this.config = {
      ...merged,
      packagerArgs: config.packagerArgs ?? [merged.buildDescriptor, DEFAULT_PACKAGER],
      projectDir: resolve(merged.projectDir),
      destinationDir: resolve(expandHome(merged.destinationDir)),
    };
    this.runner = deps.runner ?? runCommand;
  }

  get projectDir(): string {
    return this.config.projectDir;
  }

  /**
   * Run the whole pipeline once. Never rejects: failures come back as a
   * result with `success: false`, the failed stage and the typed error.
   */
  async run(): Promise<BuildResult> {
    const startTime = Date.now();
    const context: BuildContext = {
      id: randomUUID().slice(0, 8),
      projectDir: this.config.projectDir,
      stage: 'pending',
      startedAt: new Date(),
      logs: [],
      warnings: [],
    };

    this.logger.info({
      buildId: context.id,
      projectDir: context.projectDir,
      archiveAndRelocate: this.config.archiveAndRelocate,
    }, 'Starting build');

    let bundlePath: string | undefined;
    let archivePath: string | undefined;

    try {
      this.enterStage(context, 'checking');
      const descriptor = await this.preflight(context);
      const bundleName = resolveBundleName(descriptor, this.config.bundleName);
      context.bundleName = bundleName;

      this.enterStage(context, 'preparing');

      bundlePath = await this.buildBundle(context, bundleName);

      if (this.config.archiveAndRelocate) {
        this.enterStage(context, 'archiving');
        const localArchive = await createArchive(bundlePath);
        this.addLog(context, 'archiving', 'info', `Archive written to ${localArchive}`);

        this.enterStage(context, 'relocating');
        const relocation = await relocateArtifacts([localArchive, bundlePath], this.config.destinationDir);
        for (const replaced of relocation.replaced) {
          this.addLog(context, 'relocating', 'warn', `Replaced existing ${replaced}`);
        }
        [archivePath, bundlePath] = relocation.moved;
        this.addLog(context, 'relocating', 'info', `Moved artifacts to ${this.config.destinationDir}`);

        this.enterStage(context, 'finalizing');
        await this.bestEffort(context, 'finalizing', `Removing ${DIST_DIR}/`, () =>
          rm(this.projectPath(DIST_DIR), { recursive: true, force: true })
        );
      }

      this.enterStage(context, 'complete');

      const result: BuildResult = {
        success: true,
        stage: 'complete',
        bundleName,
        bundlePath,
        archivePath,
        warnings: context.warnings,
        logs: context.logs,
        processingTimeMs: Date.now() - startTime,
      };

      this.emit('complete', context, result);
      this.logger.info({
        buildId: context.id,
        bundlePath,
        archivePath,
        warnings: context.warnings.length,
        duration: result.processingTimeMs,
      }, 'Build completed successfully');

      return result;
    } catch (error) {
      return this.failBuild(context, wrapError(error, { stage: context.stage }), startTime, bundlePath);
    }
  }

  /**
   * Stages 1-5: the dependency environment is acquired here and torn down on
   * every path out, success or failure
   */
  private async buildBundle(context: BuildContext, bundleName: string): Promise<string> {
    const environment = new DependencyEnvironment({
      projectDir: this.config.projectDir,
      dirName: this.config.envDirName,
      python: this.config.python,
      runner: this.runner,
      timeoutMs: this.config.commandTimeoutMs,
    });

    let bundlePath: string;
    try {
      await environment.create();
      this.addLog(context, 'preparing', 'info', `Created environment ${environment.path}`);

      this.enterStage(context, 'installing');
      if (this.config.upgradePip) {
        await environment.upgradeInstaller();
      }
      await environment.install(this.projectPath(this.config.requirementsFile));
      this.addLog(context, 'installing', 'info', `Installed ${this.config.requirementsFile}`);

      this.enterStage(context, 'cleaning');
      await this.removePriorArtifacts(context);

      this.enterStage(context, 'packaging');
      const packager = new Packager({
        projectDir: this.config.projectDir,
        args: this.config.packagerArgs,
      });
      bundlePath = await packager.package(environment, bundleName);
      this.addLog(context, 'packaging', 'info', `Produced ${bundlePath}`);
    } catch (error) {
      await this.teardown(context, environment);
      throw error;
    }

    this.enterStage(context, 'teardown');
    await this.teardown(context, environment);
    await this.bestEffort(context, 'teardown', `Removing ${BUILD_DIR}/`, () =>
      rm(this.projectPath(BUILD_DIR), { recursive: true, force: true })
    );
    return bundlePath;
  }

  private teardown(context: BuildContext, environment: DependencyEnvironment): Promise<void> {
    return this.bestEffort(context, 'teardown', `Removing environment ${environment.path}`, () =>
      environment.dispose()
    );
  }

  /**
   * Check the project before touching the filesystem and read the descriptor
   */
  private async preflight(context: BuildContext): Promise<BuildDescriptor> {
    const projectDir = this.config.projectDir;
    const isDirectory = await stat(projectDir).then(
      (stats) => stats.isDirectory(),
      () => false
    );
    if (!isDirectory) {
      throw new ConfigurationError(`Project directory ${projectDir} does not exist`, { stage: 'checking' });
    }

    const requirements = this.projectPath(this.config.requirementsFile);
    const hasRequirements = await stat(requirements).then(
      (stats) => stats.isFile(),
      () => false
    );
    if (!hasRequirements) {
      throw new ConfigurationError(`Dependency manifest ${requirements} not found`, { stage: 'checking' });
    }

    const descriptor = await loadBuildDescriptor(this.projectPath(this.config.buildDescriptor));
    this.addLog(
      context,
      'checking',
      'info',
      `Build descriptor: ${descriptor.name ?? '(unnamed)'} ${descriptor.version ?? ''}`.trimEnd()
    );
    if (descriptor.iconFile) {
      const hasIcon = await stat(this.projectPath(descriptor.iconFile)).then(
        () => true,
        () => false
      );
      if (!hasIcon) {
        this.addLog(context, 'checking', 'warn', `Icon file ${descriptor.iconFile} not found`);
      }
    }
    return descriptor;
  }

  private async removePriorArtifacts(context: BuildContext): Promise<void> {
    for (const dir of [DIST_DIR, BUILD_DIR]) {
      await this.bestEffort(context, 'cleaning', `Removing prior ${dir}/`, () =>
        rm(this.projectPath(dir), { recursive: true, force: true })
      );
    }
  }

  /**
   * Run a cleanup step; a failure is recorded as a CleanupWarning instead of
   * propagating
   */
  private async bestEffort(
    context: BuildContext,
    stage: BuildStage,
    description: string,
    fn: () => Promise<void>
  ): Promise<void> {
    try {
      await fn();
    } catch (error) {
      const warning = new CleanupWarning(
        `${description} failed: ${errorMessage(error)}`,
        { stage },
        { cause: error }
      );
      context.warnings.push(warning);
      this.addLog(context, stage, 'warn', warning.message);
      this.logger.warn({ buildId: context.id, stage, error: warning.message }, 'Cleanup step failed');
      this.emit('warning', context, warning);
    }
  }

  private projectPath(relativePath: string): string {
    return isAbsolute(relativePath) ? relativePath : join(this.config.projectDir, relativePath);
  }

  private enterStage(context: BuildContext, stage: BuildStage): void {
    const previous = context.stage;
    context.stage = stage;
    logStageTransition(context.id, previous, stage);
    this.emit('stageChange', context, stage);
  }

  /**
   * Add a log entry
   */
  private addLog(
    context: BuildContext,
    stage: BuildStage,
    level: BuildLogLevel,
    message: string
  ): void {
    const log: BuildLog = {
      stage,
      timestamp: new Date(),
      level,
      message,
    };
    context.logs.push(log);
    this.emit('log', context, log);
  }

  /**
   * Create failed build result. The failed stage is the one that was
   * running when the error surfaced.
   */
  private failBuild(
    context: BuildContext,
    error: AppPackError,
    startTime: number,
    bundlePath: string | undefined
  ): BuildResult {
    const failedStage = error.context.stage ?? context.stage;
    this.addLog(context, failedStage, 'error', error.message);
    this.logger.error({ buildId: context.id, stage: failedStage, code: error.code, error: error.message }, 'Build failed');

    this.emit('error', context, error);
    context.stage = 'failed';
    this.emit('stageChange', context, 'failed');

    return {
      success: false,
      stage: failedStage,
      bundleName: context.bundleName,
      bundlePath,
      error,
      warnings: context.warnings,
      logs: context.logs,
      processingTimeMs: Date.now() - startTime,
    };
  }
}
