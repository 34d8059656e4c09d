/**
 * Types for the build pipeline
 */

import type { AppPackError, BuildLog, BuildStage, CleanupWarning } from '@apppack/shared';

/**
 * Build orchestrator configuration
 */
export interface BuildOrchestratorConfig {
  /** Project root holding the manifest and build descriptor */
  projectDir: string;
  /** Interpreter that creates the dependency environment */
  python: string;
  /** Name of the environment directory inside the project */
  envDirName: string;
  /** Pinned dependency manifest, relative to the project */
  requirementsFile: string;
  /** Build descriptor, relative to the project */
  buildDescriptor: string;
  /** Arguments passed to the environment's interpreter to package the app */
  packagerArgs: string[];
  /** Overrides the bundle name derived from the build descriptor */
  bundleName?: string;
  /** Upgrade pip inside the environment before installing requirements */
  upgradePip: boolean;
  /** Compress the bundle and move bundle and archive to destinationDir */
  archiveAndRelocate: boolean;
  destinationDir: string;
  /** Per-command timeout in ms, 0 disables it */
  commandTimeoutMs: number;
}

/** Packaging tool run when no packager arguments are configured */
export const DEFAULT_PACKAGER = 'py2app';

export const DEFAULT_BUILD_CONFIG: BuildOrchestratorConfig = {
  projectDir: '.',
  python: 'python3',
  envDirName: '.apppack-build-env',
  requirementsFile: 'requirements.txt',
  buildDescriptor: 'setup.py',
  packagerArgs: ['setup.py', DEFAULT_PACKAGER],
  upgradePip: true,
  archiveAndRelocate: false,
  destinationDir: '~/Downloads',
  commandTimeoutMs: 0,
};

export const BUILD_DIR = 'build';
export const DIST_DIR = 'dist';
export const ARCHIVE_EXTENSION = '.tar.gz';

/**
 * What the build descriptor declares about the application
 */
export interface BuildDescriptor {
  /** Absolute path of the descriptor file */
  path: string;
  /** Distribution name, e.g. `PyImageViewer` */
  name?: string;
  version?: string;
  /** Entry point scripts listed under `app` */
  entryPoints: string[];
  /** Icon file named in the packaging options */
  iconFile?: string;
}

/**
 * Outcome of one external command
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface CommandOptions {
  cwd: string;
  /** Variables merged over the current process environment */
  env?: Record<string, string>;
  /** Kill the command after this many ms, 0 or undefined for no limit */
  timeoutMs?: number;
}

/**
 * Runs one external command to completion.
 * A command that cannot be started resolves with exit code -1.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<CommandResult>;

/**
 * Build context for one pipeline run
 */
export interface BuildContext {
  /** Build ID */
  id: string;
  projectDir: string;
  /** Set once the build descriptor has been read */
  bundleName?: string;
  stage: BuildStage;
  startedAt: Date;
  logs: BuildLog[];
  warnings: CleanupWarning[];
}

/**
 * Build result
 */
export interface BuildResult {
  success: boolean;
  /** `complete` on success, otherwise the stage that failed */
  stage: BuildStage;
  bundleName?: string;
  /** Where the bundle ended up */
  bundlePath?: string;
  /** Where the archive ended up, release variant only */
  archivePath?: string;
  error?: AppPackError;
  warnings: CleanupWarning[];
  logs: BuildLog[];
  processingTimeMs: number;
}

/**
 * Result of moving artifacts into the destination directory
 */
export interface RelocationResult {
  /** Absolute destination path per moved artifact, in input order */
  moved: string[];
  /** Destination entries deleted before the move */
  replaced: string[];
}
