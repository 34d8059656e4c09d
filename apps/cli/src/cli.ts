/**
 * apppack command line
 */

import { parseArgs } from 'node:util';
import { BuildOrchestrator } from '@apppack/core';
import type { BuildOrchestratorConfig, BuildResult } from '@apppack/core';
import {
  ConfigurationError,
  PackagingError,
  STAGE_LABELS,
  errorMessage,
  loadConfig,
} from '@apppack/shared';
import type { BuildStage, Config } from '@apppack/shared';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: apppack [options]

Builds the application bundle of a Python project: creates a fresh virtual
environment, installs requirements, runs the packaging tool, removes the
environment and the build/ directory.

Options:
  -r, --release              also archive the bundle and move bundle and
                             archive into the destination directory
  -p, --project <dir>        project directory (default: APPPACK_PROJECT_DIR or .)
  -d, --destination <dir>    destination directory (default: APPPACK_DESTINATION
                             or ~/Downloads)
  -h, --help                 show this help

With --release, an existing bundle or archive of the same name in the
destination directory is deleted without confirmation. Do not run two builds
of the same project or into the same destination at once.`;

export interface CliOptions {
  help: boolean;
  release?: boolean;
  projectDir?: string;
  destinationDir?: string;
}

export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        release: { type: 'boolean', short: 'r' },
        project: { type: 'string', short: 'p' },
        destination: { type: 'string', short: 'd' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    });
    return {
      help: values.help ?? false,
      // An absent flag leaves APPPACK_RELEASE in charge
      release: values.release ? true : undefined,
      projectDir: values.project,
      destinationDir: values.destination,
    };
  } catch (error) {
    throw new ConfigurationError(errorMessage(error));
  }
}

export function toOrchestratorConfig(config: Config): BuildOrchestratorConfig {
  return {
    projectDir: config.project.dir,
    python: config.environment.python,
    envDirName: config.environment.dirName,
    requirementsFile: config.project.requirementsFile,
    buildDescriptor: config.project.buildDescriptor,
    packagerArgs: config.packager.args,
    bundleName: config.project.bundleName,
    upgradePip: config.environment.upgradePip,
    archiveAndRelocate: config.release.enabled,
    destinationDir: config.release.destinationDir,
    commandTimeoutMs: config.commandTimeoutMs,
  };
}

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
  createOrchestrator?: (config: BuildOrchestratorConfig) => BuildOrchestrator;
}

const QUIET_STAGES: ReadonlySet<BuildStage> = new Set(['pending', 'complete', 'failed']);

function attachReporter(orchestrator: BuildOrchestrator, io: CliIO): void {
  orchestrator.on('stageChange', (_, stage) => {
    if (!QUIET_STAGES.has(stage)) {
      io.stdout(`==> ${STAGE_LABELS[stage]}`);
    }
  });
  orchestrator.on('log', (_, log) => {
    if (log.level === 'warn') {
      io.stderr(`warning: ${log.message}`);
    }
  });
}

function reportResult(result: BuildResult, io: CliIO): void {
  if (result.success) {
    if (result.bundlePath) io.stdout(`Bundle:  ${result.bundlePath}`);
    if (result.archivePath) io.stdout(`Archive: ${result.archivePath}`);
    io.stdout(`Done in ${(result.processingTimeMs / 1000).toFixed(1)}s`);
    return;
  }

  if (result.error instanceof PackagingError && result.error.output) {
    io.stderr(result.error.output);
  }
  if (result.bundlePath) {
    io.stderr(`Built bundle kept at ${result.bundlePath}`);
  }
  const message = result.error?.message ?? 'unknown error';
  io.stderr(`apppack: ${STAGE_LABELS[result.stage]} failed: ${message}`);
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let config: Config;
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      io.stdout(USAGE);
      return EXIT_OK;
    }
    config = loadConfig(io.env, {
      projectDir: options.projectDir,
      release: options.release,
      destinationDir: options.destinationDir,
    });
  } catch (error) {
    io.stderr(`apppack: ${errorMessage(error)}`);
    io.stderr('Run apppack --help for usage.');
    return EXIT_USAGE;
  }

  const orchestratorConfig = toOrchestratorConfig(config);
  const orchestrator = io.createOrchestrator
    ? io.createOrchestrator(orchestratorConfig)
    : new BuildOrchestrator(orchestratorConfig);

  attachReporter(orchestrator, io);
  const result = await orchestrator.run();
  reportResult(result, io);

  if (result.success) return EXIT_OK;
  // Failed project checks exit like invalid arguments
  return result.error instanceof ConfigurationError ? EXIT_USAGE : EXIT_FAILURE;
}
