/**
 * Configuration management for apppack
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '../errors/index.js';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

/**
 * Accepts the usual spellings of a boolean in environment variables.
 * z.coerce.boolean() would turn "false" into true.
 */
const envBoolean = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

/**
 * Expand a leading "~" to the user's home directory
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

const MAX_TIMEOUT_MS = 2_147_483_647;

const DEFAULT_BUILD_DESCRIPTOR = 'setup.py';

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  project: z.object({
    dir: z.string().min(1).default('.').transform((dir) => resolve(expandHome(dir))),
    requirementsFile: z.string().min(1).default('requirements.txt'),
    buildDescriptor: z.string().min(1).default(DEFAULT_BUILD_DESCRIPTOR),
    /** Overrides the `<name>.app` derived from the build descriptor */
    bundleName: z.string().min(1).optional(),
  }),

  environment: z.object({
    python: z.string().min(1).default('python3'),
    dirName: z
      .string()
      .min(1)
      .refine((name) => !name.includes('/') && name !== '.' && name !== '..', {
        message: 'must be a plain directory name inside the project',
      })
      .default('.apppack-build-env'),
    upgradePip: envBoolean.default('true'),
  }),

  packager: z.object({
    args: z
      .string()
      .transform((value) => value.split(/\s+/).filter(Boolean))
      .refine((args) => args.length > 0, { message: 'must name at least one argument' }),
  }),

  release: z.object({
    enabled: envBoolean.default('false'),
    destinationDir: z
      .string()
      .min(1)
      .default('~/Downloads')
      .transform((dir) => resolve(expandHome(dir))),
  }),

  // Node timers overflow above 2^31-1 ms and would fire immediately
  commandTimeoutMs: z.coerce.number().int().nonnegative().max(MAX_TIMEOUT_MS).default(0),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Values that take precedence over the environment, e.g. CLI flags
 */
export interface ConfigOverrides {
  projectDir?: string;
  release?: boolean;
  destinationDir?: string;
}

function buildRawConfig(env: NodeJS.ProcessEnv, overrides: ConfigOverrides) {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,

    project: {
      dir: overrides.projectDir ?? env.APPPACK_PROJECT_DIR,
      requirementsFile: env.APPPACK_REQUIREMENTS,
      buildDescriptor: env.APPPACK_BUILD_DESCRIPTOR,
      bundleName: env.APPPACK_BUNDLE_NAME || undefined,
    },

    environment: {
      python: env.APPPACK_PYTHON,
      dirName: env.APPPACK_ENV_DIR,
      upgradePip: env.APPPACK_UPGRADE_PIP?.toLowerCase(),
    },

    packager: {
      // Defaults to running py2app through the configured descriptor
      args: env.APPPACK_PACKAGER_ARGS ?? `${env.APPPACK_BUILD_DESCRIPTOR || DEFAULT_BUILD_DESCRIPTOR} py2app`,
    },

    release: {
      enabled: overrides.release ?? env.APPPACK_RELEASE?.toLowerCase(),
      destinationDir: overrides.destinationDir ?? env.APPPACK_DESTINATION,
    },

    commandTimeoutMs: env.APPPACK_COMMAND_TIMEOUT_MS,
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

/**
 * Parse and validate configuration from an environment map.
 * Throws ConfigurationError listing every invalid field.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): Config {
  const parsed = configSchema.safeParse(buildRawConfig(env, overrides));
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}
