/**
 * Configuration Tests
 */
import { describe, it, expect } from 'vitest';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import { expandHome, loadConfig } from './index.js';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe('production');
    expect(config.logLevel).toBe('info');
    expect(config.project.dir).toBe(resolve('.'));
    expect(config.project.requirementsFile).toBe('requirements.txt');
    expect(config.project.buildDescriptor).toBe('setup.py');
    expect(config.project.bundleName).toBeUndefined();
    expect(config.environment).toEqual({
      python: 'python3',
      dirName: '.apppack-build-env',
      upgradePip: true,
    });
    expect(config.packager.args).toEqual(['setup.py', 'py2app']);
    expect(config.release).toEqual({ enabled: false, destinationDir: join(homedir(), 'Downloads') });
    expect(config.commandTimeoutMs).toBe(0);
  });

  it('should read every APPPACK_ variable', () => {
    const config = loadConfig({
      APPPACK_PROJECT_DIR: '/work/viewer',
      APPPACK_REQUIREMENTS: 'requirements/mac.txt',
      APPPACK_BUILD_DESCRIPTOR: 'setup_mac.py',
      APPPACK_BUNDLE_NAME: 'Viewer.app',
      APPPACK_PYTHON: '/usr/local/bin/python3.12',
      APPPACK_ENV_DIR: '.venv-build',
      APPPACK_UPGRADE_PIP: 'no',
      APPPACK_PACKAGER_ARGS: 'setup_mac.py  py2app --semi-standalone',
      APPPACK_RELEASE: 'YES',
      APPPACK_DESTINATION: '/srv/releases',
      APPPACK_COMMAND_TIMEOUT_MS: '600000',
    });

    expect(config.project).toEqual({
      dir: '/work/viewer',
      requirementsFile: 'requirements/mac.txt',
      buildDescriptor: 'setup_mac.py',
      bundleName: 'Viewer.app',
    });
    expect(config.environment).toEqual({
      python: '/usr/local/bin/python3.12',
      dirName: '.venv-build',
      upgradePip: false,
    });
    expect(config.packager.args).toEqual(['setup_mac.py', 'py2app', '--semi-standalone']);
    expect(config.release).toEqual({ enabled: true, destinationDir: '/srv/releases' });
    expect(config.commandTimeoutMs).toBe(600000);
  });

  it('should treat "false" as false', () => {
    expect(loadConfig({ APPPACK_RELEASE: 'false' }).release.enabled).toBe(false);
    expect(loadConfig({ APPPACK_UPGRADE_PIP: '0' }).environment.upgradePip).toBe(false);
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig(
      { APPPACK_PROJECT_DIR: '/env/project', APPPACK_RELEASE: 'false', APPPACK_DESTINATION: '/env/out' },
      { projectDir: '/flag/project', release: true, destinationDir: '/flag/out' }
    );

    expect(config.project.dir).toBe('/flag/project');
    expect(config.release).toEqual({ enabled: true, destinationDir: '/flag/out' });
  });

  it('should ignore an empty bundle name', () => {
    expect(loadConfig({ APPPACK_BUNDLE_NAME: '' }).project.bundleName).toBeUndefined();
  });

  it('should reject invalid values with every issue listed', () => {
    const error = (() => {
      try {
        loadConfig({ APPPACK_RELEASE: 'maybe', APPPACK_ENV_DIR: '../env', LOG_LEVEL: 'trace' });
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    const issues = error.context.issues;
    expect(Array.isArray(issues)).toBe(true);
    expect(issues).toHaveLength(3);
    expect(error.message).toContain('environment.dirName: must be a plain directory name inside the project');
  });

  it('should run py2app through a configured build descriptor', () => {
    const config = loadConfig({ APPPACK_BUILD_DESCRIPTOR: 'build_app.py' });

    expect(config.packager.args).toEqual(['build_app.py', 'py2app']);
  });

  it('should accept the longest timeout a timer can hold', () => {
    expect(loadConfig({ APPPACK_COMMAND_TIMEOUT_MS: '2147483647' }).commandTimeoutMs).toBe(2147483647);
  });

  it('should reject a timeout too long for a timer', () => {
    expect(() => loadConfig({ APPPACK_COMMAND_TIMEOUT_MS: '3000000000' })).toThrow(ConfigurationError);
  });

  it('should reject a negative timeout', () => {
    expect(() => loadConfig({ APPPACK_COMMAND_TIMEOUT_MS: '-5' })).toThrow(ConfigurationError);
  });
});

describe('expandHome', () => {
  it('should expand a leading tilde', () => {
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('~/Downloads')).toBe(join(homedir(), 'Downloads'));
  });

  it('should leave other paths alone', () => {
    expect(expandHome('/tmp/~/x')).toBe('/tmp/~/x');
    expect(expandHome('~user/Downloads')).toBe('~user/Downloads');
  });
});
