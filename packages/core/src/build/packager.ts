/**
 * Packager
 * Runs the packaging tool inside the dependency environment
 */

import { createChildLogger, PackagingError } from '@apppack/shared';
import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { commandDiagnostics } from './command-runner.js';
import type { DependencyEnvironment } from './dependency-environment.js';
import { DIST_DIR } from './types.js';

export interface PackagerOptions {
  projectDir: string;
  /** Interpreter arguments, e.g. `setup.py py2app` */
  args: string[];
}

export class Packager {
  private options: PackagerOptions;
  private logger = createChildLogger({ component: 'Packager' });

  constructor(options: PackagerOptions) {
    this.options = options;
  }

  /**
   * Package the application and return the path of the produced bundle
   */
  async package(environment: DependencyEnvironment, bundleName: string): Promise<string> {
    this.logger.info({ args: this.options.args, bundleName }, 'Packaging application');

    const result = await environment.run(this.options.args);
    if (result.exitCode !== 0) {
      throw new PackagingError(
        `Packaging tool exited with code ${result.exitCode}`,
        commandDiagnostics(result),
        { exitCode: result.exitCode }
      );
    }

    const bundlePath = join(this.options.projectDir, DIST_DIR, bundleName);
    const exists = await stat(bundlePath).then(
      () => true,
      () => false
    );
    if (!exists) {
      throw new PackagingError(
        `Packaging tool succeeded but ${join(DIST_DIR, bundleName)} was not produced`,
        commandDiagnostics(result),
        { bundlePath }
      );
    }

    this.logger.info({ bundlePath, durationMs: result.durationMs }, 'Bundle produced');
    return bundlePath;
  }
}
