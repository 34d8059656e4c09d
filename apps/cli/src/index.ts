/**
 * apppack CLI entry point
 */

import { createChildLogger, errorMessage } from '@apppack/shared';
import { EXIT_FAILURE, runCli } from './cli.js';

const logger = createChildLogger({ component: 'CLI' });

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
    env: process.env,
  });
}

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, 'Unexpected failure');
  process.exitCode = EXIT_FAILURE;
});
