/**
 * Command Runner
 * Runs external tools (interpreter, pip, packager) and captures their output
 */

import { createChildLogger } from '@apppack/shared';
import { spawn } from 'node:child_process';
import type { CommandOptions, CommandResult, CommandRunner } from './types.js';

const logger = createChildLogger({ component: 'CommandRunner' });

/**
 * Spawn a command without a shell and wait for it to exit.
 * Never rejects: spawn failures resolve with exit code -1 and the error in stderr.
 */
export const runCommand: CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
): Promise<CommandResult> => {
  const startTime = Date.now();

  logger.debug({ command, args, cwd: options.cwd }, 'Executing command');

  return new Promise((resolve) => {
    let settled = false;
    let stdout = '';
    let stderr = '';

    const finish = (exitCode: number): void => {
      if (settled) return;
      settled = true;
      resolve({
        exitCode,
        stdout,
        stderr,
        durationMs: Date.now() - startTime,
      });
    };

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined,
    });

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (exitCode, signal) => {
      if (signal) {
        stderr += `${stderr ? '\n' : ''}Terminated by ${signal}`;
      }
      finish(exitCode ?? 1);
    });

    proc.on('error', (error) => {
      stderr += `${stderr ? '\n' : ''}${error.message}`;
      finish(-1);
    });
  });
};

/**
 * Diagnostic text of a failed command, stderr first
 */
export function commandDiagnostics(result: CommandResult): string {
  const text = [result.stderr.trim(), result.stdout.trim()].filter(Boolean).join('\n');
  return text || `Exit code ${result.exitCode}`;
}
