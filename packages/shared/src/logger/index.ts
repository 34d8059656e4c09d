/**
 * Structured logging for apppack
 */

import pino from 'pino';
import type { BuildStage } from '../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = pino.Logger;

export interface LogContext {
  buildId?: string;
  stage?: BuildStage;
  component?: string;
  [key: string]: unknown;
}

function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'apppack',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const level = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';
    loggerInstance = createBaseLogger(level);
  }
  return loggerInstance;
}

export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

export function logStageTransition(
  buildId: string,
  fromStage: BuildStage,
  toStage: BuildStage
): void {
  getLogger().info(
    {
      event: 'stage_transition',
      buildId,
      fromStage,
      toStage,
    },
    `Stage transition: ${fromStage} -> ${toStage}`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
