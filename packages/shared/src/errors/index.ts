/**
 * Error hierarchy for apppack
 */

import type { BuildStage } from '../types/index.js';

export type ErrorCategory =
  | 'CONFIGURATION'
  | 'ENVIRONMENT'
  | 'DEPENDENCY'
  | 'PACKAGING'
  | 'ARCHIVE'
  | 'RELOCATION'
  | 'CLEANUP'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  /** Whether the error aborts the run */
  fatal: boolean;
  stage?: BuildStage;
  [key: string]: unknown;
}

/**
 * Base error class for apppack
 */
export class AppPackError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppPackError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      fatal: context.fatal ?? true,
      ...context,
    };
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Invalid settings, or a project missing its manifest or build descriptor
 */
export class ConfigurationError extends AppPackError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      fatal: true,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * The isolated dependency environment could not be created
 */
export class EnvironmentSetupError extends AppPackError {
  constructor(message: string, context: Partial<ErrorContext> = {}, options?: { cause?: unknown }) {
    super(message, 'E2001', {
      category: 'ENVIRONMENT',
      severity: 'HIGH',
      fatal: true,
      stage: 'preparing',
      ...context,
    }, options);
    this.name = 'EnvironmentSetupError';
  }
}

export class DependencyInstallError extends AppPackError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      category: 'DEPENDENCY',
      severity: 'HIGH',
      fatal: true,
      stage: 'installing',
      ...context,
    });
    this.name = 'DependencyInstallError';
  }
}

/**
 * The packaging tool failed or produced no bundle.
 * `output` carries the tool's diagnostics.
 */
export class PackagingError extends AppPackError {
  public readonly output: string;

  constructor(message: string, output: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E4001', {
      category: 'PACKAGING',
      severity: 'HIGH',
      fatal: true,
      stage: 'packaging',
      ...context,
    });
    this.name = 'PackagingError';
    this.output = output;
  }
}

export class ArchiveError extends AppPackError {
  constructor(message: string, context: Partial<ErrorContext> = {}, options?: { cause?: unknown }) {
    super(message, 'E5001', {
      category: 'ARCHIVE',
      severity: 'HIGH',
      fatal: true,
      stage: 'archiving',
      ...context,
    }, options);
    this.name = 'ArchiveError';
  }
}

/**
 * Destination directory unreachable or unwritable.
 * Built artifacts that were not moved stay in the local dist directory.
 */
export class RelocationError extends AppPackError {
  constructor(message: string, context: Partial<ErrorContext> = {}, options?: { cause?: unknown }) {
    super(message, 'E5101', {
      category: 'RELOCATION',
      severity: 'HIGH',
      fatal: true,
      stage: 'relocating',
      ...context,
    }, options);
    this.name = 'RelocationError';
  }
}

/**
 * Teardown or cleanup failure. Recorded and logged, never thrown out of a run.
 */
export class CleanupWarning extends AppPackError {
  constructor(message: string, context: Partial<ErrorContext> = {}, options?: { cause?: unknown }) {
    super(message, 'E6001', {
      category: 'CLEANUP',
      severity: 'LOW',
      ...context,
      fatal: false,
    }, options);
    this.name = 'CleanupWarning';
  }
}

export function isFatalError(error: unknown): boolean {
  if (error instanceof AppPackError) {
    return error.context.fatal;
  }
  return true;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): AppPackError {
  if (error instanceof AppPackError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppPackError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      fatal: true,
      originalError: error.name,
      ...context,
    }, { cause: error });
  }

  return new AppPackError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    fatal: true,
    ...context,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
