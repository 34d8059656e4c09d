/**
 * Build pipeline types shared between the orchestrator and its front ends
 */

/**
 * Stage of the packaging pipeline, in execution order
 */
export type BuildStage =
  | 'pending'
  | 'checking'
  | 'preparing'
  | 'installing'
  | 'cleaning'
  | 'packaging'
  | 'teardown'
  | 'archiving'
  | 'relocating'
  | 'finalizing'
  | 'complete'
  | 'failed';

export type BuildLogLevel = 'info' | 'warn' | 'error';

/**
 * Build log entry
 */
export interface BuildLog {
  stage: BuildStage;
  timestamp: Date;
  level: BuildLogLevel;
  message: string;
}

/**
 * Human-readable names used when reporting a failed step
 */
export const STAGE_LABELS: Record<BuildStage, string> = {
  pending: 'startup',
  checking: 'project check',
  preparing: 'environment setup',
  installing: 'dependency install',
  cleaning: 'artifact cleanup',
  packaging: 'packaging',
  teardown: 'environment teardown',
  archiving: 'archive',
  relocating: 'relocation',
  finalizing: 'final cleanup',
  complete: 'complete',
  failed: 'failed',
};
