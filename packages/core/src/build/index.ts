/**
 * Build pipeline exports
 */

export { BuildOrchestrator } from './build-orchestrator.js';
export type { BuildOrchestratorDeps } from './build-orchestrator.js';
export { DependencyEnvironment } from './dependency-environment.js';
export type { DependencyEnvironmentOptions } from './dependency-environment.js';
export { Packager } from './packager.js';
export type { PackagerOptions } from './packager.js';
export { runCommand, commandDiagnostics } from './command-runner.js';
export { loadBuildDescriptor, parseBuildDescriptor, resolveBundleName } from './build-descriptor.js';
export { createArchive } from './archiver.js';
export { assertWritableDirectory, relocateArtifacts } from './relocator.js';
export * from './types.js';
