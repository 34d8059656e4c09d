/**
 * @apppack/core
 * The build-and-package pipeline
 */

export * from './build/index.js';
