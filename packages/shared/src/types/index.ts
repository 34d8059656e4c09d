/**
 * Core types for apppack
 */

export * from './build.js';
