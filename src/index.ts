/**
 * @module index
 * @description Main package entry point
 * @status COMPLETE
 * @dependencies all modules
 * @lastModified 2026-10-18
 */

// Type exports
export * from './types';

// Constants
export { DISPLAY_LIMITS, MCP_LIMITS, FIXED_MASKS } from './constants';

// Pipeline stages
export * from './normalizer';
export * from './recovery';
export * from './consensus';
export * from './merge';
export * from './noise';

// Pipeline
export * from './pipeline';
export * from './observability';

// Detectors
export * from './detectors';

// Masking and reports
export * from './masking';
export * from './output';
