/**
 * @module cli/commands
 * @description CLI command exports
 * @status COMPLETE
 * @dependencies commander
 * @lastModified 2026-10-18
 */

export { reconcileCommand } from './reconcile';
export { detectCommand } from './detect';
export { maskCommand } from './mask';
