/**
 * Storage module - Run-scoped working directories
 */

export { withWorkspace } from './workspace.js';
