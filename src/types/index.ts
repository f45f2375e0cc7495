/**
 * Shared type definitions
 */

export * from './page-driver.js';
export * from './session.js';
export * from './workflow.js';
export * from './content-load.js';
export * from './progress.js';
export * from './errors.js';
