/**
 * Utility exports barrel file.
 */
export * from './errors.js';
export * from './logger.js';
export * from './file-system.js';
export * from './yaml.js';
export * from './shell.js';
export * from './package-root.js';
