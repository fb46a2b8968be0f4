/**
 * Playbook Error Infrastructure
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './PlaybookError.js';
export * from './ConfigurationError.js';
export * from './HttpErrors.js';
export * from './ExecutionErrors.js';
