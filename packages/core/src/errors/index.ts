/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { FieldkitRuntimeError, isUsageError, formatErrorLine, toErrorMessage } from './runtime-error.js';
export { ErrorScope, ErrorType } from './types.js';
export type { Issue, Severity } from './types.js';
export { formatZodIssues } from './zod-issues.js';
