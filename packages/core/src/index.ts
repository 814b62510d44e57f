/**
 * @longflag/core
 *
 * Shared record types, the table reader contract and connector errors
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export * from './utils/index.js';
