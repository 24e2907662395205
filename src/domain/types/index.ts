/**
 * Domain Types - Unified exports
 */

export * from './result';
export * from './manifest';
export * from './profile';
