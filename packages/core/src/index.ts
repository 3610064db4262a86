/**
 * @fileoverview Shared building blocks for SalesBook
 *
 * Error taxonomy, validated value objects and the logger used by the other
 * packages.
 */

export * from './errors';
export * from './types/branded';
export * from './models';
export * from './utils/logger';
