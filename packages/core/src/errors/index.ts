/**
 * @fileoverview Error handling for SalesBook
 *
 * Structured error codes grouped by category, and the error classes thrown by
 * value objects, parsers, commands and storage.
 */

export * from './codes';
export * from './addressbook-error';
