/**
 * SalesBook record store and command pipeline
 *
 * `LogicManager` is the entry point: it turns command text into a result,
 * keeps the live views the presentation layer renders, and saves a snapshot
 * after every successful command.
 */

export * from './model';
export * from './config';
export * from './commands';
export * from './parser';
export * from './storage';
export * from './logic';
