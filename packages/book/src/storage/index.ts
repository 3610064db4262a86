export * from './snapshot';
export * from './storage-port';
export * from './in-memory-storage';
