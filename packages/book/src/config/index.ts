export * from './defaults';
export * from './validator';
export * from './env';
