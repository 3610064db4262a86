export * from './string-value';
export * from './person-fields';
export * from './text-fields';
export * from './tag-name';
export * from './unit-price';
export * from './quantity';
export * from './statistics';
export * from './date-time';
export * from './duration';
export * from './display-index';
