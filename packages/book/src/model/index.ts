export * from './views';
export * from './record-list';
export * from './record-kinds';
export * from './person';
export * from './meeting';
export * from './reminder';
export * from './sale';
export * from './address-book';
export * from './record-store';
