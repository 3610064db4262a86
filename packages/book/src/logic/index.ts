export * from './logic-manager';
