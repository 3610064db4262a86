export * from './types';
export * from './result';
export * from './messages';
export * from './context';
export { resolveIndex, monthlyCounts } from './support';
export { editPerson, nameMatchesAnyKeyword } from './contact';
export { executeCommand } from './execute';
