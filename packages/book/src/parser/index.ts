export * from './cli-syntax';
export * from './types';
export * from './argument-multimap';
export * from './argument-tokenizer';
export * from './parser-util';
export * from './contact-parsers';
export * from './meeting-parsers';
export * from './reminder-parsers';
export * from './sale-parsers';
export * from './tag-parsers';
export * from './registry';
export * from './parse-command';
