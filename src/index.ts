/** Library entry point. */
export * from './attribute/registry';
export * from './attribute/types';
export * from './clone/engine';
export * from './config/load';
export * from './config/parse';
export * from './config/schema';
export * from './errors';
export * from './exec/create';
export * from './exec/executive';
export * from './exec/files';
export * from './exec/host';
export * from './exec/platform';
export * from './exec/shell';
export * from './log/logger';
export * from './lov/random';
export * from './lov/registry';
export * from './util/tabulate';
export * from './util/text';
