export * from './state_box';
export * from './document_store';
export * from './state_codec';
export * from './task_catalog';
export * from './metadata_provider';
export * from './config';
export * from './utils';
export { createLogger, isLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
export { createDocumentStore, createStateBox } from './factories/state_box_factory';
