// src/core/parsing/index.ts

export * from './field-parser.service';
export * from './interfaces/services';
export * from './invoice-text.scanner';
export { UNKNOWN_VENDOR } from './invoice-vocabulary';
