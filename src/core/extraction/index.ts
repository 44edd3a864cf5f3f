// src/core/extraction/index.ts

export * from './extraction.service';
export * from './interfaces/services';
