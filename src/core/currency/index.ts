// src/core/currency/index.ts

export * from './currency-normalizer.service';
export * from './interfaces/services';
