// src/core/invoice/index.ts

export * from './invoice.service';
export * from './interfaces/services';
