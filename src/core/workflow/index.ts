// src/core/workflow/index.ts

export * from './workflow-executor.service';
export * from './interfaces/services';
