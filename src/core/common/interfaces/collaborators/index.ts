// src/core/common/interfaces/collaborators/index.ts
export * from './IBlobStore';
export * from './IRateService';
export * from './IWorkflowDefinitionSource';
