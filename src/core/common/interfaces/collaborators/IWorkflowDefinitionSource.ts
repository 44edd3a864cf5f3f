// src/core/common/interfaces/collaborators/IWorkflowDefinitionSource.ts

import { WorkflowDefinition } from '../models';

export interface IWorkflowDefinitionSource {
    /**
     * @throws {WorkflowDefinitionNotFoundError} If no definition has this name.
     * @throws {InvalidWorkflowDefinitionError} If the stored definition cannot be read.
     */
    load(name: string): Promise<WorkflowDefinition>;
}

export const WORKFLOW_DEFINITION_SOURCE_TOKEN = Symbol.for('IWorkflowDefinitionSource');
