// src/core/workflow/interfaces/services.ts
import { ExecutionContext, WorkflowDefinition, WorkflowTask } from '../../common/interfaces/models';

/** Step id that runs extraction and field parsing on a document from the task. */
export const PARSE_INVOICE_INPUT_STEP = 'parse_invoice_input';

/** Task field read by the parse step when the step does not name one. */
export const DEFAULT_DOCUMENT_FIELD = 'document';

export interface IWorkflowExecutor {
    /**
     * Runs the definition's steps in order against a task.
     * Unrecognized step ids are recorded and skipped.
     * @throws {ExecutionError} On the first step that fails; no partial context is returned.
     */
    execute(definition: WorkflowDefinition, task: WorkflowTask): Promise<ExecutionContext>;
}
