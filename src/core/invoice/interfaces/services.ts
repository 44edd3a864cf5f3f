// src/core/invoice/interfaces/services.ts
import { ExecutionContext, ParsedDocument, WorkflowDefinition, WorkflowTask } from '../../common/interfaces/models';

/** A document received through the upload endpoint */
export interface UploadedDocument {
    readonly originalName: string;
    readonly contentType: string;
    readonly bytes: Buffer;
}

export interface IInvoiceService {
    /**
     * Extracts and parses a single stored document, bypassing any workflow.
     * @throws {DocumentReferenceError} If the locator is malformed.
     * @throws {ExtractionError} If the document cannot be fetched or decoded.
     */
    extractAndParse(documentUri: string): Promise<ParsedDocument>;

    /** Stores an uploaded document in the blob store, then extracts and parses it. */
    uploadAndParse(upload: UploadedDocument): Promise<ParsedDocument>;

    /**
     * @throws {WorkflowDefinitionNotFoundError} If the workflow does not exist.
     * @throws {ExecutionError} If a step fails.
     */
    runWorkflow(workflowName: string, task: WorkflowTask): Promise<ExecutionContext>;

    describeWorkflow(workflowName: string): Promise<WorkflowDefinition>;
}
