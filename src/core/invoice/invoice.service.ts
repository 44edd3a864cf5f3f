// src/core/invoice/invoice.service.ts
import path from 'path';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

// --- Infrastructure Imports ---
import { AppConfig, CONFIG_TOKEN } from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';

// --- Core Imports ---
import { formatDocumentUri, parseDocumentReference } from '../common/document-reference';
import {
    BLOB_STORE_TOKEN,
    IBlobStore,
    IWorkflowDefinitionSource,
    WORKFLOW_DEFINITION_SOURCE_TOKEN
} from '../common/interfaces/collaborators';
import {
    ExecutionContext,
    ParsedDocument,
    WorkflowDefinition,
    WorkflowTask
} from '../common/interfaces/models';
import { generateUniqueId } from '../common/utils';
import { ExtractionService, IExtractionService } from '../extraction';
import { FieldParserService, IFieldParserService } from '../parsing';
import { IWorkflowExecutor, WorkflowExecutorService } from '../workflow';
import { IInvoiceService, UploadedDocument } from './interfaces/services';

const EXTENSION_BY_CONTENT_TYPE: Readonly<Record<string, string>> = {
    'application/pdf': '.pdf',
    'image/png': '.png',
    'image/jpeg': '.jpg',
    'image/webp': '.webp',
    'image/gif': '.gif',
    'image/tiff': '.tiff',
};

/** Keeps the uploaded extension when it has one, since it decides the extraction path. */
export function uploadExtension(originalName: string, contentType: string): string {
    const fromName = path.extname(originalName).toLowerCase();
    if (fromName.length > 1) return fromName;
    return EXTENSION_BY_CONTENT_TYPE[contentType.toLowerCase()] ?? '';
}

@singleton()
@injectable()
export class InvoiceService implements IInvoiceService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(CONFIG_TOKEN) private config: AppConfig,
        @inject(BLOB_STORE_TOKEN) private blobStore: IBlobStore,
        @inject(WORKFLOW_DEFINITION_SOURCE_TOKEN) private workflowSource: IWorkflowDefinitionSource,
        @inject(ExtractionService) private extractor: IExtractionService,
        @inject(FieldParserService) private parser: IFieldParserService,
        @inject(WorkflowExecutorService) private executor: IWorkflowExecutor
    ) {
        this.logger.info('InvoiceService initialized.');
    }

    // --- Documents ---

    async extractAndParse(documentUri: string): Promise<ParsedDocument> {
        const reference = parseDocumentReference(documentUri);
        const extraction = await this.extractor.extract(reference);
        const invoice = await this.parser.parse(extraction.rawText);

        this.logger.info(`Parsed ${reference.uri}: invoice ${invoice.invoiceNumber ?? '(none)'}, total ${invoice.totalAmount ?? '(none)'} ${invoice.currency}`);
        return {
            document: reference,
            extraction: {
                decodedPayload: extraction.decodedPayload,
                itemCount: extraction.items.length,
                note: extraction.note,
                metadata: extraction.metadata,
            },
            invoice,
        };
    }

    async uploadAndParse(upload: UploadedDocument): Promise<ParsedDocument> {
        const { uploadScheme, uploadBucket } = this.config.storage;
        const objectPath = `uploads/${generateUniqueId()}${uploadExtension(upload.originalName, upload.contentType)}`;
        const target = formatDocumentUri(uploadScheme, uploadBucket, objectPath);

        this.logger.info(`Storing upload "${upload.originalName}" (${upload.bytes.length} bytes) at ${target}`);
        const storedUri = await this.blobStore.store(target, upload.bytes, upload.contentType);
        return this.extractAndParse(storedUri);
    }

    // --- Workflows ---

    async runWorkflow(workflowName: string, task: WorkflowTask): Promise<ExecutionContext> {
        const definition = await this.workflowSource.load(workflowName);
        return this.executor.execute(definition, task);
    }

    describeWorkflow(workflowName: string): Promise<WorkflowDefinition> {
        return this.workflowSource.load(workflowName);
    }
}
