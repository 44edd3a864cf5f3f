// src/core/workflow/workflow-executor.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { parseDocumentReference } from '../common/document-reference';
import { ExecutionError } from '../common/errors';
import {
    ExecutionContext,
    InvoiceFields,
    WorkflowDefinition,
    WorkflowStep,
    WorkflowTask
} from '../common/interfaces/models';
import { ExtractionService, IExtractionService } from '../extraction';
import { FieldParserService, IFieldParserService } from '../parsing';
import { DEFAULT_DOCUMENT_FIELD, IWorkflowExecutor, PARSE_INVOICE_INPUT_STEP } from './interfaces/services';

@singleton()
@injectable()
export class WorkflowExecutorService implements IWorkflowExecutor {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(ExtractionService) private extractor: IExtractionService,
        @inject(FieldParserService) private parser: IFieldParserService
    ) {
        this.logger.info('WorkflowExecutorService initialized.');
    }

    async execute(definition: WorkflowDefinition, task: WorkflowTask): Promise<ExecutionContext> {
        const context: ExecutionContext = {
            workflow: definition.name,
            task,
            steps: [],
            invoice: null,
        };
        this.logger.info(`Executing workflow "${definition.name}" with ${definition.steps.length} step(s).`);

        for (const step of definition.steps) {
            context.steps.push(step.id);

            // --- Dispatch by step id ---
            if (step.id !== PARSE_INVOICE_INPUT_STEP) {
                this.logger.debug(`Step "${step.id}" has no handler; skipping.`);
                continue;
            }

            try {
                const invoice = await this.parseInvoiceInput(step, task);
                if (invoice) {
                    // Repeated parse steps overwrite; only the last result is kept.
                    context.invoice = invoice;
                }
            } catch (error) {
                this.logger.error(`Workflow "${definition.name}" failed at step "${step.id}".`, {
                    message: error instanceof Error ? error.message : String(error),
                });
                throw new ExecutionError(step.id, error);
            }
        }

        this.logger.info(`Workflow "${definition.name}" finished. Steps: ${context.steps.join(', ') || '(none)'}`);
        return context;
    }

    // --- Step Handlers ---

    private async parseInvoiceInput(step: WorkflowStep, task: WorkflowTask): Promise<InvoiceFields | null> {
        const field = step.input ?? DEFAULT_DOCUMENT_FIELD;
        const locator = task[field];
        if (locator === undefined || locator === null) {
            this.logger.info(`Step "${step.id}": task has no "${field}" field; nothing to parse.`);
            return null;
        }

        const reference = parseDocumentReference(locator);
        const extraction = await this.extractor.extract(reference);
        return this.parser.parse(extraction.rawText);
    }
}
