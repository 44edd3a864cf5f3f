// src/infrastructure/webserver/controllers/workflow.controller.ts
import { NextFunction, Request, Response } from 'express';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { describeError } from '../../../core/common/utils';
import { IInvoiceService, InvoiceService } from '../../../core/invoice';
import { LOGGER_TOKEN } from '../../logger';
import { runWorkflowRequestSchema } from '../schemas/requests';

@singleton()
@injectable()
export class WorkflowController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(InvoiceService) private invoiceService: IInvoiceService
    ) {
        this.logger.info('WorkflowController initialized.');
    }

    /**
     * GET /api/workflows/:name: lists the step ids of a workflow.
     */
    public handleDescribe = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const definition = await this.invoiceService.describeWorkflow(req.params.name);
            res.status(200).json({
                workflow: definition.name,
                steps: definition.steps.map(step => step.id),
            });
        } catch (error) {
            this.logger.error('Error during handleDescribe:', describeError(error));
            next(error);
        }
    };

    /**
     * POST /api/workflows/run: runs a named workflow against a task payload.
     */
    public handleRun = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const { workflow, task } = runWorkflowRequestSchema.parse(req.body ?? {});
            this.logger.info(`Received request to run workflow "${workflow}"`);

            const context = await this.invoiceService.runWorkflow(workflow, task);
            res.status(200).json({
                workflow: context.workflow,
                steps: context.steps,
                task: context.task,
                invoice: context.invoice,
            });
        } catch (error) {
            this.logger.error('Error during handleRun:', describeError(error));
            next(error);
        }
    };
}
