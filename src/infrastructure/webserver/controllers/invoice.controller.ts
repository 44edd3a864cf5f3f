// src/infrastructure/webserver/controllers/invoice.controller.ts
import { NextFunction, Request, Response } from 'express';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { ValidationError } from '../../../core/common/errors';
import { describeError } from '../../../core/common/utils';
import { IInvoiceService, InvoiceService } from '../../../core/invoice';
import { LOGGER_TOKEN } from '../../logger';
import { parseInvoiceRequestSchema } from '../schemas/requests';

@singleton()
@injectable()
export class InvoiceController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(InvoiceService) private invoiceService: IInvoiceService
    ) {
        this.logger.info('InvoiceController initialized.');
    }

    /**
     * POST /api/invoices/parse: extracts and parses one stored document.
     */
    public handleParse = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const { documentUri } = parseInvoiceRequestSchema.parse(req.body ?? {});
            this.logger.info(`Received request to parse ${documentUri}`);

            const result = await this.invoiceService.extractAndParse(documentUri);
            res.status(200).json(result);
        } catch (error) {
            this.logger.error('Error during handleParse:', describeError(error));
            next(error);
        }
    };

    /**
     * POST /api/invoices/upload: stores a multipart `document` upload, then parses it.
     */
    public handleUpload = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const file = req.file;
            if (!file) {
                throw new ValidationError('A document file (field "document") is required.');
            }
            this.logger.info(`Received upload ${file.originalname} (${(file.size / 1024).toFixed(2)} KB)`);

            const result = await this.invoiceService.uploadAndParse({
                originalName: file.originalname,
                contentType: file.mimetype,
                bytes: file.buffer,
            });
            res.status(201).json(result);
        } catch (error) {
            this.logger.error('Error during handleUpload:', describeError(error));
            next(error);
        }
    };
}
