// src/core/parsing/field-parser.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { AppConfig, CONFIG_TOKEN } from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { InvoiceFields } from '../common/interfaces/models';
import { CurrencyNormalizerService, ICurrencyNormalizer, NormalizedAmount } from '../currency';
import { IFieldParserService } from './interfaces/services';
import { scanInvoiceText } from './invoice-text.scanner';

const NOT_NORMALIZED: NormalizedAmount = { fxRate: null, fxRateDate: null, amountInBaseCurrency: null };

@singleton()
@injectable()
export class FieldParserService implements IFieldParserService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(CONFIG_TOKEN) private config: AppConfig,
        @inject(CurrencyNormalizerService) private normalizer: ICurrencyNormalizer
    ) {
        this.logger.info('FieldParserService initialized.');
    }

    async parse(rawText: string | null): Promise<InvoiceFields> {
        const scanned = scanInvoiceText(rawText, this.config.baseCurrency);
        this.logger.debug('Scanned invoice text', {
            invoiceNumber: scanned.invoiceNumber,
            totalAmount: scanned.totalAmount,
            currency: scanned.currency,
            vendorName: scanned.vendorName,
        });

        // --- Currency Normalization ---
        const normalized = scanned.totalAmount !== null && scanned.currency !== this.config.baseCurrency
            ? await this.normalizer.normalize(scanned.totalAmount, scanned.currency)
            : NOT_NORMALIZED;

        const fields: InvoiceFields = {
            invoiceNumber: scanned.invoiceNumber,
            invoiceDate: scanned.invoiceDate,
            vendorName: scanned.vendorName,
            totalAmount: scanned.totalAmount,
            currency: scanned.currency,
            fxRate: normalized.fxRate,
            fxRateDate: normalized.fxRateDate,
            amountInBaseCurrency: normalized.amountInBaseCurrency,
            rawText: scanned.rawText,
        };
        return Object.freeze(fields);
    }
}
