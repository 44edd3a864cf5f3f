// src/core/currency/currency-normalizer.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { AppConfig, CONFIG_TOKEN } from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { IRateService, RATE_SERVICE_TOKEN } from '../common/interfaces/collaborators';
import { describeError, roundToCents } from '../common/utils';
import { FxQuote, ICurrencyNormalizer, NormalizedAmount } from './interfaces/services';

const NO_QUOTE: FxQuote = Object.freeze({ rate: null, asOf: null });

@singleton()
@injectable()
export class CurrencyNormalizerService implements ICurrencyNormalizer {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(CONFIG_TOKEN) private config: AppConfig,
        @inject(RATE_SERVICE_TOKEN) private rateService: IRateService
    ) {
        this.logger.info(`CurrencyNormalizerService initialized (base currency: ${config.baseCurrency}).`);
    }

    async rateToBase(sourceCurrency: string): Promise<FxQuote> {
        const source = sourceCurrency.toUpperCase();
        const base = this.config.baseCurrency;
        if (source === base) {
            return { rate: 1, asOf: null };
        }

        try {
            const table = await this.rateService.latestRates(source);
            const rate = table.rates[base];
            if (typeof rate !== 'number' || !Number.isFinite(rate) || rate <= 0) {
                this.logger.warn(`Rate table for ${source} has no usable ${base} entry.`);
                return NO_QUOTE;
            }
            this.logger.debug(`Rate ${source}->${base}: ${rate} (as of ${table.asOf})`);
            return { rate, asOf: table.asOf };
        } catch (error) {
            this.logger.warn(`Rate lookup ${source}->${base} failed; normalization unavailable.`, describeError(error));
            return NO_QUOTE;
        }
    }

    async normalize(amount: number, sourceCurrency: string): Promise<NormalizedAmount> {
        const { rate, asOf } = await this.rateToBase(sourceCurrency);
        if (rate === null) {
            return { fxRate: null, fxRateDate: null, amountInBaseCurrency: null };
        }
        return {
            fxRate: rate,
            fxRateDate: asOf,
            amountInBaseCurrency: roundToCents(amount * rate),
        };
    }
}
