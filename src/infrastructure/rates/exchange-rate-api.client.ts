// src/infrastructure/rates/exchange-rate-api.client.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';
import { z } from 'zod';

import { AppConfig, CONFIG_TOKEN } from '../../config';
import { RateLookupError } from '../../core/common/errors';
import { IRateService, RateTable } from '../../core/common/interfaces/collaborators';
import { LOGGER_TOKEN } from '../logger';

/** Body of `GET {baseUrl}/{apiKey}/latest/{base}` on success */
export const latestRatesResponseSchema = z.object({
    result: z.literal('success'),
    base_code: z.string(),
    time_last_update_utc: z.string(),
    conversion_rates: z.record(z.string(), z.number()),
});

/** Provider timestamps look like "Mon, 01 Jan 2024 00:00:01 +0000"; unparsable values pass through. */
export function toIsoDate(timestamp: string): string {
    const parsed = new Date(timestamp);
    return isNaN(parsed.getTime()) ? timestamp : parsed.toISOString().slice(0, 10);
}

/**
 * Rate service client for ExchangeRate-API style endpoints.
 * Single attempt, bounded by the configured timeout.
 */
@injectable()
export class ExchangeRateApiClient implements IRateService {

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: Logger,
        @inject(CONFIG_TOKEN) private readonly config: AppConfig
    ) {
        if (!config.fx.apiKey) {
            this.logger.warn('FX_API_KEY is not set; foreign-currency amounts will not be normalized.');
        }
    }

    async latestRates(baseCurrency: string): Promise<RateTable> {
        const { apiKey, baseUrl, timeoutMs } = this.config.fx;
        if (!apiKey) {
            throw new RateLookupError('Exchange-rate API key is not configured');
        }

        const url = `${baseUrl}/${encodeURIComponent(apiKey)}/latest/${encodeURIComponent(baseCurrency)}`;
        let response: Response;
        try {
            response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
        } catch (error) {
            throw new RateLookupError(`Exchange-rate request for ${baseCurrency} failed`, error);
        }

        if (!response.ok) {
            throw new RateLookupError(`Exchange-rate request for ${baseCurrency} returned HTTP ${response.status}`);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            throw new RateLookupError('Exchange-rate response is not valid JSON', error);
        }

        const parsed = latestRatesResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new RateLookupError(`Unexpected exchange-rate response: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
        }

        this.logger.debug(`Fetched ${Object.keys(parsed.data.conversion_rates).length} rates for ${parsed.data.base_code}`);
        return {
            asOf: toIsoDate(parsed.data.time_last_update_utc),
            rates: parsed.data.conversion_rates,
        };
    }
}
