// src/core/common/interfaces/collaborators/IRateService.ts

/** Exchange rates anchored at one currency. */
export interface RateTable {
    /** When the provider last refreshed the table */
    readonly asOf: string;
    /** Currency code -> units of that currency per one unit of the anchor */
    readonly rates: Readonly<Record<string, number>>;
}

export interface IRateService {
    /**
     * Fetches the latest rate table anchored at `baseCurrency`.
     * Implementations reject on network failure, timeout, non-2xx or malformed payloads.
     */
    latestRates(baseCurrency: string): Promise<RateTable>;
}

export const RATE_SERVICE_TOKEN = Symbol.for('IRateService');
