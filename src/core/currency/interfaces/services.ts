// src/core/currency/interfaces/services.ts

/** Rate from a source currency to the base currency; both null when unavailable. */
export interface FxQuote {
    readonly rate: number | null;
    readonly asOf: string | null;
}

/** Currency-normalization fields merged into InvoiceFields */
export interface NormalizedAmount {
    readonly fxRate: number | null;
    readonly fxRateDate: string | null;
    readonly amountInBaseCurrency: number | null;
}

export interface ICurrencyNormalizer {
    /**
     * Looks up the rate converting `sourceCurrency` into the base currency.
     * Never rejects; lookup failures resolve to `{ rate: null, asOf: null }`.
     */
    rateToBase(sourceCurrency: string): Promise<FxQuote>;

    /**
     * Converts an amount into the base currency, rounded to cents.
     * Never rejects; all three fields are null when no rate is available.
     */
    normalize(amount: number, sourceCurrency: string): Promise<NormalizedAmount>;
}
