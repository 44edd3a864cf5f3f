// src/core/parsing/invoice-text.scanner.ts
import {
    CURRENCY_MARKERS,
    INVOICE_DATE_LABELS,
    INVOICE_NUMBER_LABELS,
    KNOWN_VENDORS,
    TOTAL_LABELS,
    UNKNOWN_VENDOR
} from './invoice-vocabulary';

/** Fields recognized from text alone, before any currency normalization. */
export interface ScannedInvoiceText {
    readonly invoiceNumber: string | null;
    readonly invoiceDate: string | null;
    readonly vendorName: string;
    readonly totalAmount: number | null;
    readonly currency: string;
    readonly rawText: string | null;
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** Parses a token as a decimal after dropping thousands separators; null when it is not one. */
export function parseDecimalToken(token: string): number | null {
    const cleaned = token.replace(/,/g, '');
    if (!DECIMAL_PATTERN.test(cleaned)) return null;
    return Number(cleaned);
}

function containsLabel(lowerLine: string, labels: readonly string[]): boolean {
    return labels.some(label => lowerLine.includes(label));
}

/** Everything after the last colon (ASCII or full-width), or the whole line without one. */
function labelledValue(line: string): string | null {
    const separatorIndex = Math.max(line.lastIndexOf(':'), line.lastIndexOf('：'));
    const value = (separatorIndex >= 0 ? line.slice(separatorIndex + 1) : line).trim();
    return value.length > 0 ? value : null;
}

function detectCurrency(tokens: readonly string[]): string | null {
    const upperTokens = new Set(tokens.map(token => token.toUpperCase()));
    const entry = CURRENCY_MARKERS.find(({ markers }) => markers.some(marker => upperTokens.has(marker)));
    return entry ? entry.currency : null;
}

function detectAmount(tokens: readonly string[]): number | null {
    for (let i = tokens.length - 1; i >= 0; i--) {
        const amount = parseDecimalToken(tokens[i]);
        if (amount !== null) return amount;
    }
    return null;
}

export function detectVendor(text: string): string {
    const lowerText = text.toLowerCase();
    const match = KNOWN_VENDORS.find(([fragment]) => lowerText.includes(fragment.toLowerCase()));
    return match ? match[1] : UNKNOWN_VENDOR;
}

/**
 * Line-oriented scan for the invoice vocabulary.
 * Total of the input domain: never throws, and missing input yields the defaults.
 * When several lines match the same pattern the last one wins.
 */
export function scanInvoiceText(rawText: string | null, baseCurrency: string): ScannedInvoiceText {
    let invoiceNumber: string | null = null;
    let invoiceDate: string | null = null;
    let totalAmount: number | null = null;
    let currency: string | null = null;

    const lines = rawText ? rawText.split(/\r\n|\r|\n/) : [];
    for (const line of lines) {
        const lowerLine = line.toLowerCase();

        if (containsLabel(lowerLine, INVOICE_NUMBER_LABELS)) {
            invoiceNumber = labelledValue(line) ?? invoiceNumber;
        }
        if (containsLabel(lowerLine, INVOICE_DATE_LABELS)) {
            invoiceDate = labelledValue(line) ?? invoiceDate;
        }
        if (containsLabel(lowerLine, TOTAL_LABELS)) {
            const tokens = line.split(/\s+/).filter(token => token.length > 0);
            currency = detectCurrency(tokens) ?? currency;
            totalAmount = detectAmount(tokens) ?? totalAmount;
        }
    }

    return {
        invoiceNumber,
        invoiceDate,
        vendorName: rawText ? detectVendor(rawText) : UNKNOWN_VENDOR,
        totalAmount,
        currency: currency ?? baseCurrency,
        rawText,
    };
}
