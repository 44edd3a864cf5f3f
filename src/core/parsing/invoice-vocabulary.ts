// src/core/parsing/invoice-vocabulary.ts
// Lookup tables for the line scanner. Labels and fragments are matched
// case-insensitively; currency markers are compared against upper-cased tokens.

export const UNKNOWN_VENDOR = 'unknown vendor';

export const INVOICE_NUMBER_LABELS: readonly string[] = ['invoice #', 'invoice no', 'invoice number', '發票號碼'];

export const INVOICE_DATE_LABELS: readonly string[] = ['invoice date', '發票日期'];

export const TOTAL_LABELS: readonly string[] = ['total', '總計', '合計'];

/** Checked in order: a line carrying both a USD and a TWD marker is USD. */
export const CURRENCY_MARKERS: ReadonlyArray<{ readonly currency: string; readonly markers: readonly string[] }> = [
    { currency: 'USD', markers: ['USD', 'US$'] },
    { currency: 'TWD', markers: ['TWD', 'NTD', 'NT$', '元'] },
];

/** Fragment -> display name. The first fragment found in the text wins. */
export const KNOWN_VENDORS: ReadonlyArray<readonly [fragment: string, displayName: string]> = [
    ['amazon web services', 'Amazon Web Services'],
    ['google cloud', 'Google Cloud'],
    ['microsoft', 'Microsoft'],
    ['github', 'GitHub'],
    ['openai', 'OpenAI'],
    ['uber', 'Uber'],
    ['starbucks', 'Starbucks'],
    ['7-eleven', '7-Eleven'],
    ['統一超商', '7-Eleven'],
    ['familymart', 'FamilyMart'],
    ['全家便利商店', 'FamilyMart'],
    ['中華電信', 'Chunghwa Telecom'],
    ['台灣高鐵', 'Taiwan High Speed Rail'],
];
