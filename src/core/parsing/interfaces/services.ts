// src/core/parsing/interfaces/services.ts
import { InvoiceFields } from '../../common/interfaces/models';

/** Defines the contract for the Field Parser Service */
export interface IFieldParserService {
    /**
     * Recognizes invoice fields in extracted raw text and, for foreign-currency totals,
     * adds the base-currency equivalent.
     * Never rejects: unrecognizable input degrades to nulls and defaults.
     * @param rawText - Extracted text; null is treated as an empty document.
     */
    parse(rawText: string | null): Promise<InvoiceFields>;
}
