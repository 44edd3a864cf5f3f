// src/core/common/interfaces/models.ts

export type DocumentFormat = 'pdf' | 'image';

/**
 * Locator of a document held in a remote blob store (`scheme://container/path`).
 */
export interface DocumentReference {
    /** The locator exactly as it was received */
    readonly uri: string;
    readonly scheme: string;
    /** Bucket or container name */
    readonly container: string;
    /** Object path inside the container, without a leading slash */
    readonly path: string;
    /** Inferred from the path's extension only */
    readonly format: DocumentFormat;
}

/** Itemization is not implemented; extraction always yields an empty list. */
export interface ExtractedLineItem {
    readonly description: string;
    readonly amount: number | null;
}

export type ExtractionMetadata =
    | { readonly format: 'pdf'; readonly pageCount: number }
    | { readonly format: 'image'; readonly codeCount: number; readonly payloads: readonly string[] };

/**
 * Output of the raw content extractor for a single document.
 */
export interface ExtractionResult {
    /** Text handed to the field parser (page text for PDFs, first code payload for images) */
    readonly rawText: string | null;
    /** First decoded code payload; only set for images */
    readonly decodedPayload: string | null;
    readonly items: readonly ExtractedLineItem[];
    readonly source: DocumentReference;
    readonly note?: string;
    readonly metadata: ExtractionMetadata;
}

/**
 * Structured invoice fields recognized in a document's raw text.
 */
export interface InvoiceFields {
    readonly invoiceNumber: string | null;
    readonly invoiceDate: string | null;
    /** Known vendor display name, or the "unknown vendor" sentinel */
    readonly vendorName: string;
    readonly totalAmount: number | null;
    /** Detected currency; the base currency when no marker was found */
    readonly currency: string;
    /** Units of base currency per one unit of `currency` */
    readonly fxRate: number | null;
    readonly fxRateDate: string | null;
    /** Set only when currency differs from the base, the amount is known and a rate was found */
    readonly amountInBaseCurrency: number | null;
    readonly rawText: string | null;
}

export interface WorkflowStep {
    readonly id: string;
    /** Task field holding the document locator for this step (defaults to "document") */
    readonly input?: string;
}

export interface WorkflowDefinition {
    readonly name: string;
    readonly steps: readonly WorkflowStep[];
}

/** Task payload passed to a workflow run; validated as a JSON object at the API boundary. */
export type WorkflowTask = Readonly<Record<string, unknown>>;

/**
 * State accumulated while a workflow runs. Built per run, never shared.
 */
export interface ExecutionContext {
    readonly workflow: string;
    readonly task: WorkflowTask;
    /** Every step id encountered, in order, whether or not it was actionable */
    readonly steps: string[];
    invoice: InvoiceFields | null;
}

/**
 * Response of the direct single-document entry point.
 */
export interface ParsedDocument {
    readonly document: DocumentReference;
    readonly extraction: {
        readonly decodedPayload: string | null;
        readonly itemCount: number;
        readonly note?: string;
        readonly metadata: ExtractionMetadata;
    };
    readonly invoice: InvoiceFields;
}
