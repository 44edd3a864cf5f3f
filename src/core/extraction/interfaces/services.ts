// src/core/extraction/interfaces/services.ts
import { DocumentReference, ExtractionResult } from '../../common/interfaces/models';

/** Reads the text layer of a PDF stored on local disk. */
export interface IPdfTextReader {
    /**
     * @param filePath - Path of the materialized PDF.
     * @returns One string per page, in page order.
     */
    readPages(filePath: string): Promise<string[]>;
}

/** Finds machine-readable codes (QR and similar) in a raster image on local disk. */
export interface ICodeScanner {
    /**
     * @param filePath - Path of the materialized image.
     * @returns Decoded payloads in the order the decoder found them; empty when none.
     */
    scan(filePath: string): Promise<string[]>;
}

export interface IExtractionService {
    /**
     * Fetches the document once and extracts its raw content.
     * @throws {ExtractionError} If the document cannot be fetched or decoded.
     */
    extract(reference: DocumentReference): Promise<ExtractionResult>;
}

export const PDF_TEXT_READER_TOKEN = Symbol.for('IPdfTextReader');
export const CODE_SCANNER_TOKEN = Symbol.for('ICodeScanner');
