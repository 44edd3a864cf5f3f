// src/core/extraction/extraction.service.ts
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ExtractionError } from '../common/errors';
import { BLOB_STORE_TOKEN, IBlobStore } from '../common/interfaces/collaborators';
import { DocumentReference, ExtractionResult } from '../common/interfaces/models';
import {
    CODE_SCANNER_TOKEN,
    ICodeScanner,
    IExtractionService,
    IPdfTextReader,
    PDF_TEXT_READER_TOKEN
} from './interfaces/services';

export const PDF_DOWNSTREAM_NOTE = 'Field parsing is performed downstream from the extracted text.';

const TEMP_DIR_PREFIX = 'expense-doc-';

@singleton()
@injectable()
export class ExtractionService implements IExtractionService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(BLOB_STORE_TOKEN) private blobStore: IBlobStore,
        @inject(PDF_TEXT_READER_TOKEN) private pdfReader: IPdfTextReader,
        @inject(CODE_SCANNER_TOKEN) private codeScanner: ICodeScanner
    ) {
        this.logger.info('ExtractionService initialized.');
    }

    async extract(reference: DocumentReference): Promise<ExtractionResult> {
        this.logger.info(`Extracting ${reference.format} document ${reference.uri}`);

        let bytes: Buffer;
        try {
            bytes = await this.blobStore.fetch(reference);
        } catch (error) {
            throw new ExtractionError(`Unable to fetch document ${reference.uri}`, error);
        }
        this.logger.debug(`Fetched ${bytes.length} bytes for ${reference.uri}`);

        // --- Staging ---
        // Decoders work from disk; the copy lives only for this call.
        let workDir: string;
        try {
            workDir = await mkdtemp(path.join(os.tmpdir(), TEMP_DIR_PREFIX));
        } catch (error) {
            throw new ExtractionError(`Unable to stage document ${reference.uri}`, error);
        }
        try {
            const localPath = path.join(workDir, `document${path.extname(reference.path).toLowerCase()}`);
            try {
                await writeFile(localPath, bytes);
            } catch (error) {
                throw new ExtractionError(`Unable to stage document ${reference.uri}`, error);
            }

            // --- Decoding ---
            return reference.format === 'pdf'
                ? await this.extractPdf(reference, localPath)
                : await this.extractImage(reference, localPath);
        } finally {
            await rm(workDir, { recursive: true, force: true });
            this.logger.debug(`Released temporary storage ${workDir}`);
        }
    }

    // --- Format handlers ---

    private async extractPdf(reference: DocumentReference, localPath: string): Promise<ExtractionResult> {
        let pages: string[];
        try {
            pages = await this.pdfReader.readPages(localPath);
        } catch (error) {
            throw new ExtractionError(`Unable to read PDF ${reference.uri}`, error);
        }
        this.logger.info(`Read ${pages.length} page(s) from ${reference.uri}`);

        const result: ExtractionResult = {
            rawText: pages.join('\n'),
            decodedPayload: null,
            items: [],
            source: reference,
            note: PDF_DOWNSTREAM_NOTE,
            metadata: { format: 'pdf', pageCount: pages.length },
        };
        return Object.freeze(result);
    }

    private async extractImage(reference: DocumentReference, localPath: string): Promise<ExtractionResult> {
        let payloads: string[];
        try {
            payloads = await this.codeScanner.scan(localPath);
        } catch (error) {
            throw new ExtractionError(`Unable to decode image ${reference.uri}`, error);
        }

        if (payloads.length === 0) {
            this.logger.info(`No machine-readable code found in ${reference.uri}`);
            const empty: ExtractionResult = {
                rawText: null,
                decodedPayload: null,
                items: [],
                source: reference,
                metadata: { format: 'image', codeCount: 0, payloads: [] },
            };
            return Object.freeze(empty);
        }

        if (payloads.length > 1) {
            this.logger.debug(`Found ${payloads.length} codes in ${reference.uri}; using the first one decoded.`);
        }
        const [first] = payloads;
        const result: ExtractionResult = {
            rawText: first,
            decodedPayload: first,
            items: [],
            source: reference,
            metadata: { format: 'image', codeCount: payloads.length, payloads: [...payloads] },
        };
        return Object.freeze(result);
    }
}
