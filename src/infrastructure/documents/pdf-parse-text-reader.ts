// src/infrastructure/documents/pdf-parse-text-reader.ts
import { readFile } from 'fs/promises';
import pdf from 'pdf-parse';
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';

import { IPdfTextReader } from '../../core/extraction';
import { LOGGER_TOKEN } from '../logger';
import { isTextPage, joinTextItems, textItemsOf } from './pdf-text.utils';

interface PageCollector {
    readonly pages: string[];
    failure: unknown;
    render(pageData: unknown): string;
}

async function readPageText(pageData: unknown): Promise<string> {
    if (!isTextPage(pageData)) {
        throw new Error('Unexpected page object from the PDF reader');
    }
    const content = await pageData.getTextContent({ normalizeWhitespace: true, disableCombineTextItems: false });
    return joinTextItems(textItemsOf(content));
}

/**
 * pdf-parse renders pages one at a time and awaits whatever `pagerender` returns,
 * though its typings only admit a string. Page failures are turned into empty
 * text by pdf-parse, so the collector keeps the first one to rethrow.
 */
function createPageCollector(): PageCollector {
    const collector: PageCollector = { pages: [], failure: undefined, render };

    function render(pageData: unknown): string;
    function render(pageData: unknown): string | Promise<string> {
        return readPageText(pageData).then(
            text => {
                collector.pages.push(text);
                return text;
            },
            (error: unknown) => {
                if (collector.failure === undefined) {
                    collector.failure = error;
                }
                throw error;
            }
        );
    }

    return collector;
}

/**
 * Reads the text layer of each page with pdf-parse, in page order.
 */
@injectable()
export class PdfParseTextReader implements IPdfTextReader {

    constructor(@inject(LOGGER_TOKEN) private readonly logger: Logger) {}

    async readPages(filePath: string): Promise<string[]> {
        const data = await readFile(filePath);
        const collector = createPageCollector();

        const result = await pdf(data, { pagerender: collector.render });
        if (collector.failure !== undefined) {
            throw collector.failure;
        }

        this.logger.debug(`pdf-parse read ${collector.pages.length} of ${result.numpages} page(s) from ${filePath}`);
        return collector.pages;
    }
}
