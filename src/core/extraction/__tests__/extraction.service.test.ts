import { existsSync } from 'fs';
import fsPromises from 'fs/promises';
import path from 'path';

import { parseDocumentReference } from '../../common/document-reference';
import { ExtractionError } from '../../common/errors';
import {
    createSilentLogger,
    FormFeedPdfReader,
    InMemoryBlobStore,
    JsonListCodeScanner
} from '../../../test/fakes';
import { ExtractionService, PDF_DOWNSTREAM_NOTE } from '../extraction.service';

describe('ExtractionService', () => {
    let blobStore: InMemoryBlobStore;
    let pdfReader: FormFeedPdfReader;
    let codeScanner: JsonListCodeScanner;
    let service: ExtractionService;

    beforeEach(() => {
        blobStore = new InMemoryBlobStore();
        pdfReader = new FormFeedPdfReader();
        codeScanner = new JsonListCodeScanner();
        service = new ExtractionService(createSilentLogger(), blobStore, pdfReader, codeScanner);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('PDF documents', () => {
        it.each([
            ['no pages', '', '', 0],
            ['one page', 'Invoice #: A-1', 'Invoice #: A-1', 1],
            ['three pages', 'A\fB\fC', 'A\nB\nC', 3],
        ])('joins the page text of a document with %s', async (_label, content, expectedText, pageCount) => {
            blobStore.put('store://bucket/invoice.pdf', content);

            const result = await service.extract(parseDocumentReference('store://bucket/invoice.pdf'));

            expect(result.rawText).toBe(expectedText);
            expect(result.decodedPayload).toBeNull();
            expect(result.items).toEqual([]);
            expect(result.note).toBe(PDF_DOWNSTREAM_NOTE);
            expect(result.metadata).toEqual({ format: 'pdf', pageCount });
        });

        it('decides the path by extension regardless of case', async () => {
            blobStore.put('store://bucket/SCAN.PDF', 'Total: 10');

            const result = await service.extract(parseDocumentReference('store://bucket/SCAN.PDF'));

            expect(result.rawText).toBe('Total: 10');
            expect(pdfReader.paths).toHaveLength(1);
            expect(path.basename(pdfReader.paths[0])).toBe('document.pdf');
            expect(codeScanner.paths).toEqual([]);
        });

        it('wraps reader failures in an ExtractionError', async () => {
            blobStore.put('store://bucket/broken.pdf', '%CORRUPT');

            const failure = service.extract(parseDocumentReference('store://bucket/broken.pdf'));

            await expect(failure).rejects.toBeInstanceOf(ExtractionError);
            await expect(failure).rejects.toThrow('Unable to read PDF store://bucket/broken.pdf');
        });
    });

    describe('image documents', () => {
        it('returns empty text when no code is found', async () => {
            blobStore.put('store://bucket/receipt.png', '[]');

            const result = await service.extract(parseDocumentReference('store://bucket/receipt.png'));

            expect(result.rawText).toBeNull();
            expect(result.decodedPayload).toBeNull();
            expect(result.note).toBeUndefined();
            expect(result.metadata).toEqual({ format: 'image', codeCount: 0, payloads: [] });
        });

        it('uses the first decoded code as both text and payload', async () => {
            blobStore.put('store://bucket/receipt.jpg', JSON.stringify(['AB12345678:first', 'second']));

            const result = await service.extract(parseDocumentReference('store://bucket/receipt.jpg'));

            expect(result.rawText).toBe('AB12345678:first');
            expect(result.decodedPayload).toBe('AB12345678:first');
            expect(result.metadata).toEqual({
                format: 'image',
                codeCount: 2,
                payloads: ['AB12345678:first', 'second'],
            });
        });

        it('wraps scanner failures in an ExtractionError', async () => {
            blobStore.put('store://bucket/photo.png', '{"not":"a list"}');

            await expect(service.extract(parseDocumentReference('store://bucket/photo.png')))
                .rejects.toThrow('Unable to decode image store://bucket/photo.png');
        });
    });

    it('fails with an ExtractionError when the document cannot be fetched', async () => {
        const failure = service.extract(parseDocumentReference('store://bucket/missing.pdf'));

        await expect(failure).rejects.toBeInstanceOf(ExtractionError);
        await expect(failure).rejects.toThrow('Unable to fetch document store://bucket/missing.pdf');
        expect(pdfReader.paths).toEqual([]);
    });

    it('fetches the document exactly once', async () => {
        blobStore.put('store://bucket/invoice.pdf', 'Total: 1');

        await service.extract(parseDocumentReference('store://bucket/invoice.pdf'));

        expect(blobStore.fetchCount).toBe(1);
    });

    it('removes the local copy after success and after failure', async () => {
        blobStore.put('store://bucket/ok.pdf', 'Total: 1');
        blobStore.put('store://bucket/bad.pdf', '%CORRUPT');

        await service.extract(parseDocumentReference('store://bucket/ok.pdf'));
        await expect(service.extract(parseDocumentReference('store://bucket/bad.pdf'))).rejects.toThrow(ExtractionError);

        expect(pdfReader.paths).toHaveLength(2);
        for (const localPath of pdfReader.paths) {
            expect(existsSync(localPath)).toBe(false);
            expect(existsSync(path.dirname(localPath))).toBe(false);
        }
    });

    describe('local staging', () => {
        it('wraps a failure to create the working directory', async () => {
            blobStore.put('store://bucket/invoice.pdf', 'Total: 1');
            jest.spyOn(fsPromises, 'mkdtemp').mockRejectedValueOnce(new Error('ENOSPC: no space left on device'));

            const failure = service.extract(parseDocumentReference('store://bucket/invoice.pdf'));

            await expect(failure).rejects.toBeInstanceOf(ExtractionError);
            await expect(failure).rejects.toThrow(
                'Unable to stage document store://bucket/invoice.pdf: ENOSPC: no space left on device'
            );
            expect(pdfReader.paths).toEqual([]);
        });

        it('wraps a failure to write the local copy and still removes the directory', async () => {
            blobStore.put('store://bucket/invoice.pdf', 'Total: 1');
            const writeSpy = jest.spyOn(fsPromises, 'writeFile')
                .mockRejectedValueOnce(new Error('EACCES: permission denied'));

            const failure = service.extract(parseDocumentReference('store://bucket/invoice.pdf'));

            await expect(failure).rejects.toBeInstanceOf(ExtractionError);
            await expect(failure).rejects.toThrow(
                'Unable to stage document store://bucket/invoice.pdf: EACCES: permission denied'
            );
            expect(pdfReader.paths).toEqual([]);
            const [target] = writeSpy.mock.calls[0];
            expect(typeof target).toBe('string');
            expect(existsSync(path.dirname(String(target)))).toBe(false);
        });
    });
});
