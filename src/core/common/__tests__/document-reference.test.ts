import { DocumentReferenceError } from '../errors';
import { formatDocumentUri, inferDocumentFormat, parseDocumentReference } from '../document-reference';

describe('parseDocumentReference', () => {
    it('splits scheme, container and path', () => {
        const reference = parseDocumentReference('gs://expense-bucket/2024/01/receipt.png');

        expect(reference).toEqual({
            uri: 'gs://expense-bucket/2024/01/receipt.png',
            scheme: 'gs',
            container: 'expense-bucket',
            path: '2024/01/receipt.png',
            format: 'image',
        });
    });

    it('infers pdf from the extension regardless of case', () => {
        expect(parseDocumentReference('store://bucket/INVOICE.PDF').format).toBe('pdf');
        expect(parseDocumentReference('store://bucket/invoice.pdf').format).toBe('pdf');
    });

    it('treats every other extension as an image', () => {
        expect(inferDocumentFormat('scan.jpeg')).toBe('image');
        expect(inferDocumentFormat('invoice.pdf.png')).toBe('image');
        expect(inferDocumentFormat('no-extension')).toBe('image');
    });

    it.each([
        ['bucket/invoice.pdf'],
        ['://bucket/invoice.pdf'],
        ['gs://bucket'],
        ['gs://bucket/'],
        ['gs:///invoice.pdf'],
        ['gs://bucket/folder/'],
    ])('rejects malformed locator %s', (uri) => {
        expect(() => parseDocumentReference(uri)).toThrow(DocumentReferenceError);
    });

    it('rejects non-string input', () => {
        expect(() => parseDocumentReference(42)).toThrow(DocumentReferenceError);
        expect(() => parseDocumentReference('   ')).toThrow('Document reference must be a non-empty string.');
    });
});

describe('formatDocumentUri', () => {
    it('drops leading slashes from the path', () => {
        expect(formatDocumentUri('gs', 'bucket', '/uploads/a.pdf')).toBe('gs://bucket/uploads/a.pdf');
    });
});
