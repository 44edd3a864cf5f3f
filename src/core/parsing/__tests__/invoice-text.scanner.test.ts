import { detectVendor, parseDecimalToken, scanInvoiceText } from '../invoice-text.scanner';
import { UNKNOWN_VENDOR } from '../invoice-vocabulary';

describe('scanInvoiceText', () => {
    it('returns the defaults for missing text', () => {
        expect(scanInvoiceText(null, 'TWD')).toEqual({
            invoiceNumber: null,
            invoiceDate: null,
            vendorName: UNKNOWN_VENDOR,
            totalAmount: null,
            currency: 'TWD',
            rawText: null,
        });
    });

    it('reads labelled values after the last colon', () => {
        const text = [
            'Invoice #: INV-1',
            'Invoice Date: 2024-03-15',
        ].join('\n');

        const scanned = scanInvoiceText(text, 'TWD');

        expect(scanned.invoiceNumber).toBe('INV-1');
        expect(scanned.invoiceDate).toBe('2024-03-15');
    });

    it('recognizes the Chinese labels and the full-width colon', () => {
        const text = '發票號碼：AB-12345678\n發票日期：2024/02/01\n總計 NT$ 1,250';

        const scanned = scanInvoiceText(text, 'TWD');

        expect(scanned.invoiceNumber).toBe('AB-12345678');
        expect(scanned.invoiceDate).toBe('2024/02/01');
        expect(scanned.totalAmount).toBe(1250);
        expect(scanned.currency).toBe('TWD');
    });

    it('keeps the text after the last colon even when the value itself has one', () => {
        expect(scanInvoiceText('Invoice Date: 2024-01-15 10:30', 'TWD').invoiceDate).toBe('30');
    });

    it('ignores a label line with nothing after the colon', () => {
        const scanned = scanInvoiceText('Invoice No: A-7\nInvoice No:', 'TWD');
        expect(scanned.invoiceNumber).toBe('A-7');
    });

    it('detects a USD total and its amount', () => {
        const scanned = scanInvoiceText('Total: USD 49.99', 'TWD');

        expect(scanned.currency).toBe('USD');
        expect(scanned.totalAmount).toBe(49.99);
    });

    it('takes the right-most numeric token and strips thousands separators', () => {
        const scanned = scanInvoiceText('Total 3 items TWD 12,345.50', 'TWD');
        expect(scanned.totalAmount).toBe(12345.5);
    });

    it('prefers USD when a line carries both markers', () => {
        expect(scanInvoiceText('Total USD 10 TWD 315', 'TWD').currency).toBe('USD');
    });

    it('lets the last total line win for both currency and amount', () => {
        const text = ['Subtotal USD 40.00', 'Total TWD 1,300'].join('\n');

        const scanned = scanInvoiceText(text, 'TWD');

        expect(scanned.currency).toBe('TWD');
        expect(scanned.totalAmount).toBe(1300);
    });

    it('keeps an earlier amount when a later total line has no number', () => {
        const text = ['Total: USD 12.00', 'Total due upon receipt'].join('\n');

        const scanned = scanInvoiceText(text, 'TWD');

        expect(scanned.totalAmount).toBe(12);
        expect(scanned.currency).toBe('USD');
    });

    it('falls back to the base currency when no marker is found', () => {
        const scanned = scanInvoiceText('Total: 880', 'TWD');

        expect(scanned.currency).toBe('TWD');
        expect(scanned.totalAmount).toBe(880);
    });

    it('handles Windows line endings', () => {
        const scanned = scanInvoiceText('Invoice No: X-1\r\nTotal USD 5', 'TWD');

        expect(scanned.invoiceNumber).toBe('X-1');
        expect(scanned.totalAmount).toBe(5);
    });

    it('is idempotent', () => {
        const text = 'Starbucks Coffee\nInvoice #: S-9\nTotal: USD 7.25';
        expect(scanInvoiceText(text, 'TWD')).toEqual(scanInvoiceText(text, 'TWD'));
    });
});

describe('parseDecimalToken', () => {
    it.each([
        ['49.99', 49.99],
        ['1,234', 1234],
        ['-5', -5],
        ['.5', 0.5],
        ['10.', 10],
    ])('parses %s', (token, expected) => {
        expect(parseDecimalToken(token)).toBe(expected);
    });

    it.each([['USD'], ['$12'], ['1e3'], ['12abc'], [''], [',']])('rejects %s', (token) => {
        expect(parseDecimalToken(token)).toBeNull();
    });
});

describe('detectVendor', () => {
    it('matches known fragments case-insensitively', () => {
        expect(detectVendor('Receipt from UBER *TRIP')).toBe('Uber');
        expect(detectVendor('統一超商股份有限公司')).toBe('7-Eleven');
    });

    it('returns the sentinel when nothing matches', () => {
        expect(detectVendor('Corner Bakery')).toBe(UNKNOWN_VENDOR);
    });
});
