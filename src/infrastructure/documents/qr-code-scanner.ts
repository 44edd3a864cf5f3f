// src/infrastructure/documents/qr-code-scanner.ts
import jsQR from 'jsqr';
import 'reflect-metadata';
import sharp from 'sharp';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';

import { ICodeScanner } from '../../core/extraction';
import { LOGGER_TOKEN } from '../logger';
import { codeBounds, cropRegion, inReadingOrder, LocatedCode, scanRegions } from './code-region.utils';

// Receipts rarely carry more than two codes (e.g. Taiwanese e-invoices).
const MAX_CODES_PER_IMAGE = 4;

/**
 * Decodes QR codes with jsQR on RGBA pixels produced by sharp.
 * jsQR reports at most one code per frame and none when several compete, so the
 * image is also decoded region by region. Payloads come back in reading order.
 */
@injectable()
export class QrCodeScanner implements ICodeScanner {

    constructor(@inject(LOGGER_TOKEN) private readonly logger: Logger) {}

    async scan(filePath: string): Promise<string[]> {
        const { data, info } = await sharp(filePath)
            .ensureAlpha()
            .raw()
            .toBuffer({ resolveWithObject: true });
        const pixels = new Uint8ClampedArray(data);

        const found: LocatedCode[] = [];
        for (const region of scanRegions(info.width, info.height)) {
            if (found.length >= MAX_CODES_PER_IMAGE) break;

            const code = jsQR(cropRegion(pixels, info.width, region), region.width, region.height, {
                inversionAttempts: 'attemptBoth',
            });
            if (!code || found.some(existing => existing.payload === code.data)) continue;

            const { topLeftCorner, topRightCorner, bottomLeftCorner, bottomRightCorner } = code.location;
            found.push({
                payload: code.data,
                box: codeBounds([topLeftCorner, topRightCorner, bottomLeftCorner, bottomRightCorner], region),
            });
        }

        this.logger.debug(`Found ${found.length} code(s) in ${info.width}x${info.height} image ${filePath}`);
        return inReadingOrder(found).map(code => code.payload);
    }
}
