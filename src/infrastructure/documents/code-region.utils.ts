// src/infrastructure/documents/code-region.utils.ts

export interface Point {
    readonly x: number;
    readonly y: number;
}

export interface PixelBox {
    readonly left: number;
    readonly top: number;
    readonly width: number;
    readonly height: number;
}

export interface LocatedCode {
    readonly payload: string;
    /** Position of the code in full-image coordinates */
    readonly box: PixelBox;
}

/**
 * Regions to decode, in order: the full frame, its halves, then its quadrants.
 * A decoder that gives up when several codes share a frame still finds each one
 * in a region that holds it alone.
 */
export function scanRegions(width: number, height: number): PixelBox[] {
    const halfWidth = Math.floor(width / 2);
    const halfHeight = Math.floor(height / 2);
    const candidates: PixelBox[] = [
        { left: 0, top: 0, width, height },
        // --- Halves ---
        { left: 0, top: 0, width: halfWidth, height },
        { left: halfWidth, top: 0, width: width - halfWidth, height },
        { left: 0, top: 0, width, height: halfHeight },
        { left: 0, top: halfHeight, width, height: height - halfHeight },
        // --- Quadrants ---
        { left: 0, top: 0, width: halfWidth, height: halfHeight },
        { left: halfWidth, top: 0, width: width - halfWidth, height: halfHeight },
        { left: 0, top: halfHeight, width: halfWidth, height: height - halfHeight },
        { left: halfWidth, top: halfHeight, width: width - halfWidth, height: height - halfHeight },
    ];
    return candidates.filter(box => box.width > 0 && box.height > 0);
}

/** Copies one region out of an RGBA buffer. */
export function cropRegion(pixels: Uint8ClampedArray, imageWidth: number, box: PixelBox): Uint8ClampedArray {
    const cropped = new Uint8ClampedArray(box.width * box.height * 4);
    for (let row = 0; row < box.height; row++) {
        const start = ((box.top + row) * imageWidth + box.left) * 4;
        cropped.set(pixels.subarray(start, start + box.width * 4), row * box.width * 4);
    }
    return cropped;
}

/** Bounding box of a code's corners, shifted from region to image coordinates. */
export function codeBounds(corners: readonly Point[], region: PixelBox): PixelBox {
    const xs = corners.map(point => point.x);
    const ys = corners.map(point => point.y);
    const left = Math.floor(Math.min(...xs));
    const top = Math.floor(Math.min(...ys));
    return {
        left: region.left + left,
        top: region.top + top,
        width: Math.ceil(Math.max(...xs)) - left,
        height: Math.ceil(Math.max(...ys)) - top,
    };
}

/**
 * Top to bottom, then left to right. Codes whose tops are within half a code
 * height of each other count as one row.
 */
export function inReadingOrder(codes: readonly LocatedCode[]): LocatedCode[] {
    return [...codes].sort((a, b) => {
        const rowTolerance = Math.max(a.box.height, b.box.height) / 2;
        if (Math.abs(a.box.top - b.box.top) > rowTolerance) {
            return a.box.top - b.box.top;
        }
        return a.box.left - b.box.left;
    });
}
