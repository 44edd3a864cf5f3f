// src/core/common/utils.ts

import { v4 as uuidv4 } from 'uuid';

/**
 * Generates a unique Version 4 UUID.
 */
export function generateUniqueId(): string {
    return uuidv4();
}

/** Rounds to two decimal places (half away from zero). */
export function roundToCents(value: number): number {
    const sign = value < 0 ? -1 : 1;
    return sign * Math.round(Math.abs(value) * 100 + Number.EPSILON) / 100;
}

export function describeError(error: unknown): { message: string; stack?: string } {
    if (error instanceof Error) {
        return { message: error.message, stack: error.stack };
    }
    return { message: String(error) };
}
