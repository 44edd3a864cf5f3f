// src/infrastructure/documents/pdf-text.utils.ts

/** The part of a page object handed to `pagerender` that the text reader touches. */
export interface TextPage {
    getTextContent(options: { normalizeWhitespace: boolean; disableCombineTextItems: boolean }): Promise<unknown>;
}

export function isTextPage(value: unknown): value is TextPage {
    return typeof value === 'object' && value !== null
        && 'getTextContent' in value && typeof value.getTextContent === 'function';
}

/** Items of a `getTextContent()` result; anything else yields none. */
export function textItemsOf(content: unknown): object[] {
    if (typeof content !== 'object' || content === null || !('items' in content) || !Array.isArray(content.items)) {
        return [];
    }
    return content.items.filter((item: unknown): item is object => typeof item === 'object' && item !== null);
}

function baselineOf(item: object): number | undefined {
    if (!('transform' in item) || !Array.isArray(item.transform)) return undefined;
    const y: unknown = item.transform[5];
    return typeof y === 'number' ? y : undefined;
}

/**
 * Joins the text items of one page. A new line starts where the baseline moves
 * or after an item flagged `hasEOL`; items without a string are skipped.
 */
export function joinTextItems(items: ReadonlyArray<object>): string {
    let text = '';
    let lastBaseline: number | undefined;
    for (const item of items) {
        if (!('str' in item) || typeof item.str !== 'string') continue;

        const baseline = baselineOf(item);
        if (lastBaseline !== undefined && baseline !== undefined && baseline !== lastBaseline) {
            text += '\n';
        }
        text += item.str;

        if ('hasEOL' in item && item.hasEOL === true) {
            text += '\n';
            lastBaseline = undefined;
        } else if (baseline !== undefined) {
            lastBaseline = baseline;
        }
    }
    return text
        .split('\n')
        .map(line => line.trimEnd())
        .join('\n')
        .replace(/\n+$/, '');
}
