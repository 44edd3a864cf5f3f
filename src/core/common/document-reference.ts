// src/core/common/document-reference.ts
import { DocumentReferenceError } from './errors';
import { DocumentFormat, DocumentReference } from './interfaces/models';

const URI_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/([^/]+)\/(.+)$/;

/** Format is decided by the trailing extension alone, never by content. */
export function inferDocumentFormat(objectPath: string): DocumentFormat {
    return objectPath.toLowerCase().endsWith('.pdf') ? 'pdf' : 'image';
}

/**
 * Parses a `scheme://container/path` locator.
 * @throws {DocumentReferenceError} when any of the three parts is missing.
 */
export function parseDocumentReference(uri: unknown): DocumentReference {
    if (typeof uri !== 'string' || uri.trim().length === 0) {
        throw new DocumentReferenceError('Document reference must be a non-empty string.');
    }
    const trimmed = uri.trim();
    const match = URI_PATTERN.exec(trimmed);
    if (!match) {
        throw new DocumentReferenceError(`Malformed document reference "${trimmed}". Expected scheme://container/path.`);
    }
    const [, scheme, container, objectPath] = match;
    if (objectPath.endsWith('/')) {
        throw new DocumentReferenceError(`Document reference "${trimmed}" points to a folder, not a document.`);
    }
    return Object.freeze({
        uri: trimmed,
        scheme: scheme.toLowerCase(),
        container,
        path: objectPath,
        format: inferDocumentFormat(objectPath),
    });
}

export function formatDocumentUri(scheme: string, container: string, objectPath: string): string {
    return `${scheme}://${container}/${objectPath.replace(/^\/+/, '')}`;
}
