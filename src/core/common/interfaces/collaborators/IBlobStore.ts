// src/core/common/interfaces/collaborators/IBlobStore.ts

import { DocumentReference } from '../models';

/**
 * Remote object storage holding expense documents.
 * Retries, if any, are the implementation's concern.
 */
export interface IBlobStore {
    /**
     * Downloads the full byte stream behind a document reference.
     * @throws {Error} If the object does not exist or cannot be read.
     */
    fetch(reference: DocumentReference): Promise<Buffer>;

    /**
     * Writes bytes to `scheme://container/path` and returns the locator of the stored object.
     */
    store(uri: string, bytes: Buffer, contentType: string): Promise<string>;
}

export const BLOB_STORE_TOKEN = Symbol.for('IBlobStore');
