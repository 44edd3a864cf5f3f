// src/infrastructure/storage/gcs-blob-store.ts
import { Storage } from '@google-cloud/storage';
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';

import { parseDocumentReference } from '../../core/common/document-reference';
import { IBlobStore } from '../../core/common/interfaces/collaborators';
import { DocumentReference } from '../../core/common/interfaces/models';
import { LOGGER_TOKEN } from '../logger';

export const GCS_CLIENT_TOKEN = Symbol.for('GcsStorageClient');

/**
 * Blob store backed by Google Cloud Storage.
 * The locator's container is the bucket name; its scheme is not interpreted.
 */
@injectable()
export class GcsBlobStore implements IBlobStore {

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: Logger,
        @inject(GCS_CLIENT_TOKEN) private readonly storage: Storage
    ) {
        this.logger.info('GcsBlobStore initialized.');
    }

    async fetch(reference: DocumentReference): Promise<Buffer> {
        this.logger.debug(`Downloading gs://${reference.container}/${reference.path}`);
        const [contents] = await this.storage
            .bucket(reference.container)
            .file(reference.path)
            .download();
        return contents;
    }

    async store(uri: string, bytes: Buffer, contentType: string): Promise<string> {
        const reference = parseDocumentReference(uri);
        await this.storage
            .bucket(reference.container)
            .file(reference.path)
            .save(bytes, { contentType, resumable: false });
        this.logger.info(`Stored ${bytes.length} bytes at ${reference.uri}`);
        return reference.uri;
    }
}
