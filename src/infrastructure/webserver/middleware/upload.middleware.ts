// src/infrastructure/webserver/middleware/upload.middleware.ts
import { Request, RequestHandler } from 'express';
import multer from 'multer';
import { StorageConfig } from '../../../config';
import { ValidationError } from '../../../core/common/errors';

const ALLOWED_MIME_PREFIXES = ['image/'];
const ALLOWED_MIMES = ['application/pdf'];

export function isAllowedDocumentType(mimetype: string): boolean {
    const lower = mimetype.toLowerCase();
    return ALLOWED_MIMES.includes(lower) || ALLOWED_MIME_PREFIXES.some(prefix => lower.startsWith(prefix));
}

const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
    if (isAllowedDocumentType(file.mimetype)) {
        cb(null, true);
    } else {
        cb(new ValidationError(`Invalid file type: ${file.mimetype}. Only PDF documents and images are accepted.`));
    }
};

/**
 * Accepts a single expense document in the multipart field "document", kept in memory.
 */
export function createDocumentUpload(storage: StorageConfig): RequestHandler {
    const upload = multer({
        storage: multer.memoryStorage(),
        fileFilter: fileFilter,
        limits: {
            fileSize: storage.maxUploadBytes,
            files: 1,
        },
    });
    return upload.single('document');
}
