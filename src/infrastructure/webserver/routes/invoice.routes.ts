// src/infrastructure/webserver/routes/invoice.routes.ts
import { RequestHandler, Router } from 'express';
import { InvoiceController } from '../controllers/invoice.controller';

export function createInvoiceRouter(controller: InvoiceController, uploadDocument: RequestHandler): Router {
    const router = Router();

    // POST /api/invoices/parse - Parse a document already in the blob store
    router.post('/parse', controller.handleParse);

    // POST /api/invoices/upload - Store an uploaded document, then parse it
    router.post('/upload', uploadDocument, controller.handleUpload);

    return router;
}
