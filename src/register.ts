// src/register.ts

import { Storage } from '@google-cloud/storage';
import { container } from 'tsyringe';
import config, { CONFIG_TOKEN } from './config';

// --- Core Imports ---
import {
    BLOB_STORE_TOKEN,
    RATE_SERVICE_TOKEN,
    WORKFLOW_DEFINITION_SOURCE_TOKEN
} from './core/common/interfaces/collaborators';
import { CurrencyNormalizerService } from './core/currency';
import { CODE_SCANNER_TOKEN, ExtractionService, PDF_TEXT_READER_TOKEN } from './core/extraction';
import { InvoiceService } from './core/invoice';
import { FieldParserService } from './core/parsing';
import { WorkflowExecutorService } from './core/workflow';

// --- Infrastructure Imports ---
import { PdfParseTextReader } from './infrastructure/documents/pdf-parse-text-reader';
import { QrCodeScanner } from './infrastructure/documents/qr-code-scanner';
import loggerInstance, { LOGGER_TOKEN } from './infrastructure/logger';
import { ExchangeRateApiClient } from './infrastructure/rates/exchange-rate-api.client';
import { GCS_CLIENT_TOKEN, GcsBlobStore } from './infrastructure/storage/gcs-blob-store';
import { JsonWorkflowDefinitionSource } from './infrastructure/workflows/json-workflow-definition.source';
import { InvoiceController } from './infrastructure/webserver/controllers/invoice.controller';
import { WorkflowController } from './infrastructure/webserver/controllers/workflow.controller';


export function registerDependencies(): void {
    // --- Logger & Config (everything else depends on them) ---
    container.register(LOGGER_TOKEN, { useValue: loggerInstance });
    container.register(CONFIG_TOKEN, { useValue: config });

    // --- Collaborators ---
    container.register(GCS_CLIENT_TOKEN, { useValue: new Storage() });
    container.registerSingleton(BLOB_STORE_TOKEN, GcsBlobStore);
    container.registerSingleton(RATE_SERVICE_TOKEN, ExchangeRateApiClient);
    container.registerSingleton(WORKFLOW_DEFINITION_SOURCE_TOKEN, JsonWorkflowDefinitionSource);
    container.registerSingleton(PDF_TEXT_READER_TOKEN, PdfParseTextReader);
    container.registerSingleton(CODE_SCANNER_TOKEN, QrCodeScanner);

    // --- Core Services ---
    container.registerSingleton(ExtractionService);
    container.registerSingleton(CurrencyNormalizerService);
    container.registerSingleton(FieldParserService);
    container.registerSingleton(WorkflowExecutorService);
    container.registerSingleton(InvoiceService);

    // --- Controllers ---
    container.registerSingleton(InvoiceController);
    container.registerSingleton(WorkflowController);

    loggerInstance.info('Dependency registration complete.');
}
