// src/test/fakes.ts
// In-process stand-ins for the pipeline's collaborators.
import { readFile } from 'fs/promises';
import winston from 'winston';

import { AppConfig } from '../config';
import { WorkflowDefinitionNotFoundError } from '../core/common/errors';
import {
    IBlobStore,
    IRateService,
    IWorkflowDefinitionSource,
    RateTable
} from '../core/common/interfaces/collaborators';
import { DocumentReference, WorkflowDefinition } from '../core/common/interfaces/models';
import { CurrencyNormalizerService } from '../core/currency';
import { ExtractionService, ICodeScanner, IPdfTextReader } from '../core/extraction';
import { InvoiceService } from '../core/invoice';
import { FieldParserService } from '../core/parsing';
import { WorkflowExecutorService } from '../core/workflow';

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
    return {
        nodeEnv: 'test',
        port: 0,
        logLevel: 'error',
        baseCurrency: 'TWD',
        fx: { apiKey: 'test-key', baseUrl: 'https://rates.test/v6', timeoutMs: 5000 },
        storage: { uploadScheme: 'store', uploadBucket: 'uploads-bucket', maxUploadBytes: 1024 * 1024 },
        workflows: { directory: '/nonexistent' },
        cors: { origins: ['*'] },
        ...overrides,
    };
}

export function createSilentLogger(): winston.Logger {
    return winston.createLogger({ silent: true, transports: [new winston.transports.Console()] });
}

/** Blob store over a Map keyed by `scheme://container/path`. */
export class InMemoryBlobStore implements IBlobStore {
    readonly objects = new Map<string, { bytes: Buffer; contentType: string }>();
    fetchCount = 0;

    put(uri: string, content: string | Buffer, contentType = 'application/octet-stream'): this {
        this.objects.set(uri, { bytes: Buffer.isBuffer(content) ? content : Buffer.from(content, 'utf-8'), contentType });
        return this;
    }

    async fetch(reference: DocumentReference): Promise<Buffer> {
        this.fetchCount++;
        const object = this.objects.get(`${reference.scheme}://${reference.container}/${reference.path}`);
        if (!object) {
            throw new Error(`No such object: ${reference.uri}`);
        }
        return object.bytes;
    }

    async store(uri: string, bytes: Buffer, contentType: string): Promise<string> {
        this.objects.set(uri, { bytes, contentType });
        return uri;
    }
}

/** Treats the materialized file as UTF-8 text with pages separated by form feeds. */
export class FormFeedPdfReader implements IPdfTextReader {
    readonly paths: string[] = [];

    async readPages(filePath: string): Promise<string[]> {
        this.paths.push(filePath);
        const text = await readFile(filePath, 'utf-8');
        if (text.startsWith('%CORRUPT')) {
            throw new Error('Invalid PDF structure');
        }
        return text.length === 0 ? [] : text.split('\f');
    }
}

/** Treats the materialized file as a JSON array of code payloads in decode order. */
export class JsonListCodeScanner implements ICodeScanner {
    readonly paths: string[] = [];

    async scan(filePath: string): Promise<string[]> {
        this.paths.push(filePath);
        const parsed: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
        if (!Array.isArray(parsed)) {
            throw new Error('Unsupported image data');
        }
        return parsed.filter((payload): payload is string => typeof payload === 'string');
    }
}

/** Rate service answering from a fixed table, or failing on demand. */
export class StubRateService implements IRateService {
    readonly requests: string[] = [];
    failure: Error | null = null;

    constructor(private table: RateTable | null = null) {}

    async latestRates(baseCurrency: string): Promise<RateTable> {
        this.requests.push(baseCurrency);
        if (this.failure) throw this.failure;
        if (!this.table) throw new Error('No rate table configured');
        return this.table;
    }
}

export class InMemoryWorkflowSource implements IWorkflowDefinitionSource {
    private readonly definitions = new Map<string, WorkflowDefinition>();

    constructor(definitions: readonly WorkflowDefinition[] = []) {
        definitions.forEach(definition => this.definitions.set(definition.name, definition));
    }

    async load(name: string): Promise<WorkflowDefinition> {
        const definition = this.definitions.get(name);
        if (!definition) {
            throw new WorkflowDefinitionNotFoundError(name);
        }
        return definition;
    }
}

export interface TestPipeline {
    readonly config: AppConfig;
    readonly blobStore: InMemoryBlobStore;
    readonly rates: StubRateService;
    readonly service: InvoiceService;
}

/** Wires the real core services over the in-memory collaborators. */
export function createTestPipeline(
    rateTable: RateTable | null = { asOf: '2024-01-01', rates: { TWD: 32 } },
    workflows: readonly WorkflowDefinition[] = [],
    config: AppConfig = createTestConfig()
): TestPipeline {
    const logger = createSilentLogger();
    const blobStore = new InMemoryBlobStore();
    const rates = new StubRateService(rateTable);
    const extractor = new ExtractionService(logger, blobStore, new FormFeedPdfReader(), new JsonListCodeScanner());
    const parser = new FieldParserService(logger, config, new CurrencyNormalizerService(logger, config, rates));
    const service = new InvoiceService(
        logger,
        config,
        blobStore,
        new InMemoryWorkflowSource(workflows),
        extractor,
        parser,
        new WorkflowExecutorService(logger, extractor, parser)
    );
    return { config, blobStore, rates, service };
}
