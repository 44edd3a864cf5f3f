// src/infrastructure/webserver/server.ts
import cors from 'cors';
import express, { Application, NextFunction, Request, Response } from 'express';
import http from 'http';
import { AddressInfo } from 'net';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { AppConfig, CONFIG_TOKEN } from '../../config';
import { LOGGER_TOKEN } from '../logger';
import { InvoiceController } from './controllers/invoice.controller';
import { WorkflowController } from './controllers/workflow.controller';
import { errorHandler } from './middleware/error.middleware';
import { createDocumentUpload } from './middleware/upload.middleware';
import { createInvoiceRouter } from './routes/invoice.routes';
import { createWorkflowRouter } from './routes/workflow.routes';

@singleton()
@injectable()
export class Server {
    private app: Application;
    private httpServer?: http.Server;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(CONFIG_TOKEN) private config: AppConfig,
        @inject(InvoiceController) private invoiceController: InvoiceController,
        @inject(WorkflowController) private workflowController: WorkflowController
    ) {
        this.logger.info('Initializing Express server...');
        this.app = express();
        this.setupMiddleware();
        this.setupRoutes();
        this.setupErrorHandling();
        this.logger.info('Express server initialized.');
    }

    // --- Setup ---

    private setupMiddleware(): void {
        const origins = this.config.cors.origins;
        this.app.use(cors({
            origin: origins.includes('*') ? '*' : [...origins],
            methods: ['GET', 'POST', 'OPTIONS'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        }));
        this.app.use(express.json({ limit: '1mb' }));

        this.app.use((req: Request, res: Response, next: NextFunction) => {
            this.logger.http(`Request: ${req.method} ${req.originalUrl}`, { ip: req.ip });
            next();
        });

        this.logger.info('Standard middleware configured.');
    }

    private setupRoutes(): void {
        // --- Health Check ---
        this.app.get('/health', (req: Request, res: Response) => {
            res.status(200).json({ status: 'UP', timestamp: new Date().toISOString() });
        });

        // --- API Routes ---
        this.app.use('/api/invoices', createInvoiceRouter(this.invoiceController, createDocumentUpload(this.config.storage)));
        this.app.use('/api/workflows', createWorkflowRouter(this.workflowController));

        // --- Unmatched API Routes ---
        this.app.use('/api', (req: Request, res: Response) => {
            res.status(404).json({ message: `API route not found: ${req.method} ${req.originalUrl}` });
        });

        this.logger.info('API routes configured.');
    }

    private setupErrorHandling(): void {
        // Must be the last middleware added
        this.app.use(errorHandler);
        this.logger.info('Error handling middleware configured.');
    }

    // --- Lifecycle ---

    public start(port: number): Promise<void> {
         return new Promise((resolve, reject) => {
            this.httpServer = this.app.listen(port, () => {
                this.logger.info(`Server started and listening on http://localhost:${port}`);
                resolve();
            })
            .on('error', (error) => {
                this.logger.error('Failed to start server:', error);
                reject(error);
            });
        });
    }

    /** Bound address once started; port 0 asks the OS for a free one. */
    public address(): AddressInfo | null {
        const address = this.httpServer?.address();
        return address && typeof address === 'object' ? address : null;
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.httpServer) {
                this.logger.info('Attempting to gracefully stop the server...');
                this.httpServer.close((error) => {
                    if (error) {
                        this.logger.error('Error stopping server:', error);
                        return reject(error);
                    }
                    this.logger.info('Server stopped successfully.');
                    resolve();
                });
            } else {
                this.logger.warn('Server was not running.');
                resolve();
            }
        });
    }
}
