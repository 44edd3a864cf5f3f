// src/main.ts

import 'reflect-metadata';
import 'dotenv/config';
import config from './config';
import { registerDependencies } from './register';

registerDependencies();

import { container } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from './infrastructure/logger';
import { Server } from './infrastructure/webserver/server';

async function bootstrap() {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    try {
        logger.info(`Application starting in ${config.nodeEnv} mode...`);
        logger.info(`Using port: ${config.port}`);
        logger.info(`Base currency: ${config.baseCurrency}`);
        logger.info(`Workflow directory: ${config.workflows.directory}`);
        logger.info(`Upload target: ${config.storage.uploadScheme}://${config.storage.uploadBucket}`);
        logger.info(`FX endpoint: ${config.fx.baseUrl} (timeout ${config.fx.timeoutMs} ms, key ${config.fx.apiKey ? 'set' : 'missing'})`);

        const server = container.resolve(Server);
        await server.start(config.port);
        logger.info(`Server listening successfully on port ${config.port}`);
    } catch (error) {
        if (error instanceof Error) {
            logger.error('Failed to bootstrap application:', { message: error.message, stack: error.stack });
        } else {
            logger.error('Failed to bootstrap application with unknown error:', error);
        }
        process.exit(1);
    }
}

async function gracefulShutdown(signal: string) {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    const server = container.resolve(Server);

    logger.warn(`Received ${signal}. Initiating graceful shutdown...`);

    try {
        await server.stop();
        logger.info('Application shut down gracefully.');
        process.exit(0);
    } catch (error) {
        logger.error('Error during graceful shutdown:', error);
        process.exit(1);
    }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

void bootstrap();
