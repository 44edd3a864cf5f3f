// src/infrastructure/webserver/middleware/error.middleware.ts
import { NextFunction, Request, Response } from 'express';
import { container } from 'tsyringe';
import { Logger } from 'winston';
import { ZodError } from 'zod';
import { AppConfig, CONFIG_TOKEN } from '../../../config';
import { AppError, ExecutionError } from '../../../core/common/errors';
import { LOGGER_TOKEN } from '../../logger';

export interface ErrorResponseBody {
    message: string;
    stepId?: string;
    error?: string;
    stack?: string;
}

/**
 * Express error handling middleware function.
 * Must be registered AFTER all other routes and middleware.
 */
export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction // required for Express to recognize the error handler signature
): void => {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    const config = container.resolve<AppConfig>(CONFIG_TOKEN);

    logger.error(`[ErrorHandler] ${err.name}: ${err.message}`, {
        error: {
            name: err.name,
            message: err.message,
            stack: err.stack,
            ...(err instanceof AppError && {
                statusCode: err.statusCode,
                isOperational: err.isOperational,
            }),
        },
        request: {
            method: req.method,
            url: req.originalUrl,
            ip: req.ip,
        },
    });

    let statusCode = 500;
    let message = 'An unexpected internal server error occurred.';

    if (err instanceof AppError && err.isOperational) {
        statusCode = err.statusCode;
        message = err.message;
    } else if (err instanceof ZodError) {
        statusCode = 400;
        message = `Invalid request: ${err.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')}`;
    } else if (err.name === 'MulterError') {
        statusCode = 400;
        message = `File upload error: ${err.message}`;
    } else if (err.name === 'SyntaxError' && 'body' in err) {
        // express.json() rejects malformed JSON with a SyntaxError carrying the raw body
        statusCode = 400;
        message = 'Request body is not valid JSON.';
    }

    const responseJson: ErrorResponseBody = { message };
    if (err instanceof ExecutionError) {
        responseJson.stepId = err.stepId;
    }

    // Error details only outside production
    if (config.nodeEnv !== 'production') {
        responseJson.error = err.message;
        responseJson.stack = err.stack;
    }

    if (res.headersSent) {
       logger.warn('[ErrorHandler] Headers already sent, cannot send error response.');
       return;
    }

    res.status(statusCode).json(responseJson);
};
