// src/core/common/errors.ts

/**
 * Base class for custom application errors.
 * Allows for operational errors (expected, like validation) vs programmer errors.
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(
        name: string,
        message: string,
        statusCode: number = 500,
        isOperational: boolean = true
        ) {
        super(message);
        this.name = name;
        this.statusCode = statusCode;
        this.isOperational = isOperational;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }

        // Set the prototype explicitly for extending built-in classes
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Error for issues during configuration loading or validation.
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        // Configuration errors prevent startup.
        super('ConfigurationError', message, 500, false);
    }
}

/**
 * Error for request payload validation failures.
 */
export class ValidationError extends AppError {
    constructor(message: string = 'Data validation failed') {
        super('ValidationError', message, 400, true);
    }
}

/**
 * A document locator that is not of the form `scheme://container/path`.
 */
export class DocumentReferenceError extends AppError {
    constructor(message: string) {
        super('DocumentReferenceError', message, 400, true);
    }
}

/**
 * The document could not be fetched or its bytes could not be decoded.
 */
export class ExtractionError extends AppError {
    public readonly cause?: unknown;

    constructor(message: string, originalError?: unknown) {
        const fullMessage = originalError instanceof Error
            ? `${message}: ${originalError.message}`
            : message;
        super('ExtractionError', fullMessage, 422, true);
        this.cause = originalError;
    }
}

/**
 * The exchange-rate provider could not supply a rate table.
 * Raised by rate clients only; the currency normalizer folds it into a null rate.
 */
export class RateLookupError extends AppError {
    constructor(message: string, originalError?: unknown) {
        const fullMessage = originalError instanceof Error
            ? `${message}: ${originalError.message}`
            : message;
        super('RateLookupError', fullMessage, 502, true);
    }
}

export class WorkflowDefinitionNotFoundError extends AppError {
    constructor(workflowName: string) {
        super('WorkflowDefinitionNotFoundError', `Workflow definition not found: ${workflowName}`, 404, true);
    }
}

/**
 * The workflow file exists but does not hold a usable definition.
 */
export class InvalidWorkflowDefinitionError extends AppError {
    constructor(workflowName: string, detail: string) {
        super('InvalidWorkflowDefinitionError', `Invalid workflow definition "${workflowName}": ${detail}`, 500, true);
    }
}

/**
 * Wraps a failure raised while running a workflow step.
 * The HTTP status follows the wrapped error when it is an AppError.
 */
export class ExecutionError extends AppError {
    public readonly stepId: string;
    public readonly cause: unknown;

    constructor(stepId: string, cause: unknown) {
        const causeMessage = cause instanceof Error ? cause.message : String(cause);
        const statusCode = cause instanceof AppError ? cause.statusCode : 500;
        super('ExecutionError', `Step "${stepId}" failed: ${causeMessage}`, statusCode, true);
        this.stepId = stepId;
        this.cause = cause;
    }
}
