// src/config/index.ts
import 'reflect-metadata';
import path from 'path';
import { ConfigurationError } from '../core/common/errors';

// --- Interfaces ---

const NODE_ENVS = ['development', 'production', 'test'] as const;
const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type NodeEnv = typeof NODE_ENVS[number];
export type LogLevel = typeof LOG_LEVELS[number];

// Exchange-rate provider settings
export interface FxConfig {
    readonly apiKey?: string;
    readonly baseUrl: string;
    readonly timeoutMs: number;
}

// Where uploaded documents are written before extraction
export interface StorageConfig {
    readonly uploadScheme: string;
    readonly uploadBucket: string;
    readonly maxUploadBytes: number;
}

export interface AppConfig {
    readonly nodeEnv: NodeEnv;
    readonly port: number;
    readonly logLevel: LogLevel;
    /** ISO 4217 code every foreign amount is normalized to */
    readonly baseCurrency: string;
    readonly fx: FxConfig;
    readonly storage: StorageConfig;
    readonly workflows: {
        readonly directory: string;
    };
    readonly cors: {
        readonly origins: readonly string[];
    };
}

export const CONFIG_TOKEN = Symbol.for('AppConfig');

// --- Helper Functions ---
function parseIntEnv(env: NodeJS.ProcessEnv, varName: string, defaultValue?: number): number {
    const valueStr = env[varName];
    if (valueStr) {
        const valueInt = parseInt(valueStr, 10);
        if (!isNaN(valueInt)) {
            return valueInt;
        }
        throw new ConfigurationError(`Invalid integer format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

function parseEnumEnv<T extends string>(
    env: NodeJS.ProcessEnv,
    varName: string,
    allowed: readonly T[],
    defaultValue: T
): T {
    const valueStr = env[varName];
    if (!valueStr) return defaultValue;
    const match = allowed.find(candidate => candidate === valueStr);
    if (!match) {
        throw new ConfigurationError(`Invalid value for environment variable ${varName}: ${valueStr}. Expected one of: ${allowed.join(', ')}`);
    }
    return match;
}

function parseListEnv(env: NodeJS.ProcessEnv, varName: string, defaultValue: string[]): string[] {
    const valueStr = env[varName];
    if (!valueStr) return defaultValue;
    return valueStr.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

// --- Load, Validate, and Freeze Configuration ---
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const baseCurrency = (env.BASE_CURRENCY || 'TWD').trim().toUpperCase();
    if (!/^[A-Z]{3}$/.test(baseCurrency)) {
        throw new ConfigurationError(`BASE_CURRENCY must be a three-letter currency code, got: ${baseCurrency}`);
    }

    const timeoutMs = parseIntEnv(env, 'FX_TIMEOUT_MS', 5000);
    if (timeoutMs <= 0) {
        throw new ConfigurationError(`FX_TIMEOUT_MS must be positive, got: ${timeoutMs}`);
    }

    const config: AppConfig = {
        nodeEnv: parseEnumEnv(env, 'NODE_ENV', NODE_ENVS, 'development'),
        port: parseIntEnv(env, 'APP_PORT', 8080),
        logLevel: parseEnumEnv(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
        baseCurrency,
        fx: Object.freeze({
            apiKey: env.FX_API_KEY || undefined,
            baseUrl: (env.FX_API_BASE_URL || 'https://v6.exchangerate-api.com/v6').replace(/\/+$/, ''),
            timeoutMs,
        }),
        storage: Object.freeze({
            uploadScheme: env.UPLOAD_SCHEME || 'gs',
            uploadBucket: env.UPLOAD_BUCKET || 'expense-documents',
            maxUploadBytes: parseIntEnv(env, 'UPLOAD_MAX_BYTES', 20 * 1024 * 1024),
        }),
        workflows: Object.freeze({
            directory: path.resolve(env.WORKFLOW_DIR || 'workflow'),
        }),
        cors: Object.freeze({
            origins: Object.freeze(parseListEnv(env, 'CORS_ORIGINS', ['*'])),
        }),
    };

    return Object.freeze(config);
}

const config = loadConfig();

export default config;
