import dotenv from 'dotenv';
import { ConfigurationError } from '../models/errors';
import { LOG_LEVELS, LogLevel } from '../utils/logger';
import { validateConfig } from './validation';

// Load environment variables
dotenv.config();

export type StorageBackend = 'file' | 'mongodb';

export const DEFAULT_INITIAL_THERAPY = 'Cognitive Behavioral Therapy (CBT)';

export interface AppConfig {
    llmApiKey: string;
    llmBaseUrl: string;
    llmTimeoutMs: number;
    llmMaxRetries: number;
    llmTemperature: number;
    llmMaxTokens: number;
    modelConfigPath: string;
    storageBackend: StorageBackend;
    recordsDir: string;
    mongodbUri?: string;
    mongodbDbName: string;
    botToken: string;
    initialTherapy: string;
    turnTimeoutMs: number;
    memoryMaxChars: number;
    endDetectionRetries: number;
    logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const readInt = (env: Env, name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
    }
    return value;
};

const readFloat = (env: Env, name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
    }
    return value;
};

const readLogLevel = (env: Env): LogLevel => {
    const raw = (env.LOG_LEVEL || 'info').trim().toLowerCase();
    const level = LOG_LEVELS.find(candidate => candidate === raw);
    if (!level) {
        throw new ConfigurationError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
};

/**
 * Build the application configuration from an environment map. The result
 * is validated before it is returned.
 */
export const loadConfigFromEnv = (env: Env): AppConfig => {
    const requiredEnvVars = ['LLM_API_KEY', 'BOT_TOKEN'];

    for (const envVar of requiredEnvVars) {
        if (!env[envVar]) {
            throw new ConfigurationError(`Required environment variable ${envVar} is not set`);
        }
    }

    const rawDbName = env.MONGODB_DB_NAME;
    const normalizedDbName = rawDbName?.includes('/')
        ? rawDbName.split('/').pop()
        : rawDbName;

    const config: AppConfig = {
        llmApiKey: env.LLM_API_KEY ?? '',
        llmBaseUrl: env.LLM_BASE_URL || 'https://openrouter.ai/api/v1',
        llmTimeoutMs: readInt(env, 'LLM_TIMEOUT_MS', 60000),
        llmMaxRetries: readInt(env, 'LLM_MAX_RETRIES', 2),
        llmTemperature: readFloat(env, 'LLM_TEMPERATURE', 0.7),
        llmMaxTokens: readInt(env, 'LLM_MAX_TOKENS', 500),
        modelConfigPath: env.MODEL_CONFIG_PATH || 'config/default-config.json',
        storageBackend: env.STORAGE_BACKEND === 'mongodb' ? 'mongodb' : 'file',
        recordsDir: env.RECORDS_DIR || 'counseling_records',
        mongodbUri: env.MONGODB_URI || undefined,
        mongodbDbName: normalizedDbName || 'counseling-orchestrator',
        botToken: env.BOT_TOKEN ?? '',
        initialTherapy: env.INITIAL_THERAPY?.trim() || DEFAULT_INITIAL_THERAPY,
        turnTimeoutMs: readInt(env, 'TURN_TIMEOUT_MS', 120000),
        memoryMaxChars: readInt(env, 'MEMORY_MAX_CHARS', 1200),
        endDetectionRetries: readInt(env, 'END_DETECTION_RETRIES', 1),
        logLevel: readLogLevel(env)
    };

    if (env.STORAGE_BACKEND && env.STORAGE_BACKEND !== 'file' && env.STORAGE_BACKEND !== 'mongodb') {
        throw new ConfigurationError('STORAGE_BACKEND must be "file" or "mongodb"');
    }

    validateConfig(config);
    return config;
};

export class Config {
    private static instance: AppConfig | undefined;

    public static getInstance(): AppConfig {
        if (!Config.instance) {
            Config.instance = loadConfigFromEnv(process.env);
        }
        return Config.instance;
    }

    // Tests only
    public static reset(): void {
        Config.instance = undefined;
    }
}

// Re-export validateConfig for convenience
export { validateConfig };
