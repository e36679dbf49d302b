import { DEFAULT_INITIAL_THERAPY, loadConfigFromEnv } from './Config';
import { ConfigurationError } from '../models/errors';

const baseEnv = {
    LLM_API_KEY: 'test-secret',
    BOT_TOKEN: '123456789:test-token'
};

describe('loadConfigFromEnv', () => {
    test('fills defaults from a minimal environment', () => {
        expect(loadConfigFromEnv(baseEnv)).toEqual({
            llmApiKey: 'test-secret',
            llmBaseUrl: 'https://openrouter.ai/api/v1',
            llmTimeoutMs: 60000,
            llmMaxRetries: 2,
            llmTemperature: 0.7,
            llmMaxTokens: 500,
            modelConfigPath: 'config/default-config.json',
            storageBackend: 'file',
            recordsDir: 'counseling_records',
            mongodbUri: undefined,
            mongodbDbName: 'counseling-orchestrator',
            botToken: '123456789:test-token',
            initialTherapy: DEFAULT_INITIAL_THERAPY,
            turnTimeoutMs: 120000,
            memoryMaxChars: 1200,
            endDetectionRetries: 1,
            logLevel: 'info'
        });
    });

    test.each(['LLM_API_KEY', 'BOT_TOKEN'])('requires %s', name => {
        const env: Record<string, string | undefined> = { ...baseEnv, [name]: undefined };
        expect(() => loadConfigFromEnv(env)).toThrow(`Required environment variable ${name} is not set`);
    });

    test('reads the MongoDB backend and strips a path from the database name', () => {
        const config = loadConfigFromEnv({
            ...baseEnv,
            STORAGE_BACKEND: 'mongodb',
            MONGODB_URI: 'mongodb://localhost:27017',
            MONGODB_DB_NAME: 'cluster0/counseling'
        });

        expect(config.storageBackend).toBe('mongodb');
        expect(config.mongodbDbName).toBe('counseling');
    });

    test('rejects the MongoDB backend without a URI', () => {
        expect(() => loadConfigFromEnv({ ...baseEnv, STORAGE_BACKEND: 'mongodb' }))
            .toThrow('MONGODB_URI is required when STORAGE_BACKEND is mongodb');
    });

    test('rejects an unknown storage backend', () => {
        expect(() => loadConfigFromEnv({ ...baseEnv, STORAGE_BACKEND: 'sqlite' })).toThrow(ConfigurationError);
    });

    test('rejects numbers that do not parse', () => {
        expect(() => loadConfigFromEnv({ ...baseEnv, TURN_TIMEOUT_MS: 'soon' })).toThrow('TURN_TIMEOUT_MS must be an integer, got "soon"');
    });

    test('rejects values outside their range', () => {
        expect(() => loadConfigFromEnv({ ...baseEnv, LLM_TEMPERATURE: '3' })).toThrow('LLM_TEMPERATURE must be between 0 and 2');
        expect(() => loadConfigFromEnv({ ...baseEnv, TURN_TIMEOUT_MS: '10' })).toThrow('TURN_TIMEOUT_MS must be at least 1000');
    });

    test('normalizes the log level and rejects unknown ones', () => {
        expect(loadConfigFromEnv({ ...baseEnv, LOG_LEVEL: ' DEBUG ' }).logLevel).toBe('debug');
        expect(() => loadConfigFromEnv({ ...baseEnv, LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
    });

    test('rejects a malformed bot token', () => {
        expect(() => loadConfigFromEnv({ ...baseEnv, BOT_TOKEN: 'not-a-token' })).toThrow('Invalid BOT_TOKEN format');
    });
});
