import { ConfigurationError } from '../models/errors';
import { AppConfig } from './Config';

export function validateConfig(config: AppConfig): void {
    // Telegram bot tokens look like "<bot id>:<secret>"
    if (!config.botToken.match(/^\d+:[A-Za-z0-9_-]+$/)) {
        throw new ConfigurationError('Invalid BOT_TOKEN format. Expected format: 123456789:secret');
    }

    if (!config.llmBaseUrl.startsWith('http://') && !config.llmBaseUrl.startsWith('https://')) {
        throw new ConfigurationError('LLM_BASE_URL must start with http:// or https://');
    }

    if (config.storageBackend === 'mongodb') {
        if (!config.mongodbUri) {
            throw new ConfigurationError('MONGODB_URI is required when STORAGE_BACKEND is mongodb');
        }
        if (!config.mongodbUri.startsWith('mongodb://') && !config.mongodbUri.startsWith('mongodb+srv://')) {
            throw new ConfigurationError('Invalid MONGODB_URI format. Must start with mongodb:// or mongodb+srv://');
        }
    }

    if (!config.recordsDir.trim()) {
        throw new ConfigurationError('RECORDS_DIR must not be empty');
    }

    if (config.turnTimeoutMs < 1000) {
        throw new ConfigurationError('TURN_TIMEOUT_MS must be at least 1000');
    }

    if (config.llmTimeoutMs < 1000) {
        throw new ConfigurationError('LLM_TIMEOUT_MS must be at least 1000');
    }

    if (config.llmMaxRetries < 0) {
        throw new ConfigurationError('LLM_MAX_RETRIES must be at least 0');
    }

    if (config.llmTemperature < 0 || config.llmTemperature > 2) {
        throw new ConfigurationError('LLM_TEMPERATURE must be between 0 and 2');
    }

    if (config.llmMaxTokens < 1) {
        throw new ConfigurationError('LLM_MAX_TOKENS must be at least 1');
    }

    if (config.memoryMaxChars < 1) {
        throw new ConfigurationError('MEMORY_MAX_CHARS must be at least 1');
    }

    if (config.endDetectionRetries < 0) {
        throw new ConfigurationError('END_DETECTION_RETRIES must be at least 0');
    }
}
