import { Db, MongoClient, MongoClientOptions } from 'mongodb';
import { ConfigurationError } from '../models/errors';
import { errorMeta, logger } from '../utils/logger';

const log = logger.child('database');

export interface ConnectionSettings {
    uri: string;
    databaseName: string;
    maxAttempts?: number;
    retryDelayMs?: number;
    maxRetryDelayMs?: number;
}

const CLIENT_OPTIONS: MongoClientOptions = {
    serverSelectionTimeoutMS: 5000,
    connectTimeoutMS: 10000,
    socketTimeoutMS: 45000
};

// The driver and its connection-string parser each define a MongoParseError
const isParseError = (error: unknown): error is Error => error instanceof Error && error.name === 'MongoParseError';

/** Delay before attempt `attempt + 1`: doubles each time, capped. */
export const retryDelayFor = (attempt: number, baseMs: number, maxMs: number): number => {
    return Math.min(baseMs * 2 ** (attempt - 1), maxMs);
};

export class DatabaseConnection {
    private client: MongoClient | null = null;
    private db: Db | null = null;
    private readonly maxAttempts: number;
    private readonly retryDelayMs: number;
    private readonly maxRetryDelayMs: number;

    constructor(private readonly settings: ConnectionSettings) {
        this.maxAttempts = settings.maxAttempts ?? 5;
        this.retryDelayMs = settings.retryDelayMs ?? 1000;
        this.maxRetryDelayMs = settings.maxRetryDelayMs ?? 15000;
    }

    /**
     * Connect and ping, retrying with backoff. A URI the driver cannot parse
     * fails at once.
     */
    async connect(): Promise<Db> {
        const { uri, databaseName } = this.settings;
        let lastError: unknown;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            try {
                log.info(`Connecting to MongoDB (attempt ${attempt}/${this.maxAttempts})`);
                const client = new MongoClient(uri, CLIENT_OPTIONS);
                this.client = client;
                await client.connect();

                const db = client.db(databaseName);
                await db.admin().ping();
                this.db = db;
                log.info('Connected to MongoDB', { database: databaseName });
                return db;
            } catch (error) {
                await this.closeQuietly();
                if (isParseError(error)) {
                    throw new ConfigurationError(`MONGODB_URI could not be parsed: ${error.message}`, error);
                }

                lastError = error;
                log.warn(`Connection attempt ${attempt} failed`, errorMeta(error));
                if (attempt < this.maxAttempts) {
                    await this.delay(retryDelayFor(attempt, this.retryDelayMs, this.maxRetryDelayMs));
                }
            }
        }

        const detail = lastError instanceof Error ? lastError.message : String(lastError);
        throw new Error(`Failed to connect to MongoDB after ${this.maxAttempts} attempts. Last error: ${detail}`);
    }

    async disconnect(): Promise<void> {
        if (this.client) {
            await this.client.close();
            this.client = null;
            this.db = null;
            log.info('Disconnected from MongoDB');
        }
    }

    getDatabase(): Db {
        if (!this.db) {
            throw new Error('Database connection not established. Call connect() first.');
        }
        return this.db;
    }

    private async closeQuietly(): Promise<void> {
        const client = this.client;
        this.client = null;
        this.db = null;
        if (client) {
            try {
                await client.close();
            } catch (error) {
                log.debug('Ignoring close error after failed connect', errorMeta(error));
            }
        }
    }

    private delay(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
