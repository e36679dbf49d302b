import path from 'path';
import { createModelSteps } from './analysis';
import { ConversationController } from './components/ConversationController';
import { BotHandler } from './components/BotHandler';
import { AppConfig, Config, loadModelConfig, modelsByModule } from './config';
import { DatabaseManager } from './database';
import { createChatCompletionClient, OpenAIChatInvoker } from './llm/OpenAIChatInvoker';
import { CounselingOrchestrator } from './managers/CounselingOrchestrator';
import { FileRecordStore, MongoRecordStore, RecordStore } from './storage';
import { errorMeta, logger, setLogLevel } from './utils/logger';

const log = logger.child('main');

interface StoreHandle {
    store: RecordStore;
    close(): Promise<void>;
}

async function createStore(config: AppConfig): Promise<StoreHandle> {
    if (config.storageBackend === 'mongodb' && config.mongodbUri) {
        const dbManager = new DatabaseManager({ uri: config.mongodbUri, databaseName: config.mongodbDbName });
        await dbManager.initialize();
        return {
            store: new MongoRecordStore(dbManager.recordCollection()),
            close: () => dbManager.disconnect()
        };
    }

    const directory = path.resolve(process.cwd(), config.recordsDir);
    log.info('Using file record store', { directory });
    return { store: new FileRecordStore(directory), close: async () => undefined };
}

async function main() {
    // Load and validate configuration
    const config = Config.getInstance();
    setLogLevel(config.logLevel);

    log.info('Starting counseling orchestrator...');

    const modelConfig = loadModelConfig(path.resolve(process.cwd(), config.modelConfigPath));
    const invoker = new OpenAIChatInvoker(
        createChatCompletionClient({
            apiKey: config.llmApiKey,
            baseURL: config.llmBaseUrl,
            timeoutMs: config.llmTimeoutMs,
            maxRetries: config.llmMaxRetries
        }),
        modelsByModule(modelConfig.bindings),
        { temperature: config.llmTemperature, maxTokens: config.llmMaxTokens }
    );
    const steps = createModelSteps(invoker, modelConfig, config.memoryMaxChars);
    const { store, close } = await createStore(config);

    const controller = new ConversationController(() => new CounselingOrchestrator({
        steps,
        store,
        settings: {
            initialTherapy: config.initialTherapy,
            turnTimeoutMs: config.turnTimeoutMs,
            endDetectionRetries: config.endDetectionRetries
        }
    }));
    const botHandler = new BotHandler(config.botToken, controller);

    // Handle graceful shutdown
    const shutdown = async (signal: string) => {
        log.info('Shutting down...', { signal });
        await botHandler.shutdown(signal);
        await close();
        process.exit(0);
    };
    process.once('SIGINT', () => {
        shutdown('SIGINT').catch(error => log.error('Shutdown failed', errorMeta(error)));
    });
    process.once('SIGTERM', () => {
        shutdown('SIGTERM').catch(error => log.error('Shutdown failed', errorMeta(error)));
    });

    await botHandler.start();
}

// Start the application
if (require.main === module) {
    main().catch(error => {
        log.error('Failed to start', errorMeta(error));
        process.exit(1);
    });
}
