export { Config, DEFAULT_INITIAL_THERAPY, loadConfigFromEnv } from './Config';
export type { AppConfig, StorageBackend } from './Config';
export { validateConfig } from './validation';
export * from './ModelConfig';
