/**
 * clickup-cli core: ClickUp API transport, services, config and credentials
 */

// Types
export * from './types.js';

export { APP_NAME, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT, ENV, VERSION } from './constants.js';

// Client
export * from './client/index.js';

// Services
export * from './services/index.js';

// Config & credentials
export { ConfigError, configDir, ensureConfigDir, readConfig, writeConfig, type CliConfig } from './config/config.js';
export * from './auth/index.js';

// Utils
export { DebugLogger, withRequestLogging, type DebugLoggerConfig, type LogLevel, type LogSink } from './utils/logger.js';
