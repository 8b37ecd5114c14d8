/**
 * Log Configuration Utility
 *
 * Chooses the process log level from `LOG_LEVEL` (or `NODE_ENV` when unset),
 * applies it to LogEngine and gates the chattier runtime logs.
 *
 * @since 2025
 */
import { LogEngine, LogMode } from '@wgtechlabs/log-engine';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogConfig {
  level: LogLevelName;
  runtime: {
    routing: boolean;
    storage: boolean;
  };
}

type LogContext = Record<string, unknown>;

/**
 * Default log configurations for different environments
 */
const LOG_CONFIGS: Record<'development' | 'production' | 'debug', LogConfig> = {
  development: {
    level: 'info',
    runtime: {
      routing: false,
      storage: false
    }
  },
  production: {
    level: 'warn',
    runtime: {
      routing: false,
      storage: false
    }
  },
  debug: {
    level: 'debug',
    runtime: {
      routing: true,
      storage: true
    }
  }
};

const LOG_MODES: Record<LogLevelName, LogMode> = {
  debug: LogMode.DEBUG,
  info: LogMode.INFO,
  warn: LogMode.WARN,
  error: LogMode.ERROR,
  silent: LogMode.SILENT
};

let currentConfig: LogConfig = LOG_CONFIGS.development;

function getConfigFromEnv(env: string): LogConfig {
  if (env === 'production') {
    return LOG_CONFIGS.production;
  }
  if (env === 'debug') {
    return LOG_CONFIGS.debug;
  }
  return LOG_CONFIGS.development;
}

/**
 * Resolves the configuration for the given `NODE_ENV` and `LOG_LEVEL` values.
 *
 * `LOG_LEVEL` wins when it names a level (`debug`, `info`, `warn`, `error`, `silent`)
 * or an environment preset (`development`, `production`, `debug`).
 */
export function resolveLogConfig(env: string = 'development', logLevel?: string): LogConfig {
  switch (logLevel) {
    case 'debug':
    case 'development':
    case 'production':
      return getConfigFromEnv(logLevel);
    case 'info':
      return LOG_CONFIGS.development;
    case 'warn':
      return LOG_CONFIGS.production;
    case 'error':
    case 'silent':
      return { ...LOG_CONFIGS.production, level: logLevel };
    default:
      return getConfigFromEnv(env);
  }
}

export function toLogMode(level: LogLevelName): LogMode {
  return LOG_MODES[level];
}

/**
 * Initialize logging configuration based on environment
 */
export function initializeLogConfig(): LogConfig {
  const env = process.env.NODE_ENV || 'development';
  const logLevel = process.env.LOG_LEVEL;

  currentConfig = resolveLogConfig(env, logLevel);
  LogEngine.configure({ mode: toLogMode(currentConfig.level) });

  LogEngine.info('Log configuration initialized', {
    environment: env,
    level: currentConfig.level,
    customLevel: !!logLevel
  });

  return currentConfig;
}

export function getLogConfig(): LogConfig {
  return currentConfig;
}

/**
 * Conditional logging helpers
 */
export class ConditionalLogger {
  /**
   * Log update dispatching (if enabled)
   */
  static logRouting(action: string, context: LogContext): void {
    if (currentConfig.runtime.routing) {
      LogEngine.debug(`Routing: ${action}`, context);
    }
  }

  /**
   * Log storage operations (if enabled)
   */
  static logStorage(operation: string, context: LogContext): void {
    if (currentConfig.runtime.storage) {
      LogEngine.debug(`Storage: ${operation}`, context);
    }
  }
}
