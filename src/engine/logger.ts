/* eslint-disable no-console */
import { appConfig } from '../config/appConfig';
import type { LogLevel } from '../config/appConfig';

export type LoggerMetadata = Record<string, unknown>;

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// Resolved per call so a replaced or spied console is honoured.
const consoleWriters: Record<EmittingLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

let activeLevel: LogLevel = appConfig.logLevel;

/** Change the threshold for every logger at runtime. */
export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

const formatConsolePayload = (level: EmittingLevel, message: string, metadata: LoggerMetadata) => {
  const timestamp = new Date().toISOString();
  return [`[${timestamp}] [${level.toUpperCase()}] ${message}`, metadata] as const;
};

const createEmitter =
  (module: string, level: EmittingLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[activeLevel]) {
      return;
    }
    const [consoleMessage, consoleMetadata] = formatConsolePayload(level, message, {
      ...metadata,
      module,
      level,
    });
    consoleWriters[level](consoleMessage, consoleMetadata);
  };

export const createLogger = (module: string) => ({
  debug: createEmitter(module, 'debug'),
  info: createEmitter(module, 'info'),
  warn: createEmitter(module, 'warn'),
  error: createEmitter(module, 'error'),
});

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (module: string): Logger => {
  const cached = loggerCache.get(module);
  if (cached) {
    return cached;
  }
  const logger = createLogger(module);
  loggerCache.set(module, logger);
  return logger;
};
