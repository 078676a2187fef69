import { toBool } from './env.js';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface DebugConfig {
  enabled: boolean;
  logTokenizer: boolean;
  logParser: boolean;
  logValidation: boolean;
  logDerivation: boolean;
  logExecutor: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === 'json' ? 'json' : defaultValue;
};

export function loadDebugConfig(): DebugConfig {
  const enabled = toBool(process.env.CRITERIA_DEBUG_MODE, false);

  // Level and format apply whether or not category debugging is on
  const logLevel = toLogLevel(process.env.CRITERIA_LOG_LEVEL, LogLevel.INFO);
  const logFormat = toLogFormat(process.env.CRITERIA_LOG_FORMAT, 'pretty');

  if (!enabled) {
    return {
      enabled: false,
      logTokenizer: false,
      logParser: false,
      logValidation: false,
      logDerivation: false,
      logExecutor: false,
      logLevel,
      logFormat,
    };
  }

  return {
    enabled: true,
    logTokenizer: toBool(process.env.CRITERIA_DEBUG_TOKENIZER, true),
    logParser: toBool(process.env.CRITERIA_DEBUG_PARSER, true),
    logValidation: toBool(process.env.CRITERIA_DEBUG_VALIDATION, true),
    logDerivation: toBool(process.env.CRITERIA_DEBUG_DERIVATION, true),
    logExecutor: toBool(process.env.CRITERIA_DEBUG_EXECUTOR, true),
    logLevel,
    logFormat,
  };
}
