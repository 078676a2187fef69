import { loadDebugConfig, DebugConfig, LogLevel } from '../config/debug.js';

let debugConfig: DebugConfig = loadDebugConfig();

/** Replace the environment-derived configuration (used by scripts and tests). */
export function configureLogger(config: DebugConfig): void {
  debugConfig = config;
}

export type DebugCategory = 'tokenizer' | 'parser' | 'validation' | 'derivation' | 'executor';

function categoryEnabled(category: DebugCategory): boolean {
  if (!debugConfig.enabled) {
    return false;
  }

  switch (category) {
    case 'tokenizer':
      return debugConfig.logTokenizer;
    case 'parser':
      return debugConfig.logParser;
    case 'validation':
      return debugConfig.logValidation;
    case 'derivation':
      return debugConfig.logDerivation;
    case 'executor':
      return debugConfig.logExecutor;
    default:
      return false;
  }
}

interface LogEntry {
  timestamp: string;
  level: string;
  category?: string;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[debugConfig.logLevel];
}

const errorReplacer = (_key: string, val: unknown) => {
  if (val instanceof Error) {
    return { name: val.name, message: val.message, stack: val.stack };
  }
  return val;
};

const describeFailure = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

const serialize = (value: unknown) => {
  try {
    return JSON.stringify(value, errorReplacer, 2);
  } catch (error) {
    return `[unserializable: ${describeFailure(error)}]`;
  }
};

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[criteria:${category}]` : '[criteria]';
  const levelStr = `[${level.toUpperCase()}]`;

  const base = `${timestamp} ${levelStr} ${categoryStr} ${message}`;

  if (Object.keys(rest).length === 0) {
    return base;
  }

  return `${base}\n${serialize(rest)}`;
}

function formatJson(entry: LogEntry): string {
  try {
    return JSON.stringify(entry, errorReplacer);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      _serializationError: `Failed to serialize: ${describeFailure(error)}`,
    });
  }
}

function emit(entry: LogEntry): void {
  const output = debugConfig.logFormat === 'json' ? formatJson(entry) : formatPretty(entry);
  console.error(output);
}

function errorFields(error: Error): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause) {
    fields.cause = error.cause;
  }
  return fields;
}

class Logger {
  private createEntry(
    level: LogLevel,
    category: string | undefined,
    message: string,
    payload?: unknown
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (category) {
      entry.category = category;
    }

    if (payload === undefined) {
      return entry;
    }

    if (payload instanceof Error) {
      entry.error = errorFields(payload);
    } else if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
      for (const [key, val] of Object.entries(payload)) {
        entry[key] = val instanceof Error ? errorFields(val) : val;
      }
    } else {
      entry.data = payload;
    }

    return entry;
  }

  debug(category: DebugCategory, message: string, payload?: unknown): void {
    if (!categoryEnabled(category) || !shouldLog(LogLevel.DEBUG)) {
      return;
    }

    emit(this.createEntry(LogLevel.DEBUG, category, message, payload));
  }

  info(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    emit(this.createEntry(LogLevel.INFO, undefined, message, payload));
  }

  warn(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.WARN)) {
      return;
    }

    emit(this.createEntry(LogLevel.WARN, undefined, message, payload));
  }

  error(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.ERROR)) {
      return;
    }

    emit(this.createEntry(LogLevel.ERROR, undefined, message, payload));
  }
}

// Singleton instance
export const logger = new Logger();

export function debugLog(category: DebugCategory, message: string, payload?: unknown) {
  logger.debug(category, message, payload);
}

export function trackOperation<T>(category: DebugCategory, label: string, meta?: unknown) {
  debugLog(category, `${label} START`, meta);
  const start = Date.now();
  return (result?: T) => {
    debugLog(category, `${label} END`, {
      durationMs: Date.now() - start,
      result,
    });
  };
}
