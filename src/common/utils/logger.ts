import { isRecord } from './object.utils';
import { redactSensitiveData } from './pii-redaction';

/**
 * Service logger.
 * Production: JSON lines (stderr for errors, stdout otherwise).
 * Development: single styled line per event with a redacted meta box.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogType = 'system' | 'http' | 'auth' | 'security' | 'upstream';

export interface LogMeta {
  type?: LogType;
  method?: string;
  duration?: number;
  context?: string;
  [key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const INDICATORS: Record<LogLevel | LogType, string> = {
  error: '[ERROR]',
  warn: '[WARN ]',
  info: '[INFO ]',
  debug: '[DEBUG]',
  http: '[HTTP ]',
  auth: '[AUTH ]',
  security: '[SEC  ]',
  upstream: '[UPSTR]',
  system: '[SYS  ]',
};

const ANSI = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
};

function getLogLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug');
  if (raw === 'log') return 'info';
  return isLogLevel(raw) ? raw : 'info';
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[getLogLevel()];
}

function getTimestamp(): string {
  const now = new Date();
  return (
    now.toTimeString().split(' ')[0] +
    '.' +
    String(now.getMilliseconds()).padStart(3, '0')
  );
}

function sanitizeMeta(meta?: LogMeta): Record<string, unknown> | undefined {
  if (!meta) {
    return undefined;
  }

  const redacted = redactSensitiveData(meta);
  return isRecord(redacted) ? redacted : undefined;
}

function formatMetaForDisplay(meta?: LogMeta): string {
  const safeMeta = sanitizeMeta(meta);
  if (!safeMeta) {
    return '';
  }

  const filtered = { ...safeMeta };
  delete filtered.type;
  delete filtered.method;
  if (Object.keys(filtered).length === 0) return '';

  return ' ' + JSON.stringify(filtered);
}

function log(level: LogLevel, message: string, meta?: LogMeta, context?: string): void {
  if (!shouldLog(level)) return;

  const type = meta?.type;
  const indicator = type ? INDICATORS[type] : INDICATORS[level];

  if (process.env.NODE_ENV === 'production') {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && { context }),
      ...sanitizeMeta(meta),
    });
    if (level === 'error') process.stderr.write(line + '\n');
    else process.stdout.write(line + '\n');
    return;
  }

  const methodPrefix = meta?.method ? `[${meta.method}] ` : '';
  const ctx = context ? `[${context}] ` : '';
  const msgStyle = level === 'error' ? ANSI.red : level === 'warn' ? ANSI.yellow : '';
  const out = `${ANSI.gray}[${getTimestamp()}]${ANSI.reset} ${indicator} ${msgStyle}${ctx}${methodPrefix}${message}${formatMetaForDisplay(meta)}${ANSI.reset}`;

  switch (level) {
    case 'error':
      console.error(out);
      break;
    case 'warn':
      console.warn(out);
      break;
    default:
      console.log(out);
  }
}

function createLogFn(level: LogLevel, context?: string) {
  return (message: string, meta?: LogMeta) => log(level, message, meta, context);
}

function createTypedLogFn(level: LogLevel, type: LogType, context?: string) {
  return (message: string, meta?: Omit<LogMeta, 'type'>) =>
    log(level, message, { ...meta, type }, context);
}

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, error?: Error, meta?: LogMeta) => void;
  http: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  auth: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  upstream: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  security: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  performance: (operation: string, startTime: number, meta?: Omit<LogMeta, 'type' | 'duration'>) => void;
  isDebugEnabled: () => boolean;
}

function createLoggerImpl(context?: string): Logger {
  const isDev = process.env.NODE_ENV !== 'production';

  return {
    debug: createLogFn('debug', context),
    info: createLogFn('info', context),
    warn: createLogFn('warn', context),
    error: (message: string, error?: Error, meta?: LogMeta) => {
      log(
        'error',
        message,
        {
          ...meta,
          errorName: error?.name,
          errorMessage: error?.message,
          ...(isDev && error?.stack && { stack: error.stack }),
        },
        context,
      );
    },
    http: createTypedLogFn('debug', 'http', context),
    auth: createTypedLogFn('info', 'auth', context),
    upstream: createTypedLogFn('debug', 'upstream', context),
    security: createTypedLogFn('warn', 'security', context),
    performance: (operation: string, startTime: number, meta?: Omit<LogMeta, 'type' | 'duration'>) => {
      if (!shouldLog('debug')) return;
      const duration = Date.now() - startTime;
      log('debug', `Performance: ${operation}`, { ...meta, duration, type: 'system' }, context);
    },
    isDebugEnabled: () => shouldLog('debug'),
  };
}

export const logger: Logger = createLoggerImpl();

export function createLogger(context: string): Logger {
  return createLoggerImpl(context);
}
