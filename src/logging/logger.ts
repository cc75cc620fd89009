import crypto from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(component: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  maxLength?: number;
  /** Salt for {@link hashId}. Shared by every logger in the process. */
  hashSalt?: string;
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
};

let hashSalt = '';

export const hashId = (value?: string): string => {
  if (!value) {
    return 'unknown';
  }
  return crypto.createHash('sha256').update(`${hashSalt}:${value}`).digest('hex').slice(0, 16);
};

const redactText = (value: string): string => {
  return value
    .replace(/[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/gi, '[REDACTED_EMAIL]')
    .replace(/https?:\/\/\S+/gi, '[REDACTED_URL]')
    .replace(/Bearer\s+[A-Za-z0-9\-_.=]+/gi, 'Bearer [REDACTED_TOKEN]')
    .replace(/\beyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\b/g, '[REDACTED_TOKEN]');
};

const truncateText = (value: string, maxLength: number): string => {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, maxLength)}...`;
};

const sanitizeValue = (value: unknown, maxLength: number): unknown => {
  if (value === null || value === undefined) {
    return value;
  }
  if (value instanceof Error) {
    return { name: value.name, message: truncateText(redactText(value.message), maxLength) };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'string') {
    return truncateText(redactText(value), maxLength);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item, maxLength));
  }
  if (typeof value === 'object') {
    return Object.entries(value).reduce<Record<string, unknown>>((acc, [key, val]) => {
      acc[key] = sanitizeValue(val, maxLength);
      return acc;
    }, {});
  }
  return String(value);
};

export const sanitizeFields = (fields: LogFields, maxLength = 200): LogFields => {
  return Object.entries(fields).reduce<LogFields>((acc, [key, val]) => {
    acc[key] = sanitizeValue(val, maxLength);
    return acc;
  }, {});
};

export const createLogger = (component: string, options: LoggerOptions = {}): Logger => {
  const threshold = levelOrder[options.level ?? parseLogLevel(process.env.LOG_LEVEL)];
  const maxLength = options.maxLength ?? 200;
  if (options.hashSalt !== undefined) {
    hashSalt = options.hashSalt;
  }

  const write = (level: LogLevel, message: string, fields?: LogFields) => {
    if (levelOrder[level] < threshold) {
      return;
    }
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...(fields ? sanitizeFields(fields, maxLength) : {})
    };
    const line = JSON.stringify(entry);
    if (level === 'warn' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (child) => createLogger(`${component}.${child}`, options)
  };
};
