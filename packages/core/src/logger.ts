import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Clinic logger with PII redaction
 *
 * Owner contact details and free-text symptom descriptions never reach the
 * log stream raw. Log lengths, sources, priorities and identifiers instead.
 */

// PII patterns scrubbed from string values
const PII_PATTERNS = {
  // International phone format (E.164)
  phoneE164: /\+[1-9]\d{6,14}/g,
  // Local phone numbers, 9-11 digits with optional separators
  phoneLocal: /\b\d{3}[-\s]?\d{3}[-\s]?\d{3,5}\b/g,
  // Email addresses
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  // Credit card numbers (basic pattern)
  creditCard: /\b(?:\d{4}[-\s]?){3}\d{4}\b/g,
  // JWT tokens
  jwt: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,
  // Bearer tokens
  bearer: /Bearer\s+[a-zA-Z0-9_-]+/gi,
  // OpenAI-style secret keys
  secretKey: /\bsk-[a-zA-Z0-9_-]{8,}\b/g,
};

// Fields to completely redact (case-insensitive substring matching)
const REDACTED_FIELDS = [
  'phone',
  'email',
  'ownername',
  'address',
  'symptoms',
  'symptomtext',
  'text',
  'reason',
  'situation',
  'triagenotes',
  'prompt',
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'cookie',
];

// Numeric bookkeeping fields that contain a redacted substring but carry no PII
const ALLOWED_FIELDS = new Set(['tokennumber', 'currenttokencounter', 'lastcalledtoken', 'textlength', 'reasonlength']);

function shouldRedactKey(key: string): boolean {
  const keyLower = key.toLowerCase();
  if (ALLOWED_FIELDS.has(keyLower)) {
    return false;
  }
  return REDACTED_FIELDS.some((field) => keyLower === field || keyLower.includes(field));
}

/**
 * Recursively redact PII from an object
 */
export function redactObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    let result = obj;
    for (const pattern of Object.values(PII_PATTERNS)) {
      result = result.replace(pattern, '[REDACTED]');
    }
    return result;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactObject);
  }

  if (typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      redacted[key] = shouldRedactKey(key) ? '[REDACTED]' : redactObject(value);
    }
    return redacted;
  }

  return obj;
}

function createRedactor(): { paths: string[]; censor: string } {
  return {
    paths: [...REDACTED_FIELDS, ...REDACTED_FIELDS.map((field) => `*.${field}`)],
    censor: '[REDACTED]',
  };
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
}

/**
 * Create a logger instance with PII redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info', correlationId } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: pino.stdSerializers.err,
      details: (details: unknown) => redactObject(details),
    },
  };

  return pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

// Default logger instance
export const logger = createLogger({ name: 'vetqueue' });

export type { Logger };
