import pino from 'pino';
import { getEnvironment } from '../config/environment';
import { getTransport } from './getTransport';
import { APP_NAME } from '../config/constants';

// Sensitive keys to redact from logs
const SENSITIVE_KEYS = [
  'MODEL_API_KEY',
  'apiKey',
  'password',
  'token',
  'secret',
  'api_key',
  'apikey',
  'authorization',
];

function createRedactor(): (obj: Record<string, unknown>) => Record<string, unknown> {
  return (obj: Record<string, unknown>) => {
    const redacted = { ...obj };

    Object.keys(redacted).forEach(key => {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive.toLowerCase()))) {
        redacted[key] = '[REDACTED]';
      }
    });

    return redacted;
  };
}

function createLogger(): pino.Logger {
  const env = getEnvironment();
  const isDevelopment = env.NODE_ENV === 'development';

  const options: pino.LoggerOptions = {
    name: APP_NAME,
    level: env.LOG_LEVEL ?? (isDevelopment ? 'debug' : 'info'),
    redact: {
      paths: SENSITIVE_KEYS,
      censor: '[REDACTED]',
    },
    formatters: {
      log: createRedactor(),
    },
  };

  const transport = getTransport();
  if (transport) {
    return pino({ ...options, transport });
  }
  return pino(options, pino.destination(2));
}

let cachedLogger: pino.Logger | null = null;
export function getLogger(): pino.Logger {
  if (!cachedLogger) cachedLogger = createLogger();
  return cachedLogger;
}

// For testing purposes
export function clearLoggerCache(): void {
  cachedLogger = null;
}

// Helper function to create child loggers with correlation IDs
export function createChildLogger(correlationId: string): pino.Logger {
  return getLogger().child({ correlationId });
}

export function generateCorrelationId(): string {
  return `run-${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
}

export async function withTiming<T>(
  log: pino.Logger,
  event: string,
  fn: () => Promise<T>,
  fields?: Record<string, unknown>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    log.info({ event, durationMs: Date.now() - start, status: 'ok', ...(fields ?? {}) });
    return result;
  } catch (error) {
    log.error({ event, durationMs: Date.now() - start, error, ...(fields ?? {}) }, 'failed');
    throw error;
  }
}
