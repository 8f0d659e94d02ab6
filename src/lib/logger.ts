/**
 * Structured Logging
 *
 * Pino-based logging with:
 * - Environment-based configuration
 * - Sensitive data sanitization
 * - Layer-specific child loggers
 * - Timing utilities
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const NODE_ENV = process.env.NODE_ENV;
const LOG_LEVEL = process.env.LOG_LEVEL || (NODE_ENV === 'test' ? 'silent' : 'info');
const IS_DEVELOPMENT = NODE_ENV === 'development';

const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  // Pretty print only for local development, JSON everywhere else
  ...(IS_DEVELOPMENT
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }
    : {
        formatters: {
          level: (label: string) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      }),
};

// =============================================================================
// Main Logger Instance
// =============================================================================

/**
 * Root logger instance.
 * Use child loggers for specific contexts.
 */
export const logger: Logger = pino(pinoOptions);

export type LogLayer = 'rag' | 'ingestion' | 'db' | 'external';

/**
 * Create a child logger for a layer, optionally tagged with a service name.
 */
export function createLayerLogger(layer: LogLayer, service?: string): Logger {
  return logger.child(service ? { layer, service } : { layer });
}

// =============================================================================
// Sanitization Utilities
// =============================================================================

const MAX_TEXT_LENGTH = 200;

const SENSITIVE_PATTERNS = [
  /sk-[a-zA-Z0-9_-]{20,}/g, // OpenAI API keys
  /postgres(?:ql)?:\/\/[^@\s]+@/g, // Database URLs with credentials
  /Bearer [a-zA-Z0-9._-]+/g,
  /password[=:]\s*["']?[^"'\s]+/gi,
  /api[_-]?key[=:]\s*["']?[^"'\s]+/gi,
];

/**
 * Redact API keys, credentials and bearer tokens from a string.
 */
export function sanitizeString(value: string): string {
  let sanitized = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

/**
 * Truncate text content for logging
 */
export function truncateText(text: string, maxLength = MAX_TEXT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}... (${text.length} chars total)`;
}

// =============================================================================
// Timing Utilities
// =============================================================================

/**
 * Tracks named stage durations within one operation.
 */
export class Timer {
  private startTime: number;
  private marks: Map<string, number> = new Map();
  private durations: Map<string, number> = new Map();

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = this.now();
  }

  mark(name: string): void {
    this.marks.set(name, this.now());
  }

  /**
   * Record the duration since a mark. Returns 0 for an unknown mark.
   */
  measure(name: string): number {
    const markTime = this.marks.get(name);
    if (markTime === undefined) {
      return 0;
    }
    const duration = this.now() - markTime;
    this.durations.set(name, duration);
    return duration;
  }

  getDuration(name: string): number | undefined {
    return this.durations.get(name);
  }

  elapsed(): number {
    return this.now() - this.startTime;
  }

  getAllDurations(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [key, value] of this.durations) {
      result[`${key}_ms`] = value;
    }
    return result;
  }
}

// =============================================================================
// Logging Helpers
// =============================================================================

/**
 * Log an external service call
 */
export function logExternalCall(
  log: Logger,
  service: 'openai' | 'postgres' | 'other',
  operation: string,
  details: {
    duration_ms?: number;
    status?: number | string;
    error?: string;
    tokens?: number;
    model?: string;
    attempt?: number;
  }
): void {
  const baseLog = {
    event: 'external_call',
    service,
    operation,
    ...details,
    ...(details.error && { error: sanitizeString(details.error) }),
  };

  if (details.error) {
    log.error(baseLog, `${service} ${operation} failed: ${baseLog.error}`);
  } else {
    log.debug(baseLog, `${service} ${operation} completed`);
  }
}

/**
 * Log RAG pipeline step
 */
export function logRagStep(
  log: Logger,
  step: 'chunking' | 'embedding' | 'retrieval' | 'generation' | 'citation' | 'ingestion',
  details: {
    duration_ms?: number;
    chunks?: number;
    tokens?: number;
    confidence?: number;
    model?: string;
    error?: string;
  }
): void {
  const baseLog = {
    event: `rag_${step}`,
    ...details,
  };

  if (details.error) {
    log.error(baseLog, `RAG ${step} failed: ${details.error}`);
  } else {
    log.debug(baseLog, `RAG ${step} completed`);
  }
}

export type { Logger } from 'pino';
