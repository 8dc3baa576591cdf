/**
 * Structured logging for Deckhand
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  runId?: string;
  stage?: string;
  component?: string;
  [key: string]: unknown;
}

// Key material must never reach a log line
const REDACT_PATHS = ['privateKey', '*.privateKey', 'remote.privateKey', 'env.SSH_PRIVATE_KEY'];

function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'deckhand',
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[redacted]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Convenience function to create a named logger
export function createLogger(name: string): pino.Logger {
  return createChildLogger({ component: name });
}

// Structured event logging for pipeline stages
export function logStageResult(
  runId: string,
  stage: string,
  status: string,
  durationMs: number
): void {
  getLogger().info(
    {
      event: 'stage_result',
      runId,
      stage,
      status,
      durationMs,
    },
    `Stage ${stage} ${status} in ${durationMs}ms`
  );
}

export function logPromotionTransition(
  runId: string,
  fromState: string,
  toState: string,
  target: string
): void {
  getLogger().info(
    {
      event: 'promotion_transition',
      runId,
      fromState,
      toState,
      target,
    },
    `Promotion: ${fromState} -> ${toState}`
  );
}
