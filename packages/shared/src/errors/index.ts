/**
 * Custom error hierarchy for Deckhand
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'CONFIGURATION'
  | 'COMMAND'
  | 'CREDENTIALS'
  | 'REMOTE'
  | 'IMAGE'
  | 'STATE_MACHINE'
  | 'PIPELINE'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  runId?: string;
  stage?: string;
  [key: string]: unknown;
}

/**
 * Base error class for Deckhand
 */
export class DeckhandError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'DeckhandError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors (missing or malformed settings)
 */
export class ConfigurationError extends DeckhandError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends DeckhandError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1002', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Local process errors
 */
export class CommandError extends DeckhandError {
  public readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, detail?: string, context: Partial<ErrorContext> = {}) {
    super(
      `Command failed (${exitCode === null ? 'no exit code' : `exit ${exitCode}`}): ${command}${detail ? `: ${detail}` : ''}`,
      'E2001',
      {
        category: 'COMMAND',
        severity: 'HIGH',
        retryable: false,
        command,
        ...context,
      }
    );
    this.name = 'CommandError';
    this.exitCode = exitCode;
  }
}

export class CommandTimeoutError extends DeckhandError {
  constructor(command: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`, 'E2002', {
      category: 'COMMAND',
      severity: 'HIGH',
      retryable: false,
      command,
      timeoutMs,
      ...context,
    });
    this.name = 'CommandTimeoutError';
  }
}

/**
 * Credential bundle errors
 */
export class CredentialError extends DeckhandError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      category: 'CREDENTIALS',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'CredentialError';
  }
}

/**
 * Remote session errors
 */
export class SshConnectionError extends DeckhandError {
  constructor(target: string, detail: string, context: Partial<ErrorContext> = {}) {
    super(`SSH connection to ${target} failed: ${detail}`, 'E3002', {
      category: 'REMOTE',
      severity: 'HIGH',
      retryable: false,
      target,
      ...context,
    });
    this.name = 'SshConnectionError';
  }
}

export class RemoteCommandError extends DeckhandError {
  public readonly step: string;
  public readonly exitCode: number;

  constructor(step: string, exitCode: number, stderr: string, context: Partial<ErrorContext> = {}) {
    super(`Remote ${step} failed with exit code ${exitCode}${stderr ? `: ${stderr.trim()}` : ''}`, 'E3003', {
      category: 'REMOTE',
      severity: 'HIGH',
      retryable: false,
      step,
      exitCode,
      ...context,
    });
    this.name = 'RemoteCommandError';
    this.step = step;
    this.exitCode = exitCode;
  }
}

export class PromotionLockedError extends DeckhandError {
  constructor(lockKey: string, heldSince: Date, context: Partial<ErrorContext> = {}) {
    super(`Promotion for ${lockKey} is already running (since ${heldSince.toISOString()})`, 'E3004', {
      category: 'REMOTE',
      severity: 'MEDIUM',
      retryable: false,
      lockKey,
      ...context,
    });
    this.name = 'PromotionLockedError';
  }
}

/**
 * Container image errors
 */
export class ImageBuildError extends DeckhandError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E4001', {
      category: 'IMAGE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'ImageBuildError';
  }
}

/**
 * State machine errors
 */
export class InvalidTransitionError extends DeckhandError {
  constructor(fromState: string, toState: string, context: Partial<ErrorContext> = {}) {
    super(`Invalid state transition: ${fromState} -> ${toState}`, 'E5001', {
      category: 'STATE_MACHINE',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidTransitionError';
  }
}

export class PromotionGateError extends DeckhandError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E5002', {
      category: 'PIPELINE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'PromotionGateError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof DeckhandError) {
    return error.context.retryable;
  }
  return false;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): DeckhandError {
  if (error instanceof DeckhandError) {
    return error;
  }

  if (error instanceof Error) {
    return new DeckhandError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new DeckhandError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
