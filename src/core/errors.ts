/**
 * Error taxonomy
 * Every failure surfaced to callers is one of these, so transports can tell
 * "your input was invalid" apart from "retry later".
 */

import type { ZodError } from 'zod';

export type ErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'CONFIGURATION'
  | 'CONFLICT'
  | 'TRANSIENT_STORE'
  | 'BUSY'
  | 'CANCELLED';

export class KnowledgeRouterError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, retryable: boolean, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
    this.details = details;
  }
}

/** Malformed input: unknown ids, invalid decision values, bad windows */
export class ValidationError extends KnowledgeRouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION', message, false, details);
  }
}

export class NotFoundError extends KnowledgeRouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, false, details);
  }
}

/** Fatal until an operator fixes the configuration */
export class ConfigurationError extends KnowledgeRouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION', message, false, details);
  }
}

/** Lost a compare-and-set; re-fetch and retry */
export class ConflictError extends KnowledgeRouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, false, details);
  }
}

export class TransientStoreError extends KnowledgeRouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TRANSIENT_STORE', message, true, details);
  }
}

/** A consolidation run already holds the job lock */
export class BusyError extends KnowledgeRouterError {
  constructor(jobName: string, heldBy?: string) {
    super('BUSY', `Job "${jobName}" is already running`, true, { jobName, heldBy });
  }
}

export class CancelledError extends KnowledgeRouterError {
  constructor(message = 'Run cancelled before commit') {
    super('CANCELLED', message, true);
  }
}

export function isKnowledgeRouterError(error: unknown): error is KnowledgeRouterError {
  return error instanceof KnowledgeRouterError;
}

/**
 * Convert a zod failure into a ValidationError listing the offending paths
 */
export function validationErrorFromZod(context: string, error: ZodError): ValidationError {
  const issues = error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
  return new ValidationError(`${context}: ${issues.join('; ')}`, { issues });
}
