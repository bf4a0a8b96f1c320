/**
 * Error taxonomy shared by the provider, lookup and resource layers
 */
import type { ZodError } from 'zod';
import type { RuleCollection } from '../types/index.js';

export type FirewallErrorCode = 'UPSTREAM_ERROR' | 'NOT_FOUND' | 'VALIDATION_ERROR' | 'INVALID_IMPORT_ID';

/**
 * Base class for all errors raised by this package
 */
export class FirewallResourceError extends Error {
  constructor(
    message: string,
    public readonly code: FirewallErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FirewallResourceError';
  }
}

/**
 * A remote call failed (network, authentication, 4xx/5xx, malformed response).
 * Never retried here; the SDK transport owns retry policy.
 */
export class UpstreamError extends FirewallResourceError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'UPSTREAM_ERROR', options);
    this.name = 'UpstreamError';
  }

  /**
   * Wrap an arbitrary failure, keeping an existing UpstreamError as is
   */
  static from(error: unknown, message: string, status?: number): UpstreamError {
    if (error instanceof UpstreamError) {
      return error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new UpstreamError(`${message}: ${detail}`, status, { cause: error });
  }

  isNotFound(): boolean {
    return this.status === 404;
  }
}

/**
 * The requested rule does not exist in the scanned collection
 */
export class NotFoundError extends FirewallResourceError {
  constructor(
    public readonly collection: RuleCollection,
    public readonly ruleId: string
  ) {
    super(`cannot find ${collection.kind} firewall access rule for ID ${ruleId}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Desired-state input failed schema validation
 */
export class ValidationError extends FirewallResourceError {
  constructor(
    message: string,
    public readonly issues: { field: string; message: string }[] = []
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }

  static fromZod(resource: string, error: ZodError): ValidationError {
    const issues = error.errors.map((err) => ({
      field: err.path.join('.'),
      message: err.message,
    }));
    const summary = issues.map((i) => (i.field ? `${i.field}: ${i.message}` : i.message)).join('; ');
    return new ValidationError(`Invalid ${resource}: ${summary}`, issues);
  }
}

export class ImportIdError extends FirewallResourceError {
  constructor(public readonly importId: string) {
    super(
      `invalid id ("${importId}") specified, should be in format "scope/zoneName/ruleID"`,
      'INVALID_IMPORT_ID'
    );
    this.name = 'ImportIdError';
  }
}
