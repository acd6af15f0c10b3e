// ============================================================
// Error Types
// ============================================================

import type { ZodError } from 'zod';
import type { GatewayErrorKind } from './types/index.js';

/**
 * Normalised failure from the exchange gateway.
 * Raw venue errors are classified into a kind at the gateway boundary.
 */
export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;

  constructor(kind: GatewayErrorKind, message: string) {
    super(message);
    this.name = 'GatewayError';
    this.kind = kind;
  }

  /** Rate limiting and timeouts are worth retrying; everything else is not. */
  get isTransient(): boolean {
    return this.kind === 'RateLimited' || this.kind === 'Timeout';
  }
}

export class PersistenceError extends Error {
  constructor(operation: string, message: string) {
    super(`${operation} failed: ${message}`);
    this.name = 'PersistenceError';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wrap anything thrown by a gateway call into a GatewayError. */
export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  return new GatewayError('Unknown', errorMessage(err));
}

/** "field: message; ..." for a failed zod parse. */
export function describeIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}
