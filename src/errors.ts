// src/errors.ts

export type DashboardErrorKind =
  | 'connection'
  | 'auth'
  | 'notFound'
  | 'gone'
  | 'malformedObject'
  | 'action'
  | 'watchUnsupported'
  | 'config';

/**
 * Base class for every error the dashboard raises on purpose.
 * `kind` lets callers switch on the taxonomy without instanceof chains.
 */
export abstract class DashboardError extends Error {
  abstract readonly kind: DashboardErrorKind;

  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = new.target.name;
  }
}

/** Transient transport failure; retried with backoff */
export class ConnectionError extends DashboardError {
  readonly kind = 'connection';
}

/** Credentials rejected; fatal for the context until the operator re-authenticates */
export class AuthError extends DashboardError {
  readonly kind = 'auth';
}

export class NotFoundError extends DashboardError {
  readonly kind = 'notFound';
}

/** The requested revision is too old; recover with a fresh list */
export class GoneError extends DashboardError {
  readonly kind = 'gone';
}

export class MalformedObjectError extends DashboardError {
  readonly kind = 'malformedObject';
}

export class ActionError extends DashboardError {
  readonly kind = 'action';
}

/** The API server refuses watch requests for a kind (HTTP 405) */
export class WatchUnsupportedError extends DashboardError {
  readonly kind = 'watchUnsupported';
}

export class ConfigError extends DashboardError {
  readonly kind = 'config';
}

/**
 * Map an HTTP status from the API server to the error taxonomy.
 */
export function classifyHttpStatus(status: number, message: string): DashboardError {
  const text = `HTTP ${status}${message ? `: ${message}` : ''}`;
  if (status === 401 || status === 403) {
    return new AuthError(text, status);
  }
  if (status === 404) {
    return new NotFoundError(text, status);
  }
  if (status === 405) {
    return new WatchUnsupportedError(text, status);
  }
  if (status === 410) {
    return new GoneError(text, status);
  }
  return new ConnectionError(text, status);
}

/**
 * Permanent errors are surfaced immediately instead of being retried.
 */
export function isTransient(error: unknown): boolean {
  return error instanceof ConnectionError;
}

/**
 * Wrap anything thrown by the transport into a DashboardError.
 */
export function toDashboardError(error: unknown): DashboardError {
  if (error instanceof DashboardError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectionError(message);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
