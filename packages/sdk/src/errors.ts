/**
 * Error types for CouchDB tool operations
 *
 * Invariants:
 * - Every error has a stable `kind` from the fixed taxonomy and a stable `name`
 * - Argument errors may carry a `subKind` naming the component that rejected them
 * - Backend errors carry the HTTP status, CouchDB error code and reason verbatim
 * - All errors support a `cause` property for wrapping underlying errors
 */

import type { ErrorKind, ErrorPayload, InvalidArgumentSubKind } from "./types.js";

/**
 * Base class for all errors surfaced to the calling agent
 */
export abstract class CouchMcpError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toPayload(): ErrorPayload {
    return { kind: this.kind, message: this.message };
  }
}

/**
 * Thrown when the tool name is not in the fixed set
 */
export class UnknownOperationError extends CouchMcpError {
  readonly kind = "UnknownOperation";

  constructor(public readonly tool: string, options?: ErrorOptions) {
    super(`Unknown tool: ${tool}`, options);
  }
}

/**
 * Thrown when a required argument is missing or has the wrong type
 */
export class InvalidArgumentError extends CouchMcpError {
  readonly kind = "InvalidArgument";
  readonly subKind: InvalidArgumentSubKind | undefined;

  constructor(message: string, subKind?: InvalidArgumentSubKind, options?: ErrorOptions) {
    super(message, options);
    this.subKind = subKind;
  }

  override toPayload(): ErrorPayload {
    return this.subKind
      ? { kind: this.kind, subKind: this.subKind, message: this.message }
      : { kind: this.kind, message: this.message };
  }
}

export class MissingRevisionError extends InvalidArgumentError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "MissingRevision", options);
  }
}

export class InvalidPaginationError extends InvalidArgumentError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "InvalidPagination", options);
  }
}

export class InvalidIndexSpecError extends InvalidArgumentError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "InvalidIndexSpec", options);
  }
}

export class InvalidSelectorError extends InvalidArgumentError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "InvalidSelector", options);
  }
}

/**
 * Fields shared by errors derived from a backend HTTP response
 */
export interface BackendFailure {
  status: number;
  error?: string;
  reason?: string;
}

function withBackendFields(payload: ErrorPayload, failure: BackendFailure): ErrorPayload {
  const out: ErrorPayload = { ...payload, status: failure.status };
  if (failure.error !== undefined) out.error = failure.error;
  if (failure.reason !== undefined) out.reason = failure.reason;
  return out;
}

/**
 * Thrown when the referenced database or document does not exist
 */
export class NotFoundError extends CouchMcpError {
  readonly kind = "NotFound";

  constructor(message: string, public readonly failure: BackendFailure, options?: ErrorOptions) {
    super(message, options);
  }

  override toPayload(): ErrorPayload {
    return withBackendFields(super.toPayload(), this.failure);
  }
}

/**
 * Thrown when the supplied revision does not match the document's current state
 */
export class RevisionConflictError extends CouchMcpError {
  readonly kind = "RevisionConflict";

  constructor(message: string, public readonly failure: BackendFailure, options?: ErrorOptions) {
    super(message, options);
  }

  override toPayload(): ErrorPayload {
    return withBackendFields(super.toPayload(), this.failure);
  }
}

/**
 * Thrown when the backend cannot be reached at all
 */
export class BackendUnavailableError extends CouchMcpError {
  readonly kind = "BackendUnavailable";
}

/**
 * Thrown for every other backend-reported failure
 */
export class BackendError extends CouchMcpError {
  readonly kind = "BackendError";

  constructor(message: string, public readonly failure: BackendFailure, options?: ErrorOptions) {
    super(message, options);
  }

  override toPayload(): ErrorPayload {
    return withBackendFields(super.toPayload(), this.failure);
  }
}

/**
 * Thrown by transports on transport-level failure (connection refused, DNS, timeout, abort).
 * HTTP error statuses are never thrown as TransportError.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * Convert any thrown value to the structured payload returned to the caller
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof CouchMcpError) {
    return error.toPayload();
  }
  if (error instanceof TransportError) {
    return { kind: "BackendUnavailable", message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: "BackendError", message };
}
