/**
 * Revision tracking for optimistic concurrency
 *
 * Every update and delete must carry the caller's best-known revision token.
 * The current revision is never fetched on the caller's behalf, and a rejected
 * revision is never retried: that would silently overwrite concurrent changes.
 */

import {
  InvalidArgumentError,
  MissingRevisionError,
  RevisionConflictError,
  type BackendFailure,
} from "./errors.js";
import type { Document } from "./types.js";

function presentRevision(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Require a revision token before a delete
 * @throws MissingRevisionError
 */
export function requireRevision(rev: unknown, docId: string): string {
  const token = presentRevision(rev);
  if (token === undefined) {
    throw new MissingRevisionError(
      `A revision token (rev) is required to delete document "${docId}"; read the document first to obtain its current _rev`
    );
  }
  return token;
}

/**
 * Resolve the revision for an update from document._rev or an explicit rev argument
 * @throws MissingRevisionError if neither is present
 * @throws InvalidArgumentError if both are present and differ
 */
export function resolveUpdateRevision(document: Document, rev: unknown, docId: string): string {
  const fromDoc = presentRevision(document._rev);
  const fromArg = presentRevision(rev);

  if (fromDoc !== undefined && fromArg !== undefined && fromDoc !== fromArg) {
    throw new InvalidArgumentError(
      `document._rev (${fromDoc}) and rev (${fromArg}) disagree for document "${docId}"`
    );
  }

  const token = fromDoc ?? fromArg;
  if (token === undefined) {
    throw new MissingRevisionError(
      `Updating document "${docId}" requires its current revision in document._rev; read the document first to obtain it`
    );
  }
  return token;
}

/**
 * Build the body for an update: caller's fields with _id and _rev pinned
 */
export function withRevision(document: Document, docId: string, rev: string): Document {
  return { ...document, _id: docId, _rev: rev };
}

/**
 * Whether a failed response means the supplied revision does not match the stored one.
 * 409 is the backend's conflict status; a malformed token is rejected with 400 and a
 * "rev format" reason, which is a mismatch from the caller's point of view.
 */
export function isRevisionConflict(failure: BackendFailure, revisionSupplied: boolean): boolean {
  if (failure.status === 409) {
    return true;
  }
  return (
    revisionSupplied &&
    failure.status === 400 &&
    (failure.reason ?? "").toLowerCase().includes("rev format")
  );
}

export function revisionConflict(failure: BackendFailure, docId: string): RevisionConflictError {
  return new RevisionConflictError(
    `Revision conflict on document "${docId}": the supplied revision is not the current one. Re-read the document and retry with its current _rev.`,
    failure
  );
}
