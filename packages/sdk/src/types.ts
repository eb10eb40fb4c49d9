/**
 * Core types shared by the dispatcher, the builders and the transports
 */

/**
 * Fixed set of tool names exposed to the calling agent
 */
export const TOOL_NAMES = [
  "couchdb_list_databases",
  "couchdb_create_database",
  "couchdb_delete_database",
  "couchdb_create_document",
  "couchdb_get_document",
  "couchdb_update_document",
  "couchdb_delete_document",
  "couchdb_list_documents",
  "couchdb_search_documents",
  "couchdb_create_index",
  "couchdb_list_indexes",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/**
 * Tools that never mutate backend state
 */
export const READ_ONLY_TOOLS: readonly ToolName[] = [
  "couchdb_list_databases",
  "couchdb_get_document",
  "couchdb_list_documents",
  "couchdb_search_documents",
  "couchdb_list_indexes",
];

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

/**
 * Document: arbitrary key-value map with two backend-assigned metadata fields
 * - _id: unique within its database
 * - _rev: opaque revision token, changes on every successful mutation
 */
export interface Document {
  _id?: string;
  _rev?: string;
  [key: string]: unknown;
}

/**
 * Page window applied to listing and search
 */
export interface PageWindow {
  limit: number;
  skip: number;
}

export type IndexKind = "json" | "text";

/**
 * Validated index specification. Field order is significant.
 */
export interface IndexSpec {
  fields: string[];
  name?: string;
  kind: IndexKind;
}

export type ErrorKind =
  | "UnknownOperation"
  | "InvalidArgument"
  | "NotFound"
  | "RevisionConflict"
  | "BackendUnavailable"
  | "BackendError";

export type InvalidArgumentSubKind =
  | "MissingRevision"
  | "InvalidPagination"
  | "InvalidIndexSpec"
  | "InvalidSelector";

/**
 * Structured error returned to the caller instead of a thrown fault
 */
export interface ErrorPayload {
  kind: ErrorKind;
  subKind?: InvalidArgumentSubKind;
  message: string;
  /** HTTP status reported by the backend */
  status?: number;
  /** CouchDB error code (e.g. "file_exists") */
  error?: string;
  /** CouchDB reason, verbatim */
  reason?: string;
}

export type ToolResult<T = Record<string, unknown>> =
  | { ok: true; tool: string; data: T }
  | { ok: false; tool: string; error: ErrorPayload };
