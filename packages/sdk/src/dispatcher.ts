/**
 * Operation dispatcher: the single entry point for tool calls
 *
 * For every call:
 *  1. Reject unknown tool names before touching the backend
 *  2. Validate base arguments with the tool's schema
 *  3. Delegate to the selector, revision, pagination and index components
 *  4. Issue exactly one backend request (no retries, no revision prefetch)
 *  5. Normalize the response, or classify the failure into the error taxonomy
 *
 * dispatch() never throws: failures come back as { ok: false, error }.
 */

import type { z } from "zod";
import {
  BackendError,
  BackendUnavailableError,
  InvalidArgumentError,
  NotFoundError,
  RevisionConflictError,
  TransportError,
  UnknownOperationError,
  toErrorPayload,
  type BackendFailure,
} from "./errors.js";
import { describeCoverage, indexRequestBody, resolveIndexSpec } from "./indexes.js";
import { resolvePage } from "./pagination.js";
import {
  isRevisionConflict,
  requireRevision,
  resolveUpdateRevision,
  revisionConflict,
  withRevision,
} from "./revision.js";
import {
  AllDbsResponseSchema,
  AllDocsResponseSchema,
  CouchErrorBodySchema,
  CreateDocumentInputSchema,
  CreateIndexInputSchema,
  CreateIndexResponseSchema,
  DatabaseLifecycleInputSchema,
  DeleteDocumentInputSchema,
  DocumentSchema,
  FindResponseSchema,
  GetDocumentInputSchema,
  ListDatabasesInputSchema,
  ListDocumentsInputSchema,
  ListIndexesInputSchema,
  ListIndexesResponseSchema,
  OkResponseSchema,
  SearchDocumentsInputSchema,
  UpdateDocumentInputSchema,
  WriteResponseSchema,
} from "./schemas.js";
import { buildSelector } from "./selector.js";
import { encodePath, type CouchRequest, type CouchResponse, type CouchTransport } from "./transport.js";
import { isToolName, type ToolName, type ToolResult } from "./types.js";

export const EMPTY_SEARCH_NOTE =
  "No documents matched the query. To verify documents exist, use couchdb_list_documents with include_docs=true";

/**
 * Minimal logging hook; the server passes its structured logger
 */
export interface DispatchLogger {
  debug(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
}

export interface DispatcherOptions {
  logger?: DispatchLogger;
}

export interface DispatchOptions {
  /** Aborts the in-flight backend request */
  signal?: AbortSignal;
}

type ToolData = Record<string, unknown>;
type Handler = (args: unknown, signal: AbortSignal | undefined) => Promise<ToolData>;

/**
 * What a failed request was about, used to word and classify the error
 */
interface FailureContext {
  subject: string;
  docId?: string;
  revisionSupplied?: boolean;
  creating?: boolean;
}

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join(", ");
    throw new InvalidArgumentError(`Validation error: ${details}`);
  }
  return result.data;
}

function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  res: CouchResponse,
  what: string
): z.infer<T> {
  const result = schema.safeParse(res.body);
  if (!result.success) {
    throw new BackendError(`Unexpected response from CouchDB for ${what}`, { status: res.status });
  }
  return result.data;
}

function databaseSubject(database: string): string {
  return `database "${database}"`;
}

function documentSubject(database: string, docId: string): string {
  return `document "${docId}" in database "${database}"`;
}

/**
 * Map a non-2xx response into the error taxonomy
 */
export function classifyFailure(res: CouchResponse, ctx: FailureContext): Error {
  const parsed = CouchErrorBodySchema.safeParse(res.body);
  const failure: BackendFailure = { status: res.status };
  if (parsed.success) {
    if (parsed.data.error !== undefined) failure.error = parsed.data.error;
    if (parsed.data.reason !== undefined) failure.reason = parsed.data.reason;
  }

  if (res.status === 404) {
    const suffix = failure.reason ? ` (${failure.reason})` : "";
    return new NotFoundError(`Not found: ${ctx.subject}${suffix}`, failure);
  }

  if (isRevisionConflict(failure, ctx.revisionSupplied ?? false)) {
    if (ctx.creating) {
      return new RevisionConflictError(
        `${ctx.subject} already exists; use couchdb_update_document with its current _rev to modify it`,
        failure
      );
    }
    if (ctx.docId !== undefined) {
      return revisionConflict(failure, ctx.docId);
    }
    return new RevisionConflictError(`Conflict on ${ctx.subject}: ${failure.reason ?? "conflict"}`, failure);
  }

  const code = failure.error ? ` ${failure.error}` : "";
  const reason = failure.reason ? `: ${failure.reason}` : "";
  return new BackendError(`CouchDB returned HTTP ${res.status}${code}${reason} for ${ctx.subject}`, failure);
}

export class OperationDispatcher {
  #transport: CouchTransport;
  #logger: DispatchLogger | undefined;

  #handlers: Record<ToolName, Handler> = {
    couchdb_list_databases: (args, signal) => this.#listDatabases(args, signal),
    couchdb_create_database: (args, signal) => this.#createDatabase(args, signal),
    couchdb_delete_database: (args, signal) => this.#deleteDatabase(args, signal),
    couchdb_create_document: (args, signal) => this.#createDocument(args, signal),
    couchdb_get_document: (args, signal) => this.#getDocument(args, signal),
    couchdb_update_document: (args, signal) => this.#updateDocument(args, signal),
    couchdb_delete_document: (args, signal) => this.#deleteDocument(args, signal),
    couchdb_list_documents: (args, signal) => this.#listDocuments(args, signal),
    couchdb_search_documents: (args, signal) => this.#searchDocuments(args, signal),
    couchdb_create_index: (args, signal) => this.#createIndex(args, signal),
    couchdb_list_indexes: (args, signal) => this.#listIndexes(args, signal),
  };

  constructor(transport: CouchTransport, options: DispatcherOptions = {}) {
    this.#transport = transport;
    this.#logger = options.logger;
  }

  /**
   * Dispatch one tool call. Always resolves; failures are returned as structured errors.
   */
  async dispatch(tool: string, args: unknown, options: DispatchOptions = {}): Promise<ToolResult> {
    try {
      if (!isToolName(tool)) {
        throw new UnknownOperationError(tool);
      }
      const data = await this.#handlers[tool](args ?? {}, options.signal);
      return { ok: true, tool, data };
    } catch (err) {
      const error = toErrorPayload(err);
      this.#logger?.warn("dispatch.error", {
        tool,
        kind: error.kind,
        sub_kind: error.subKind,
        status: error.status,
      });
      return { ok: false, tool, error };
    }
  }

  async #send(req: CouchRequest, ctx: FailureContext): Promise<CouchResponse> {
    this.#logger?.debug("dispatch.request", { method: req.method, path: encodePath(req.path) });

    let res: CouchResponse;
    try {
      res = await this.#transport.request(req);
    } catch (err) {
      if (err instanceof TransportError) {
        throw new BackendUnavailableError(err.message, { cause: err });
      }
      throw err;
    }

    if (res.status >= 200 && res.status < 300) {
      return res;
    }
    throw classifyFailure(res, ctx);
  }

  async #listDatabases(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    parseArgs(ListDatabasesInputSchema, args);
    const res = await this.#send(
      { method: "GET", path: ["_all_dbs"], signal },
      { subject: "database listing" }
    );
    const databases = parseResponse(AllDbsResponseSchema, res, "_all_dbs");
    return { databases, count: databases.length };
  }

  async #createDatabase(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    const { name } = parseArgs(DatabaseLifecycleInputSchema, args);
    const res = await this.#send({ method: "PUT", path: [name], signal }, { subject: databaseSubject(name) });
    parseResponse(OkResponseSchema, res, `PUT /${name}`);
    return { ok: true, database: name, message: `Database '${name}' created successfully` };
  }

  async #deleteDatabase(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    const { name } = parseArgs(DatabaseLifecycleInputSchema, args);
    const res = await this.#send(
      { method: "DELETE", path: [name], signal },
      { subject: databaseSubject(name) }
    );
    parseResponse(OkResponseSchema, res, `DELETE /${name}`);
    return { ok: true, database: name, message: `Database '${name}' deleted successfully` };
  }

  async #createDocument(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    const { database, document, doc_id } = parseArgs(CreateDocumentInputSchema, args);

    if (document._rev !== undefined) {
      throw new InvalidArgumentError(
        "document must not carry _rev when creating; use couchdb_update_document to modify an existing document"
      );
    }
    if (doc_id !== undefined && document._id !== undefined && document._id !== doc_id) {
      throw new InvalidArgumentError(
        `doc_id "${doc_id}" does not match document._id "${document._id}"`
      );
    }

    const id = doc_id ?? document._id;
    const req: CouchRequest =
      id === undefined
        ? { method: "POST", path: [database], body: document, signal }
        : { method: "PUT", path: [database, id], body: { ...document, _id: id }, signal };
    const subject = id === undefined ? databaseSubject(database) : documentSubject(database, id);

    const res = await this.#send(req, { subject, docId: id, creating: true });
    const written = parseResponse(WriteResponseSchema, res, "document create");
    return { id: written.id, rev: written.rev, message: "Document created successfully" };
  }

  async #getDocument(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    const { database, doc_id } = parseArgs(GetDocumentInputSchema, args);
    const res = await this.#send(
      { method: "GET", path: [database, doc_id], signal },
      { subject: documentSubject(database, doc_id), docId: doc_id }
    );
    const document = parseResponse(DocumentSchema, res, "document read");
    return { document };
  }

  async #updateDocument(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    const { database, doc_id, document, rev } = parseArgs(UpdateDocumentInputSchema, args);

    if (document._id !== undefined && document._id !== doc_id) {
      throw new InvalidArgumentError(
        `doc_id "${doc_id}" does not match document._id "${document._id}"`
      );
    }
    const currentRev = resolveUpdateRevision(document, rev, doc_id);

    const res = await this.#send(
      {
        method: "PUT",
        path: [database, doc_id],
        body: withRevision(document, doc_id, currentRev),
        signal,
      },
      { subject: documentSubject(database, doc_id), docId: doc_id, revisionSupplied: true }
    );
    const written = parseResponse(WriteResponseSchema, res, "document update");
    return {
      id: written.id,
      rev: written.rev,
      previous_rev: currentRev,
      message: "Document updated successfully",
    };
  }

  async #deleteDocument(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    const { database, doc_id, rev } = parseArgs(DeleteDocumentInputSchema, args);
    const currentRev = requireRevision(rev, doc_id);

    const res = await this.#send(
      { method: "DELETE", path: [database, doc_id], query: { rev: currentRev }, signal },
      { subject: documentSubject(database, doc_id), docId: doc_id, revisionSupplied: true }
    );
    const written = parseResponse(WriteResponseSchema, res, "document delete");
    return {
      ok: true,
      id: written.id,
      rev: written.rev,
      message: `Document '${doc_id}' deleted successfully`,
    };
  }

  async #listDocuments(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    const input = parseArgs(ListDocumentsInputSchema, args);
    const page = resolvePage(input);
    const includeDocs = input.include_docs ?? false;

    const res = await this.#send(
      {
        method: "GET",
        path: [input.database, "_all_docs"],
        query: { limit: page.limit, skip: page.skip, include_docs: includeDocs },
        signal,
      },
      { subject: databaseSubject(input.database) }
    );
    const listing = parseResponse(AllDocsResponseSchema, res, "_all_docs");

    const documents = includeDocs
      ? listing.rows.flatMap((row) => (row.doc ? [row.doc] : []))
      : listing.rows.map((row) => ({ id: row.id, key: row.key, value: row.value }));

    return {
      documents,
      count: documents.length,
      total_rows: listing.total_rows,
      offset: listing.offset,
    };
  }

  async #searchDocuments(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    const input = parseArgs(SearchDocumentsInputSchema, args);
    const selector = buildSelector(input.query);
    const page = resolvePage(input);

    const body: Record<string, unknown> = { selector, limit: page.limit, skip: page.skip };
    if (input.fields !== undefined) {
      body.fields = input.fields;
    }

    const res = await this.#send(
      { method: "POST", path: [input.database, "_find"], body, signal },
      { subject: databaseSubject(input.database) }
    );
    const found = parseResponse(FindResponseSchema, res, "_find");

    const data: ToolData = { docs: found.docs, count: found.docs.length };
    // Index coverage is the backend's call; its warning is surfaced verbatim
    if (found.warning !== undefined) {
      data.warning = found.warning;
    }
    if (found.docs.length === 0) {
      data.note = EMPTY_SEARCH_NOTE;
    }
    return data;
  }

  async #createIndex(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    const input = parseArgs(CreateIndexInputSchema, args);
    const spec = resolveIndexSpec(input);

    const res = await this.#send(
      { method: "POST", path: [input.database, "_index"], body: indexRequestBody(spec), signal },
      { subject: databaseSubject(input.database) }
    );
    const created = parseResponse(CreateIndexResponseSchema, res, "_index");

    return {
      result: created.result,
      id: created.id,
      name: created.name,
      fields: spec.fields,
      coverage: describeCoverage(spec),
      message: `Index ${created.result === "exists" ? "already exists" : "created successfully"} on fields: ${spec.fields.join(", ")}`,
    };
  }

  async #listIndexes(args: unknown, signal?: AbortSignal): Promise<ToolData> {
    const { database } = parseArgs(ListIndexesInputSchema, args);
    const res = await this.#send(
      { method: "GET", path: [database, "_index"], signal },
      { subject: databaseSubject(database) }
    );
    const listing = parseResponse(ListIndexesResponseSchema, res, "_index");
    return { indexes: listing.indexes, count: listing.indexes.length, total_rows: listing.total_rows };
  }
}
