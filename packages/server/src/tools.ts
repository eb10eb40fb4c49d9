/**
 * MCP tool definitions and the call handler for CouchDB tools
 * Every call returns a text summary followed by the JSON result as text
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { OperationDispatcher, ToolName, ToolResult } from "@couchdb-mcp/sdk";
import type { Logger } from "./observability/logger.js";
import { metrics as defaultMetrics, recordToolExecution, type MetricsRegistry } from "./observability/metrics.js";

export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

const database = { type: "string", description: "Database name" };
const docId = { type: "string", description: "Document ID" };
const limit = {
  type: "integer",
  minimum: 0,
  description: "Maximum number of results (default 25)",
};
const skip = { type: "integer", minimum: 0, description: "Number of results to skip (default 0)" };

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions: ToolDefinition[] = [
  {
    name: "couchdb_list_databases",
    description: "List all databases on the CouchDB server",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "couchdb_create_database",
    description: "Create a new database",
    inputSchema: {
      type: "object",
      properties: { name: { type: "string", description: "Name of the database to create" } },
      required: ["name"],
    },
  },
  {
    name: "couchdb_delete_database",
    description: "Delete a database and every document in it",
    inputSchema: {
      type: "object",
      properties: { name: { type: "string", description: "Name of the database to delete" } },
      required: ["name"],
    },
  },
  {
    name: "couchdb_create_document",
    description:
      "Create a new document. Fails with RevisionConflict if a document with the same ID already exists.",
    inputSchema: {
      type: "object",
      properties: {
        database,
        document: { type: "object", description: "Document content (must not contain _rev)" },
        doc_id: { type: "string", description: "Optional document ID; generated by CouchDB when omitted" },
      },
      required: ["database", "document"],
    },
  },
  {
    name: "couchdb_get_document",
    description: "Retrieve a document by ID, including its current _rev",
    inputSchema: {
      type: "object",
      properties: { database, doc_id: docId },
      required: ["database", "doc_id"],
    },
  },
  {
    name: "couchdb_update_document",
    description:
      "Replace a document. The current revision is required (document._rev or rev); a stale revision fails with RevisionConflict and nothing is written.",
    inputSchema: {
      type: "object",
      properties: {
        database,
        doc_id: docId,
        document: { type: "object", description: "New document content, including _rev" },
        rev: { type: "string", description: "Current revision, if not given as document._rev" },
      },
      required: ["database", "doc_id", "document"],
    },
  },
  {
    name: "couchdb_delete_document",
    description: "Delete a document. The current revision is required.",
    inputSchema: {
      type: "object",
      properties: {
        database,
        doc_id: docId,
        rev: { type: "string", description: "Current document revision" },
      },
      required: ["database", "doc_id", "rev"],
    },
  },
  {
    name: "couchdb_list_documents",
    description: "List documents in a database ordered by ID",
    inputSchema: {
      type: "object",
      properties: {
        database,
        limit,
        skip,
        include_docs: { type: "boolean", description: "Return full documents instead of ID/rev rows" },
      },
      required: ["database"],
    },
  },
  {
    name: "couchdb_search_documents",
    description:
      "Search documents with a Mango selector (supports $eq, $ne, $gt, $gte, $lt, $lte, $regex, $in, $nin, $exists, $all, $size, $mod, $type, $elemMatch, $allMatch, $and, $or, $nor, $not). An empty selector matches every document.",
    inputSchema: {
      type: "object",
      properties: {
        database,
        query: { type: "object", description: "Mango selector, e.g. {\"type\": \"user\", \"age\": {\"$gt\": 18}}" },
        limit,
        skip,
        fields: { type: "array", items: { type: "string" }, description: "Fields to return" },
      },
      required: ["database", "query"],
    },
  },
  {
    name: "couchdb_create_index",
    description:
      "Create an index on the given fields, in order. An index on [a, b] serves selectors on a, or on a and b, but not on b alone. Creating an identical index again reports that it exists.",
    inputSchema: {
      type: "object",
      properties: {
        database,
        fields: { type: "array", items: { type: "string" }, description: "Fields to index, in order" },
        index_name: { type: "string", description: "Optional index name" },
        type: { type: "string", enum: ["json", "text"], description: "Index type (default json)" },
      },
      required: ["database", "fields"],
    },
  },
  {
    name: "couchdb_list_indexes",
    description: "List the indexes of a database",
    inputSchema: {
      type: "object",
      properties: { database },
      required: ["database"],
    },
  },
];

function countOf(data: Record<string, unknown>): number {
  return typeof data.count === "number" ? data.count : 0;
}

/**
 * One-line human summary of a tool result
 */
export function summarize(result: ToolResult): string {
  if (!result.ok) {
    const kind = result.error.subKind ? `${result.error.kind}/${result.error.subKind}` : result.error.kind;
    return `Error (${kind}): ${result.error.message}`;
  }

  const { data } = result;
  if (typeof data.message === "string") {
    return data.message;
  }
  switch (result.tool) {
    case "couchdb_list_databases":
      return `Found ${countOf(data)} databases`;
    case "couchdb_get_document":
      return "Retrieved document";
    case "couchdb_list_documents":
      return `Found ${countOf(data)} documents`;
    case "couchdb_search_documents":
      return `Found ${countOf(data)} matching documents`;
    case "couchdb_list_indexes":
      return `Found ${countOf(data)} indexes`;
    default:
      return "OK";
  }
}

/**
 * Convert a dispatcher result to MCP tool content
 */
export function toCallToolResult(result: ToolResult): CallToolResult {
  const body = result.ok ? result.data : { error: result.error };
  return {
    content: [
      { type: "text", text: summarize(result) },
      { type: "text", text: JSON.stringify(body, null, 2) },
    ],
    isError: !result.ok,
  };
}

export interface ToolHandlerOptions {
  logger: Logger;
  metrics?: MetricsRegistry;
}

export type ToolHandler = (name: string, args: unknown, signal?: AbortSignal) => Promise<CallToolResult>;

/**
 * Wrap the dispatcher with timing, logging and metrics
 */
export function createToolHandler(dispatcher: OperationDispatcher, options: ToolHandlerOptions): ToolHandler {
  const registry = options.metrics ?? defaultMetrics;

  return async (name, args, signal) => {
    const startTime = Date.now();
    const result = await dispatcher.dispatch(name, args, { signal });
    const duration = Date.now() - startTime;

    const error = result.ok ? undefined : result.error;
    options.logger.toolCall(name, duration, error);
    recordToolExecution(registry, name, duration, error?.kind);

    return toCallToolResult(result);
  };
}
