/**
 * Integration tests for MCP tools
 * Tests the full flow of tool execution against the in-process fake backend
 */

import { describe, it, expect, beforeEach } from "vitest";
import { OperationDispatcher, TOOL_NAMES } from "@couchdb-mcp/sdk";
import { FakeCouchTransport } from "@couchdb-mcp/testkit";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { createToolHandler, toolDefinitions, type ToolHandler } from "../../tools.js";
import { Logger } from "../../observability/logger.js";
import { MetricsRegistry } from "../../observability/metrics.js";

function textAt(result: CallToolResult, index: number): string {
  const item = result.content[index];
  if (item?.type !== "text") {
    throw new Error(`expected text content at ${index}`);
  }
  return item.text;
}

function jsonOf(result: CallToolResult) {
  return JSON.parse(textAt(result, 1));
}

describe("Tool integration tests", () => {
  let couch: FakeCouchTransport;
  let registry: MetricsRegistry;
  let logLines: string[];
  let handle: ToolHandler;

  beforeEach(() => {
    couch = new FakeCouchTransport();
    registry = new MetricsRegistry();
    logLines = [];
    const logger = new Logger("debug", (line) => logLines.push(line));
    handle = createToolHandler(new OperationDispatcher(couch, { logger }), { logger, metrics: registry });
  });

  it("should define every tool exactly once", () => {
    expect(toolDefinitions.map((t) => t.name)).toEqual([...TOOL_NAMES]);
  });

  describe("documents", () => {
    beforeEach(async () => {
      await handle("couchdb_create_database", { name: "tasks" });
    });

    it("should store and retrieve a document", async () => {
      const created = await handle("couchdb_create_document", {
        database: "tasks",
        doc_id: "task-1",
        document: { title: "Test Task", status: "open" },
      });

      expect(created.isError).toBe(false);
      expect(created.content).toHaveLength(2);
      expect(textAt(created, 0)).toBe("Document created successfully");
      const { rev } = jsonOf(created);

      const read = await handle("couchdb_get_document", { database: "tasks", doc_id: "task-1" });
      expect(textAt(read, 0)).toBe("Retrieved document");
      expect(jsonOf(read)).toEqual({
        document: { _id: "task-1", _rev: rev, title: "Test Task", status: "open" },
      });
    });

    it("should return structured errors as tool results", async () => {
      const result = await handle("couchdb_get_document", { database: "tasks", doc_id: "missing-1" });

      expect(result.isError).toBe(true);
      expect(textAt(result, 0)).toBe('Error (NotFound): Not found: document "missing-1" in database "tasks" (missing)');
      expect(jsonOf(result)).toEqual({
        error: {
          kind: "NotFound",
          message: 'Not found: document "missing-1" in database "tasks" (missing)',
          status: 404,
          error: "not_found",
          reason: "missing",
        },
      });
    });

    it("should name the sub-kind of argument errors", async () => {
      const result = await handle("couchdb_delete_document", { database: "tasks", doc_id: "task-1" });

      expect(textAt(result, 0)).toMatch(/^Error \(InvalidArgument\/MissingRevision\): /);
    });
  });

  describe("search", () => {
    beforeEach(() => {
      couch.seed("tasks", [
        { _id: "t1", status: "open", priority: 5 },
        { _id: "t2", status: "closed", priority: 8 },
        { _id: "t3", status: "open", priority: 3 },
      ]);
    });

    it("should summarize matches and pass the warning through", async () => {
      const result = await handle("couchdb_search_documents", {
        database: "tasks",
        query: { status: "open", priority: { $gt: 4 } },
      });

      expect(textAt(result, 0)).toBe("Found 1 matching documents");
      const data = jsonOf(result);
      expect(data.docs.map((d: { _id: string }) => d._id)).toEqual(["t1"]);
      expect(data.warning).toMatch(/No matching index/);
    });

    it("should summarize listings", async () => {
      const result = await handle("couchdb_list_documents", { database: "tasks", limit: 2 });

      expect(textAt(result, 0)).toBe("Found 2 documents");
      expect(jsonOf(result).total_rows).toBe(3);
    });
  });

  describe("observability", () => {
    it("should record calls, errors and latency", async () => {
      await handle("couchdb_list_databases", {});
      await handle("couchdb_delete_database", { name: "ghost" });

      expect(registry.getCounter("couchdb_mcp.tool.calls_total", { tool: "couchdb_list_databases" })).toBe(1);
      expect(
        registry.getCounter("couchdb_mcp.tool.errors_total", { tool: "couchdb_delete_database", kind: "NotFound" })
      ).toBe(1);
      expect(registry.getHistogram("couchdb_mcp.tool.latency_ms", { tool: "couchdb_list_databases" })?.count).toBe(1);
    });

    it("should log requests and tool outcomes", async () => {
      await handle("couchdb_delete_database", { name: "ghost" });

      const events = logLines.map((line) => JSON.parse(line).event);
      expect(events).toEqual(["dispatch.request", "dispatch.error", "tool.error"]);
    });
  });
});
