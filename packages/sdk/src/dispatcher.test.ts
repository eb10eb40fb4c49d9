/**
 * Dispatcher tests against the in-process fake backend
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { FakeCouchTransport, NO_INDEX_WARNING } from "@couchdb-mcp/testkit";
import { OperationDispatcher, EMPTY_SEARCH_NOTE } from "./dispatcher.js";
import type { CouchTransport } from "./transport.js";
import type { ErrorPayload, ToolResult } from "./types.js";

function ok(result: ToolResult): Record<string, unknown> {
  if (!result.ok) {
    throw new Error(`expected success from ${result.tool}, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.data;
}

function failed(result: ToolResult): ErrorPayload {
  if (result.ok) {
    throw new Error(`expected failure from ${result.tool}`);
  }
  return result.error;
}

describe("OperationDispatcher", () => {
  let couch: FakeCouchTransport;
  let dispatcher: OperationDispatcher;

  beforeEach(() => {
    couch = new FakeCouchTransport();
    dispatcher = new OperationDispatcher(couch);
  });

  describe("conflict-safe update workflow", () => {
    it("should reject a stale revision and accept the current one", async () => {
      ok(await dispatcher.dispatch("couchdb_create_database", { name: "users" }));

      const created = ok(
        await dispatcher.dispatch("couchdb_create_document", {
          database: "users",
          doc_id: "u1",
          document: { type: "user", role: "admin" },
        })
      );
      expect(created.id).toBe("u1");
      expect(created.rev).toMatch(/^1-/);
      const staleRev = created.rev;

      const found = ok(
        await dispatcher.dispatch("couchdb_search_documents", { database: "users", query: { type: "user" } })
      );
      expect(found.count).toBe(1);
      expect(found.docs).toEqual([{ _id: "u1", _rev: staleRev, type: "user", role: "admin" }]);

      const updated = ok(
        await dispatcher.dispatch("couchdb_update_document", {
          database: "users",
          doc_id: "u1",
          document: { type: "user", role: "moderator" },
          rev: staleRev,
        })
      );
      expect(updated.previous_rev).toBe(staleRev);
      expect(updated.rev).toMatch(/^2-/);
      const currentRev = updated.rev;

      const requestsBefore = couch.requests.length;
      const conflict = failed(
        await dispatcher.dispatch("couchdb_update_document", {
          database: "users",
          doc_id: "u1",
          document: { type: "user", role: "owner" },
          rev: staleRev,
        })
      );
      expect(conflict).toEqual({
        kind: "RevisionConflict",
        message:
          'Revision conflict on document "u1": the supplied revision is not the current one. Re-read the document and retry with its current _rev.',
        status: 409,
        error: "conflict",
        reason: "Document update conflict.",
      });
      // No refetch or retry on conflict
      expect(couch.requests.length).toBe(requestsBefore + 1);
      expect(couch.currentRev("users", "u1")).toBe(currentRev);

      const retried = ok(
        await dispatcher.dispatch("couchdb_update_document", {
          database: "users",
          doc_id: "u1",
          document: { _rev: currentRev, type: "user", role: "owner" },
        })
      );
      expect(retried.rev).toMatch(/^3-/);
      expect(retried.rev).not.toBe(staleRev);
      expect(retried.rev).not.toBe(currentRev);
      expect(couch.currentRev("users", "u1")).toBe(retried.rev);
    });
  });

  describe("tool name and argument validation", () => {
    it("should reject unknown tools without contacting the backend", async () => {
      const result = await dispatcher.dispatch("couchdb_compact", {});

      expect(result).toEqual({
        ok: false,
        tool: "couchdb_compact",
        error: { kind: "UnknownOperation", message: "Unknown tool: couchdb_compact" },
      });
      expect(couch.requests).toHaveLength(0);
    });

    it("should report missing and mistyped base arguments", async () => {
      expect(failed(await dispatcher.dispatch("couchdb_get_document", { doc_id: "u1" }))).toEqual({
        kind: "InvalidArgument",
        message: "Validation error: database: database is required",
      });
      expect(failed(await dispatcher.dispatch("couchdb_list_indexes", { database: 5 })).message).toBe(
        "Validation error: database: database must be a string"
      );
      expect(failed(await dispatcher.dispatch("couchdb_create_database", { name: "" })).message).toBe(
        "Validation error: name: name must be non-empty"
      );
      expect(failed(await dispatcher.dispatch("couchdb_search_documents", { database: "users" })).message).toMatch(
        /query is required/
      );
      expect(couch.requests).toHaveLength(0);
    });

    it("should treat absent arguments as an empty bag", async () => {
      couch.seed("alpha");
      expect(ok(await dispatcher.dispatch("couchdb_list_databases", undefined))).toEqual({
        databases: ["alpha"],
        count: 1,
      });
    });

    it("should require a revision for delete and update", async () => {
      const del = failed(await dispatcher.dispatch("couchdb_delete_document", { database: "users", doc_id: "u1" }));
      expect(del.kind).toBe("InvalidArgument");
      expect(del.subKind).toBe("MissingRevision");

      const upd = failed(
        await dispatcher.dispatch("couchdb_update_document", {
          database: "users",
          doc_id: "u1",
          document: { role: "x" },
        })
      );
      expect(upd.subKind).toBe("MissingRevision");
      expect(couch.requests).toHaveLength(0);
    });

    it("should reject disagreeing revisions and mismatched ids", async () => {
      const revs = failed(
        await dispatcher.dispatch("couchdb_update_document", {
          database: "users",
          doc_id: "u1",
          document: { _rev: "1-a" },
          rev: "2-b",
        })
      );
      expect(revs.kind).toBe("InvalidArgument");
      expect(revs.subKind).toBeUndefined();

      const ids = failed(
        await dispatcher.dispatch("couchdb_update_document", {
          database: "users",
          doc_id: "u1",
          document: { _id: "u2", _rev: "1-a" },
        })
      );
      expect(ids.message).toBe('doc_id "u1" does not match document._id "u2"');
      expect(couch.requests).toHaveLength(0);
    });

    it("should reject create with a revision or a conflicting _id", async () => {
      const withRev = failed(
        await dispatcher.dispatch("couchdb_create_document", {
          database: "users",
          document: { _rev: "1-a", type: "user" },
        })
      );
      expect(withRev.kind).toBe("InvalidArgument");

      const mismatch = failed(
        await dispatcher.dispatch("couchdb_create_document", {
          database: "users",
          doc_id: "u1",
          document: { _id: "u9" },
        })
      );
      expect(mismatch.message).toBe('doc_id "u1" does not match document._id "u9"');
      expect(couch.requests).toHaveLength(0);
    });

    it("should reject bad pagination before the backend", async () => {
      const limit = failed(await dispatcher.dispatch("couchdb_list_documents", { database: "users", limit: -1 }));
      expect(limit).toEqual({
        kind: "InvalidArgument",
        subKind: "InvalidPagination",
        message: "limit must be a non-negative integer, got -1",
      });

      const skip = failed(
        await dispatcher.dispatch("couchdb_search_documents", { database: "users", query: {}, skip: "2" })
      );
      expect(skip.subKind).toBe("InvalidPagination");
      expect(couch.requests).toHaveLength(0);
    });

    it("should reject malformed selectors and index specs before the backend", async () => {
      const selector = failed(
        await dispatcher.dispatch("couchdb_search_documents", { database: "users", query: { age: { $gt: "x" } } })
      );
      expect(selector.subKind).toBe("InvalidSelector");

      const text = failed(
        await dispatcher.dispatch("couchdb_search_documents", { database: "users", query: "type:user" })
      );
      expect(text).toEqual({
        kind: "InvalidArgument",
        subKind: "InvalidSelector",
        message: "Selector must be a JSON object",
      });

      const index = failed(await dispatcher.dispatch("couchdb_create_index", { database: "users", fields: [] }));
      expect(index.subKind).toBe("InvalidIndexSpec");
      expect(couch.requests).toHaveLength(0);
    });
  });

  describe("databases", () => {
    it("should create, list and delete databases", async () => {
      expect(ok(await dispatcher.dispatch("couchdb_create_database", { name: "orders" }))).toEqual({
        ok: true,
        database: "orders",
        message: "Database 'orders' created successfully",
      });
      ok(await dispatcher.dispatch("couchdb_create_database", { name: "accounts" }));

      expect(ok(await dispatcher.dispatch("couchdb_list_databases", {}))).toEqual({
        databases: ["accounts", "orders"],
        count: 2,
      });

      expect(ok(await dispatcher.dispatch("couchdb_delete_database", { name: "orders" })).message).toBe(
        "Database 'orders' deleted successfully"
      );
    });

    it("should classify an existing database as a backend error", async () => {
      couch.seed("users");

      expect(failed(await dispatcher.dispatch("couchdb_create_database", { name: "users" }))).toEqual({
        kind: "BackendError",
        message:
          'CouchDB returned HTTP 412 file_exists: The database could not be created, the file already exists. for database "users"',
        status: 412,
        error: "file_exists",
        reason: "The database could not be created, the file already exists.",
      });
    });

    it("should pass backend name rules through as a backend error", async () => {
      const error = failed(await dispatcher.dispatch("couchdb_create_database", { name: "Users" }));
      expect(error.kind).toBe("BackendError");
      expect(error.status).toBe(400);
      expect(error.error).toBe("illegal_database_name");
    });

    it("should report a missing database as not found", async () => {
      expect(failed(await dispatcher.dispatch("couchdb_delete_database", { name: "ghost" }))).toEqual({
        kind: "NotFound",
        message: 'Not found: database "ghost" (Database does not exist.)',
        status: 404,
        error: "not_found",
        reason: "Database does not exist.",
      });
    });
  });

  describe("documents", () => {
    beforeEach(() => {
      couch.seed("users", [{ _id: "u1", type: "user", role: "admin" }]);
    });

    it("should read a document with its metadata", async () => {
      const data = ok(await dispatcher.dispatch("couchdb_get_document", { database: "users", doc_id: "u1" }));
      expect(data.document).toEqual({
        _id: "u1",
        _rev: couch.currentRev("users", "u1"),
        type: "user",
        role: "admin",
      });
    });

    it("should report missing documents and databases as not found", async () => {
      expect(failed(await dispatcher.dispatch("couchdb_get_document", { database: "users", doc_id: "nope" }))).toEqual({
        kind: "NotFound",
        message: 'Not found: document "nope" in database "users" (missing)',
        status: 404,
        error: "not_found",
        reason: "missing",
      });

      const db = failed(await dispatcher.dispatch("couchdb_get_document", { database: "ghost", doc_id: "u1" }));
      expect(db.kind).toBe("NotFound");
      expect(db.reason).toBe("Database does not exist.");
    });

    it("should let the backend assign an id when none is given", async () => {
      const data = ok(
        await dispatcher.dispatch("couchdb_create_document", { database: "users", document: { type: "user" } })
      );
      expect(data.id).toMatch(/^[0-9a-f]{32}$/);
      expect(data.message).toBe("Document created successfully");
      expect(couch.requests.at(-1)?.method).toBe("POST");
    });

    it("should report creating an existing id as a conflict", async () => {
      const error = failed(
        await dispatcher.dispatch("couchdb_create_document", {
          database: "users",
          doc_id: "u1",
          document: { type: "user" },
        })
      );
      expect(error.kind).toBe("RevisionConflict");
      expect(error.message).toBe(
        'document "u1" in database "users" already exists; use couchdb_update_document with its current _rev to modify it'
      );
    });

    it("should delete with the current revision and leave a tombstone", async () => {
      const rev = couch.currentRev("users", "u1");
      const data = ok(await dispatcher.dispatch("couchdb_delete_document", { database: "users", doc_id: "u1", rev }));
      expect(data.ok).toBe(true);
      expect(data.id).toBe("u1");
      expect(data.rev).toMatch(/^2-/);
      expect(data.message).toBe("Document 'u1' deleted successfully");
      expect(couch.requests.at(-1)?.query).toEqual({ rev });

      const gone = failed(await dispatcher.dispatch("couchdb_get_document", { database: "users", doc_id: "u1" }));
      expect(gone.reason).toBe("deleted");
    });

    it("should refuse a delete with a stale revision and keep the document", async () => {
      const staleRev = couch.currentRev("users", "u1");
      ok(
        await dispatcher.dispatch("couchdb_update_document", {
          database: "users",
          doc_id: "u1",
          document: { type: "user", role: "owner" },
          rev: staleRev,
        })
      );
      const currentRev = couch.currentRev("users", "u1");

      const error = failed(
        await dispatcher.dispatch("couchdb_delete_document", { database: "users", doc_id: "u1", rev: staleRev })
      );
      expect(error.kind).toBe("RevisionConflict");
      expect(error.status).toBe(409);
      expect(couch.currentRev("users", "u1")).toBe(currentRev);

      const kept = ok(await dispatcher.dispatch("couchdb_get_document", { database: "users", doc_id: "u1" }));
      expect(kept.document).toEqual({ _id: "u1", _rev: currentRev, type: "user", role: "owner" });
    });

    it("should treat a malformed revision token as a conflict", async () => {
      const error = failed(
        await dispatcher.dispatch("couchdb_delete_document", { database: "users", doc_id: "u1", rev: "abc" })
      );
      expect(error.kind).toBe("RevisionConflict");
      expect(error.status).toBe(400);
      expect(couch.currentRev("users", "u1")).toMatch(/^1-/);
    });
  });

  describe("listing and search", () => {
    beforeEach(() => {
      const docs = Array.from({ length: 30 }, (_, i) => ({
        _id: `item-${String(i).padStart(2, "0")}`,
        type: i % 2 === 0 ? "even" : "odd",
        n: i,
      }));
      couch.seed("items", docs);
    });

    it("should apply the default page window to listings", async () => {
      const data = ok(await dispatcher.dispatch("couchdb_list_documents", { database: "items" }));

      expect(data.count).toBe(25);
      expect(data.total_rows).toBe(30);
      expect(data.offset).toBe(0);
      expect(couch.requests.at(-1)?.query).toEqual({ limit: 25, skip: 0, include_docs: false });
      expect(data.documents).toContainEqual({
        id: "item-00",
        key: "item-00",
        value: { rev: couch.currentRev("items", "item-00") },
      });
    });

    it("should return full documents with include_docs", async () => {
      const data = ok(
        await dispatcher.dispatch("couchdb_list_documents", { database: "items", limit: 2, skip: 28, include_docs: true })
      );

      expect(data.count).toBe(2);
      expect(data.documents).toEqual([
        { _id: "item-28", _rev: couch.currentRev("items", "item-28"), type: "even", n: 28 },
        { _id: "item-29", _rev: couch.currentRev("items", "item-29"), type: "odd", n: 29 },
      ]);
    });

    it("should treat an empty query as match-all under the default limit", async () => {
      const data = ok(await dispatcher.dispatch("couchdb_search_documents", { database: "items", query: {} }));

      expect(data.count).toBe(25);
      expect(data.warning).toBe(NO_INDEX_WARNING);
      expect(couch.requests.at(-1)?.body).toEqual({ selector: {}, limit: 25, skip: 0 });
    });

    it("should send explicit operators and honour the page window", async () => {
      const data = ok(
        await dispatcher.dispatch("couchdb_search_documents", {
          database: "items",
          query: { type: "odd", n: { $gte: 20 } },
          limit: 3,
          skip: 1,
          fields: ["_id"],
        })
      );

      expect(couch.requests.at(-1)?.body).toEqual({
        selector: { $and: [{ type: { $eq: "odd" } }, { n: { $gte: 20 } }] },
        limit: 3,
        skip: 1,
        fields: ["_id"],
      });
      expect(data.docs).toEqual([{ _id: "item-23" }, { _id: "item-25" }, { _id: "item-27" }]);
    });

    it("should return nothing for limit 0 and add a note", async () => {
      const data = ok(
        await dispatcher.dispatch("couchdb_search_documents", { database: "items", query: {}, limit: 0 })
      );

      expect(data.docs).toEqual([]);
      expect(data.count).toBe(0);
      expect(data.note).toBe(EMPTY_SEARCH_NOTE);
    });

    it("should return an empty listing for limit 0", async () => {
      const data = ok(await dispatcher.dispatch("couchdb_list_documents", { database: "items", limit: 0 }));

      expect(data.documents).toEqual([]);
      expect(data.count).toBe(0);
      expect(couch.requests.at(-1)?.query).toEqual({ limit: 0, skip: 0, include_docs: false });
    });

    it("should return fewer documents than the limit on the last page", async () => {
      const data = ok(await dispatcher.dispatch("couchdb_list_documents", { database: "items", skip: 25 }));
      expect(data.count).toBe(5);
    });
  });

  describe("array and type operators", () => {
    beforeEach(() => {
      couch.seed("posts", [
        { _id: "p1", tags: ["x", "y"], score: 9, items: [{ qty: 2 }, { qty: 5 }] },
        { _id: "p2", tags: ["y"], score: 4, items: [{ qty: 0 }] },
        { _id: "p3", tags: "x", score: 6, items: [] },
      ]);
    });

    async function idsMatching(query: Record<string, unknown>): Promise<unknown> {
      const data = ok(
        await dispatcher.dispatch("couchdb_search_documents", { database: "posts", query, fields: ["_id"] })
      );
      return data.docs;
    }

    it("should forward $elemMatch to the backend unchanged", async () => {
      expect(await idsMatching({ tags: { $elemMatch: { $eq: "x" } } })).toEqual([{ _id: "p1" }]);
      expect(couch.requests.at(-1)?.body).toEqual({
        selector: { tags: { $elemMatch: { $eq: "x" } } },
        limit: 25,
        skip: 0,
        fields: ["_id"],
      });
    });

    it("should match element sub-fields with $elemMatch and $allMatch", async () => {
      expect(await idsMatching({ items: { $elemMatch: { qty: 0 } } })).toEqual([{ _id: "p2" }]);
      expect(await idsMatching({ items: { $allMatch: { qty: { $gt: 1 } } } })).toEqual([{ _id: "p1" }]);
    });

    it("should evaluate $all, $size, $type and $mod", async () => {
      expect(await idsMatching({ tags: { $all: ["x", "y"] } })).toEqual([{ _id: "p1" }]);
      expect(await idsMatching({ tags: { $size: 1 } })).toEqual([{ _id: "p2" }]);
      expect(await idsMatching({ tags: { $type: "string" } })).toEqual([{ _id: "p3" }]);
      expect(await idsMatching({ score: { $mod: [3, 0] } })).toEqual([{ _id: "p1" }, { _id: "p3" }]);
    });

    it("should reject a malformed operand before contacting the backend", async () => {
      const error = failed(
        await dispatcher.dispatch("couchdb_search_documents", { database: "posts", query: { tags: { $size: "1" } } })
      );
      expect(error.kind).toBe("InvalidArgument");
      expect(error.subKind).toBe("InvalidSelector");
      expect(couch.requests).toHaveLength(0);
    });
  });

  describe("indexes", () => {
    beforeEach(() => {
      couch.seed("users", [{ _id: "u1", type: "user", status: "active" }]);
    });

    it("should create an index, then report it as existing", async () => {
      const first = ok(
        await dispatcher.dispatch("couchdb_create_index", { database: "users", fields: ["type", "status"] })
      );
      expect(first.result).toBe("created");
      expect(first.fields).toEqual(["type", "status"]);
      expect(first.message).toBe("Index created successfully on fields: type, status");
      expect(first.coverage).toBe(
        "Index on [type, status] can serve selectors constrained on: type; type + status. " +
          "Selectors on status without type are not served by this index and may fall back to a full scan."
      );
      expect(couch.requests.at(-1)?.body).toEqual({ index: { fields: ["type", "status"] }, type: "json" });

      const second = ok(
        await dispatcher.dispatch("couchdb_create_index", { database: "users", fields: ["type", "status"] })
      );
      expect(second.result).toBe("exists");
      expect(second.id).toBe(first.id);
      expect(second.message).toBe("Index already exists on fields: type, status");
    });

    it("should surface the backend's missing-index warning verbatim", async () => {
      ok(await dispatcher.dispatch("couchdb_create_index", { database: "users", fields: ["type", "status"] }));

      const served = ok(
        await dispatcher.dispatch("couchdb_search_documents", { database: "users", query: { type: "user" } })
      );
      expect(served).not.toHaveProperty("warning");

      const unserved = ok(
        await dispatcher.dispatch("couchdb_search_documents", { database: "users", query: { status: "active" } })
      );
      expect(unserved.warning).toBe(NO_INDEX_WARNING);
      expect(unserved.count).toBe(1);
    });

    it("should list indexes including the built-in one", async () => {
      ok(
        await dispatcher.dispatch("couchdb_create_index", {
          database: "users",
          fields: ["type"],
          index_name: "by-type",
        })
      );

      const data = ok(await dispatcher.dispatch("couchdb_list_indexes", { database: "users" }));
      expect(data.count).toBe(2);
      expect(data.total_rows).toBe(2);
      expect(data.indexes).toEqual([
        expect.objectContaining({ name: "_all_docs", type: "special" }),
        expect.objectContaining({ name: "by-type", type: "json" }),
      ]);
    });
  });

  describe("backend failures", () => {
    it("should report an unreachable backend", async () => {
      couch.offline = true;

      expect(failed(await dispatcher.dispatch("couchdb_list_databases", {}))).toEqual({
        kind: "BackendUnavailable",
        message: "connect ECONNREFUSED 127.0.0.1:5984",
      });
    });

    it("should report an aborted call as unavailable", async () => {
      const controller = new AbortController();
      controller.abort();

      const error = failed(await dispatcher.dispatch("couchdb_list_databases", {}, { signal: controller.signal }));
      expect(error.kind).toBe("BackendUnavailable");
      expect(couch.requests).toHaveLength(1);
      expect(couch.requests[0].signal).toBe(controller.signal);
    });

    it("should reject an unexpected response shape", async () => {
      const odd: CouchTransport = { request: async () => ({ status: 200, body: { unexpected: true } }) };
      const result = await new OperationDispatcher(odd).dispatch("couchdb_list_databases", {});

      expect(failed(result)).toEqual({
        kind: "BackendError",
        message: "Unexpected response from CouchDB for _all_dbs",
        status: 200,
      });
    });

    it("should turn unexpected transport faults into backend errors", async () => {
      const broken: CouchTransport = {
        request: async () => {
          throw new Error("socket hang up");
        },
      };
      const result = await new OperationDispatcher(broken).dispatch("couchdb_list_databases", {});

      expect(failed(result)).toEqual({ kind: "BackendError", message: "socket hang up" });
    });
  });

  describe("logging hook", () => {
    it("should log each request and each failure", async () => {
      const logger = { debug: vi.fn(), warn: vi.fn() };
      const logged = new OperationDispatcher(couch, { logger });

      await logged.dispatch("couchdb_get_document", { database: "ghost", doc_id: "u1" });

      expect(logger.debug).toHaveBeenCalledWith("dispatch.request", { method: "GET", path: "/ghost/u1" });
      expect(logger.warn).toHaveBeenCalledWith("dispatch.error", {
        tool: "couchdb_get_document",
        kind: "NotFound",
        sub_kind: undefined,
        status: 404,
      });
    });
  });
});
