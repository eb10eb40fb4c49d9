/**
 * In-process fake of the CouchDB HTTP API
 *
 * Implements the CouchTransport contract so dispatcher, server and CLI tests run
 * without a live backend. Covers the endpoints the tools use:
 *   GET    /                      server info
 *   GET    /_all_dbs              database names (sorted)
 *   PUT    /{db}                  create database (412 file_exists)
 *   DELETE /{db}                  delete database
 *   POST   /{db}                  create document with generated id
 *   GET    /{db}/_all_docs        rows sorted by id (limit, skip, include_docs)
 *   POST   /{db}/_find            Mango selector evaluation with limit/skip/fields
 *   GET    /{db}/_index           index listing, _all_docs special index first
 *   POST   /{db}/_index           index creation, "exists" for identical definitions
 *   GET/PUT/DELETE /{db}/{id}     document CRUD with N-hash revisions and 409 conflicts
 *
 * Indexes are kept apart from documents, so they never show up in _all_docs.
 */

import { createHash, randomUUID } from "node:crypto";
import { isDeepStrictEqual } from "node:util";
import { TransportError } from "@couchdb-mcp/sdk";
import type { CouchRequest, CouchResponse, CouchTransport, Document } from "@couchdb-mcp/sdk";

const DB_NAME_PATTERN = /^[a-z][a-z0-9_$()+/-]*$/;
const REV_PATTERN = /^(\d+)-[0-9a-f]+$/;

export const NO_INDEX_WARNING = "No matching index found, create an index to optimize query time.";

interface StoredDoc {
  body: Document;
  rev: string;
  deleted: boolean;
}

interface StoredIndex {
  ddoc: string;
  name: string;
  type: string;
  fields: string[];
}

interface FakeDatabase {
  docs: Map<string, StoredDoc>;
  indexes: StoredIndex[];
}

type Json = Record<string, unknown>;

function isPlainObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function reply(status: number, body: unknown): CouchResponse {
  return { status, body };
}

function failure(status: number, error: string, reason: string): CouchResponse {
  return reply(status, { error, reason });
}

const dbMissing = () => failure(404, "not_found", "Database does not exist.");
const conflict = () => failure(409, "conflict", "Document update conflict.");
const badRev = () => failure(400, "bad_request", "Invalid rev format");

function getPath(doc: unknown, path: string): unknown {
  return path.split(".").reduce<unknown>((o, k) => (isPlainObject(o) ? o[k] : undefined), doc);
}

function compare(val: unknown, rhs: unknown, test: (a: number | string, b: number | string) => boolean): boolean {
  if (typeof val === "number" && typeof rhs === "number") return test(val, rhs);
  if (typeof val === "string" && typeof rhs === "string") return test(val, rhs);
  return false;
}

function typeName(val: unknown): string {
  if (val === null) return "null";
  if (Array.isArray(val)) return "array";
  return typeof val;
}

/**
 * Evaluate an element selector: operators on the element itself, or a
 * selector over the element's sub-fields
 */
function matchElement(el: unknown, sel: unknown): boolean {
  if (!isPlainObject(sel)) return false;
  const onElement = Object.keys(sel).every((k) => k.startsWith("$") && k !== "$and" && k !== "$or" && k !== "$nor");
  if (onElement) {
    return matchField(el, sel);
  }
  return isPlainObject(el) && matchesSelector(el, sel);
}

/**
 * Evaluate a field-level condition
 */
function matchField(val: unknown, cond: unknown): boolean {
  const isOperatorObject =
    isPlainObject(cond) && Object.keys(cond).length > 0 && Object.keys(cond).every((k) => k.startsWith("$"));

  if (!isOperatorObject) {
    return val !== undefined && isDeepStrictEqual(val, cond);
  }

  for (const [op, rhs] of Object.entries(cond)) {
    if (op === "$exists") {
      if ((val !== undefined) !== rhs) return false;
      continue;
    }
    if (op === "$not") {
      if (matchField(val, rhs)) return false;
      continue;
    }
    // Every other operator requires the field to be present
    if (val === undefined) return false;

    switch (op) {
      case "$eq":
        if (!isDeepStrictEqual(val, rhs)) return false;
        break;
      case "$ne":
        if (isDeepStrictEqual(val, rhs)) return false;
        break;
      case "$gt":
        if (!compare(val, rhs, (a, b) => a > b)) return false;
        break;
      case "$gte":
        if (!compare(val, rhs, (a, b) => a >= b)) return false;
        break;
      case "$lt":
        if (!compare(val, rhs, (a, b) => a < b)) return false;
        break;
      case "$lte":
        if (!compare(val, rhs, (a, b) => a <= b)) return false;
        break;
      case "$regex":
        if (typeof val !== "string" || typeof rhs !== "string" || !new RegExp(rhs).test(val)) return false;
        break;
      case "$in":
        if (!Array.isArray(rhs) || !rhs.some((r) => isDeepStrictEqual(val, r))) return false;
        break;
      case "$nin":
        if (!Array.isArray(rhs) || rhs.some((r) => isDeepStrictEqual(val, r))) return false;
        break;
      case "$type":
        if (typeName(val) !== rhs) return false;
        break;
      case "$size":
        if (!Array.isArray(val) || val.length !== rhs) return false;
        break;
      case "$mod":
        if (
          typeof val !== "number" ||
          !Number.isInteger(val) ||
          !Array.isArray(rhs) ||
          typeof rhs[0] !== "number" ||
          val % rhs[0] !== rhs[1]
        ) {
          return false;
        }
        break;
      case "$all":
        if (!Array.isArray(val) || !Array.isArray(rhs)) return false;
        if (!rhs.every((r) => val.some((v) => isDeepStrictEqual(v, r)))) return false;
        break;
      case "$elemMatch":
        if (!Array.isArray(val) || !val.some((el) => matchElement(el, rhs))) return false;
        break;
      case "$allMatch":
        // Empty arrays never match
        if (!Array.isArray(val) || val.length === 0 || !val.every((el) => matchElement(el, rhs))) return false;
        break;
      default:
        throw new Error(`Unknown operator: ${op}`);
    }
  }
  return true;
}

/**
 * Test if a document matches a Mango selector
 */
export function matchesSelector(doc: Json, selector: Json): boolean {
  for (const [key, value] of Object.entries(selector)) {
    if (key === "$and" || key === "$or" || key === "$nor") {
      if (!Array.isArray(value)) {
        throw new Error(`${key} operator requires an array of selectors`);
      }
      const results = value.map((s: unknown) => isPlainObject(s) && matchesSelector(doc, s));
      const ok =
        key === "$and" ? results.every(Boolean) : key === "$or" ? results.some(Boolean) : !results.some(Boolean);
      if (!ok) return false;
      continue;
    }

    if (key === "$not") {
      if (!isPlainObject(value) || matchesSelector(doc, value)) return false;
      continue;
    }

    if (!matchField(getPath(doc, key), value)) {
      return false;
    }
  }
  return true;
}

function selectorKeys(selector: Json): string[] {
  return Object.entries(selector).flatMap(([key, value]) => {
    if (key === "$and" || key === "$or" || key === "$nor") {
      return Array.isArray(value) ? value.flatMap((s: unknown) => (isPlainObject(s) ? selectorKeys(s) : [])) : [];
    }
    if (key === "$not") {
      return isPlainObject(value) ? selectorKeys(value) : [];
    }
    return [key];
  });
}

function digest(input: string): string {
  return createHash("md5").update(input).digest("hex");
}

function toInt(value: unknown, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

function normalizeIndexFields(fields: unknown[]): string[] | null {
  const names: string[] = [];
  for (const f of fields) {
    if (typeof f === "string") {
      names.push(f);
    } else if (isPlainObject(f) && typeof f.name === "string") {
      names.push(f.name);
    } else if (isPlainObject(f) && Object.keys(f).length === 1) {
      names.push(Object.keys(f)[0]);
    } else {
      return null;
    }
  }
  return names;
}

export interface FakeCouchOptions {
  /** Reported server version */
  version?: string;
}

export class FakeCouchTransport implements CouchTransport {
  /** Every request received, in order */
  readonly requests: CouchRequest[] = [];
  /** When true, every request fails with a TransportError */
  offline = false;

  #dbs = new Map<string, FakeDatabase>();
  #version: string;

  constructor(options: FakeCouchOptions = {}) {
    this.#version = options.version ?? "3.3.3";
  }

  async request(req: CouchRequest): Promise<CouchResponse> {
    this.requests.push(req);
    if (req.signal?.aborted) {
      throw new TransportError("The operation was aborted", "ERR_CANCELED");
    }
    if (this.offline) {
      throw new TransportError("connect ECONNREFUSED 127.0.0.1:5984", "ECONNREFUSED");
    }
    return this.#route(req);
  }

  /**
   * Current stored revision of a live document, for assertions
   */
  currentRev(database: string, id: string): string | undefined {
    const stored = this.#dbs.get(database)?.docs.get(id);
    return stored && !stored.deleted ? stored.rev : undefined;
  }

  /**
   * Seed a database directly, bypassing the request log
   */
  seed(database: string, docs: Document[] = []): void {
    const db = this.#dbs.get(database) ?? { docs: new Map<string, StoredDoc>(), indexes: [] };
    this.#dbs.set(database, db);
    for (const doc of docs) {
      const id = doc._id ?? randomUUID().replace(/-/g, "");
      this.#write(db, id, doc, undefined);
    }
  }

  #route(req: CouchRequest): CouchResponse {
    const [first, second, ...rest] = req.path;

    if (first === undefined) {
      if (req.method !== "GET") return failure(405, "method_not_allowed", "Only GET allowed");
      return reply(200, {
        couchdb: "Welcome",
        version: this.#version,
        vendor: { name: "The Apache Software Foundation" },
      });
    }

    if (first === "_all_dbs" && req.method === "GET") {
      return reply(200, [...this.#dbs.keys()].sort());
    }

    if (second === undefined) {
      return this.#database(req, first);
    }

    const db = this.#dbs.get(first);
    if (!db) {
      return dbMissing();
    }
    if (rest.length > 0) {
      return failure(404, "not_found", "missing");
    }

    switch (second) {
      case "_all_docs":
        return req.method === "GET" ? this.#allDocs(db, req) : failure(405, "method_not_allowed", "Only GET allowed");
      case "_find":
        return req.method === "POST" ? this.#find(db, req.body) : failure(405, "method_not_allowed", "Only POST allowed");
      case "_index":
        if (req.method === "GET") return this.#listIndexes(db);
        if (req.method === "POST") return this.#createIndex(db, req.body);
        return failure(405, "method_not_allowed", "Only GET,POST allowed");
      default:
        return this.#document(db, second, req);
    }
  }

  #database(req: CouchRequest, name: string): CouchResponse {
    const db = this.#dbs.get(name);
    switch (req.method) {
      case "PUT":
        if (!DB_NAME_PATTERN.test(name)) {
          return failure(
            400,
            "illegal_database_name",
            `Name: '${name}'. Only lowercase characters (a-z), digits (0-9), and any of the characters _, $, (, ), +, -, and / are allowed. Must begin with a letter.`
          );
        }
        if (db) {
          return failure(412, "file_exists", "The database could not be created, the file already exists.");
        }
        this.#dbs.set(name, { docs: new Map(), indexes: [] });
        return reply(201, { ok: true });
      case "DELETE":
        if (!db) return dbMissing();
        this.#dbs.delete(name);
        return reply(200, { ok: true });
      case "GET": {
        if (!db) return dbMissing();
        const live = [...db.docs.values()].filter((d) => !d.deleted).length;
        return reply(200, { db_name: name, doc_count: live, doc_del_count: db.docs.size - live });
      }
      case "POST": {
        if (!db) return dbMissing();
        if (!isPlainObject(req.body)) return failure(400, "bad_request", "Document must be a JSON object");
        const body: Document = { ...req.body };
        const id = typeof body._id === "string" ? body._id : randomUUID().replace(/-/g, "");
        return this.#put(db, id, body, 201);
      }
      default:
        return failure(405, "method_not_allowed", "Only DELETE,GET,POST,PUT allowed");
    }
  }

  #document(db: FakeDatabase, id: string, req: CouchRequest): CouchResponse {
    const stored = db.docs.get(id);

    switch (req.method) {
      case "GET":
        if (!stored) return failure(404, "not_found", "missing");
        if (stored.deleted) return failure(404, "not_found", "deleted");
        return reply(200, { ...stored.body });
      case "PUT": {
        if (!isPlainObject(req.body)) return failure(400, "bad_request", "Document must be a JSON object");
        return this.#put(db, id, { ...req.body }, 201);
      }
      case "DELETE": {
        const rev = req.query?.rev;
        if (rev === undefined) return conflict();
        if (typeof rev !== "string" || !REV_PATTERN.test(rev)) return badRev();
        if (!stored) return failure(404, "not_found", "missing");
        if (stored.deleted) return failure(404, "not_found", "deleted");
        if (stored.rev !== rev) return conflict();
        const tombstone = this.#write(db, id, { _id: id, _deleted: true }, stored);
        return reply(200, { ok: true, id, rev: tombstone.rev });
      }
      default:
        return failure(405, "method_not_allowed", "Only DELETE,GET,HEAD,PUT allowed");
    }
  }

  #put(db: FakeDatabase, id: string, body: Document, status: number): CouchResponse {
    const stored = db.docs.get(id);
    const rev = body._rev;

    if (rev !== undefined && (typeof rev !== "string" || !REV_PATTERN.test(rev))) {
      return badRev();
    }
    if (stored && !stored.deleted) {
      if (rev !== stored.rev) return conflict();
    } else if (rev !== undefined) {
      return conflict();
    }

    const written = this.#write(db, id, body, stored);
    return reply(status, { ok: true, id, rev: written.rev });
  }

  #write(db: FakeDatabase, id: string, body: Document, previous: StoredDoc | undefined): StoredDoc {
    const generation = previous ? Number(REV_PATTERN.exec(previous.rev)?.[1] ?? "0") + 1 : 1;
    const { _rev: _ignored, ...content } = body;
    const rev = `${generation}-${digest(JSON.stringify(content) + (previous?.rev ?? ""))}`;
    const deleted = content._deleted === true;
    const stored: StoredDoc = { body: { ...content, _id: id, _rev: rev }, rev, deleted };
    db.docs.set(id, stored);
    return stored;
  }

  #liveDocs(db: FakeDatabase): StoredDoc[] {
    return [...db.docs.entries()]
      .filter(([, d]) => !d.deleted)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, d]) => d);
  }

  #allDocs(db: FakeDatabase, req: CouchRequest): CouchResponse {
    const live = this.#liveDocs(db);
    const skip = toInt(req.query?.skip, 0);
    const limit = toInt(req.query?.limit, live.length);
    const includeDocs = req.query?.include_docs === true || req.query?.include_docs === "true";

    const rows = live.slice(skip, skip + limit).map((d) => {
      const id = String(d.body._id);
      const row: Json = { id, key: id, value: { rev: d.rev } };
      if (includeDocs) row.doc = { ...d.body };
      return row;
    });
    return reply(200, { total_rows: live.length, offset: skip, rows });
  }

  #find(db: FakeDatabase, body: unknown): CouchResponse {
    if (!isPlainObject(body) || !isPlainObject(body.selector)) {
      return failure(400, "bad_request", "Missing required key: selector");
    }
    const selector = body.selector;
    const limit = toInt(body.limit, 25);
    const skip = toInt(body.skip, 0);

    let matched: Document[];
    try {
      matched = this.#liveDocs(db)
        .map((d) => d.body)
        .filter((doc) => matchesSelector(doc, selector));
    } catch (err) {
      return failure(400, "invalid_operator", err instanceof Error ? err.message : String(err));
    }

    const fields = Array.isArray(body.fields)
      ? body.fields.filter((f: unknown): f is string => typeof f === "string")
      : undefined;
    const docs = matched.slice(skip, skip + limit).map((doc) => {
      if (!fields) return { ...doc };
      const projected: Document = {};
      for (const f of fields) {
        if (doc[f] !== undefined) projected[f] = doc[f];
      }
      return projected;
    });

    const keys = selectorKeys(selector);
    const indexed = db.indexes.some((ix) => ix.type === "json" && keys.includes(ix.fields[0]));
    return reply(200, indexed ? { docs } : { docs, warning: NO_INDEX_WARNING });
  }

  #createIndex(db: FakeDatabase, body: unknown): CouchResponse {
    if (!isPlainObject(body) || !isPlainObject(body.index) || !Array.isArray(body.index.fields)) {
      return failure(400, "bad_request", "Missing required key: index");
    }
    const fields = normalizeIndexFields(body.index.fields);
    if (!fields || fields.length === 0) {
      return failure(400, "bad_request", "Index fields must be a non-empty list");
    }
    const type = typeof body.type === "string" ? body.type : "json";

    const existing = db.indexes.find((ix) => ix.type === type && isDeepStrictEqual(ix.fields, fields));
    if (existing) {
      return reply(200, { result: "exists", id: existing.ddoc, name: existing.name });
    }

    const hash = digest(JSON.stringify({ type, fields }));
    const name = typeof body.name === "string" ? body.name : hash;
    const index: StoredIndex = { ddoc: `_design/${hash}`, name, type, fields };
    db.indexes.push(index);
    return reply(200, { result: "created", id: index.ddoc, name });
  }

  #listIndexes(db: FakeDatabase): CouchResponse {
    const indexes = [
      { ddoc: null, name: "_all_docs", type: "special", def: { fields: [{ _id: "asc" }] } },
      ...db.indexes.map((ix) => ({
        ddoc: ix.ddoc,
        name: ix.name,
        type: ix.type,
        def: { fields: ix.fields.map((f) => ({ [f]: "asc" })) },
      })),
    ];
    return reply(200, { total_rows: indexes.length, indexes });
  }
}
