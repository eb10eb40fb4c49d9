/**
 * Basic Usage Example
 *
 * Demonstrates the document workflow an agent runs through the tools,
 * driven directly through the dispatcher.
 * Run with: npx tsx examples/basic-usage.ts [couchdb-url]
 */

import { HttpTransport, OperationDispatcher, DEFAULT_COUCHDB_URL, type ToolResult } from "@couchdb-mcp/sdk";

const DATABASE = "example_tasks";

function unwrap(result: ToolResult): Record<string, unknown> {
  if (!result.ok) {
    throw new Error(`${result.error.kind}: ${result.error.message}`);
  }
  return result.data;
}

async function main() {
  const url = process.argv[2] ?? process.env.COUCHDB_URL ?? DEFAULT_COUCHDB_URL;
  const couch = new OperationDispatcher(new HttpTransport({ url, timeoutMs: 10000 }));

  // Setup: start from an empty database
  console.log("📂 Creating database...");
  const existing = unwrap(await couch.dispatch("couchdb_list_databases", {}));
  if (Array.isArray(existing.databases) && existing.databases.includes(DATABASE)) {
    unwrap(await couch.dispatch("couchdb_delete_database", { name: DATABASE }));
  }
  unwrap(await couch.dispatch("couchdb_create_database", { name: DATABASE }));

  // CREATE: Store a few documents
  console.log("\n✏️  Creating documents...");
  const tasks = [
    { _id: "task-1", type: "task", title: "Learn Mango queries", status: "open", priority: 8 },
    { _id: "task-2", type: "task", title: "Build feature", status: "open", priority: 9 },
    { _id: "task-3", type: "task", title: "Write tests", status: "closed", priority: 5 },
  ];
  let firstRev = "";
  for (const { _id, ...document } of tasks) {
    const created = unwrap(await couch.dispatch("couchdb_create_document", { database: DATABASE, doc_id: _id, document }));
    if (_id === "task-1") {
      firstRev = String(created.rev);
    }
  }
  console.log(`✅ Created ${tasks.length} tasks`);

  // UPDATE: Full replacement with the current revision
  console.log("\n✏️  Updating task-1...");
  const updated = unwrap(
    await couch.dispatch("couchdb_update_document", {
      database: DATABASE,
      doc_id: "task-1",
      document: { type: "task", title: "Learn Mango queries", status: "in-progress", priority: 8, _rev: firstRev },
    })
  );
  console.log(`✅ task-1 is now at revision ${String(updated.rev)}`);

  // CONFLICT: The old revision is stale now
  const stale = await couch.dispatch("couchdb_update_document", {
    database: DATABASE,
    doc_id: "task-1",
    document: { type: "task", title: "Stale write", _rev: firstRev },
  });
  console.log(`✅ Stale write rejected: ${stale.ok ? "ERROR" : stale.error.kind}`);

  // QUERY: Without an index, CouchDB warns
  console.log("\n🔍 Querying for open tasks...");
  const query = { type: "task", status: "open" };
  const before = unwrap(await couch.dispatch("couchdb_search_documents", { database: DATABASE, query }));
  console.log(`✅ Found ${String(before.count)} open tasks`);
  if (typeof before.warning === "string") {
    console.log(`   ⚠️  ${before.warning}`);
  }

  // INDEX: Cover the queried fields
  console.log("\n🗂️  Creating index on [type, status]...");
  const index = unwrap(
    await couch.dispatch("couchdb_create_index", { database: DATABASE, fields: ["type", "status"], index_name: "by-type-status" })
  );
  console.log(`✅ ${String(index.message)}`);

  const after = unwrap(await couch.dispatch("couchdb_search_documents", { database: DATABASE, query }));
  console.log(`✅ Warning after indexing: ${typeof after.warning === "string" ? after.warning : "none"}`);

  // Cleanup
  unwrap(await couch.dispatch("couchdb_delete_database", { name: DATABASE }));
  console.log("\n✅ Example completed successfully!");
}

main().catch(console.error);
