#!/usr/bin/env node

/**
 * MCP server for CouchDB
 * Exposes database, document, search and index tools via stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { HttpTransport, OperationDispatcher, checkConnection, redactUrl } from "@couchdb-mcp/sdk";
import { loadConfig } from "./config.js";
import { createMcpServer } from "./mcp.js";
import { Logger } from "./observability/logger.js";
import { metrics } from "./observability/metrics.js";

async function main() {
  // MCP protocol uses stdout, so any stray console.log/info/debug breaks it
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]) => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const config = loadConfig();

  if (!config.enabled) {
    console.error("CouchDB MCP server is disabled (COUCHDB_MCP_ENABLED=false)");
    process.exit(0);
  }

  const logger = new Logger(config.logLevel);
  const url = redactUrl(config.couchdbUrl);
  logger.info("server.init", { url, mode: config.readOnly ? "readonly" : "readwrite" });

  const couch = new HttpTransport({ url: config.couchdbUrl, timeoutMs: config.timeoutMs });
  const dispatcher = new OperationDispatcher(couch, { logger });

  // An unreachable backend is not fatal: each tool call reports BackendUnavailable
  try {
    const info = await checkConnection(couch);
    logger.info("server.connect", { url, version: info.version, vendor: info.vendor });
  } catch (error) {
    logger.warn("server.connect.warn", {
      url,
      err_message: error instanceof Error ? error.message : String(error),
    });
  }

  const server = createMcpServer({ dispatcher, logger, metrics, readOnly: config.readOnly });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: config.readOnly ? "readonly" : "readwrite",
    url,
  });

  // Graceful shutdown
  const shutdown = async () => {
    logger.info("server.shutdown", { metrics: metrics.getAllMetrics() });
    await server.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown.error", {
        err_message: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error) => {
  console.error(
    JSON.stringify({
      ts: new Date().toISOString(),
      level: "error",
      event: "server.fatal",
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    })
  );
  process.exit(1);
});
