#!/usr/bin/env node

/**
 * CouchDB MCP CLI entry point
 */

import { HttpTransport } from "@couchdb-mcp/sdk";
import { run } from "./program.js";
import { isStdinTTY, readStdin, writeStderr, writeStdout } from "./lib/io.js";

const timeoutMs = Number(process.env.COUCHDB_TIMEOUT_MS);

process.exitCode = await run(process.argv, {
  createTransport: (url) =>
    new HttpTransport({ url, timeoutMs: Number.isInteger(timeoutMs) && timeoutMs > 0 ? timeoutMs : undefined }),
  stdout: writeStdout,
  stderr: writeStderr,
  readStdin: isStdinTTY() ? undefined : () => readStdin(),
  color: process.stderr.isTTY ?? false,
});
