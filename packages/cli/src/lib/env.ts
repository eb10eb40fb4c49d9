/**
 * Environment and configuration resolution
 */

import { DEFAULT_COUCHDB_URL } from "@couchdb-mcp/sdk";

/**
 * Resolve the CouchDB URL
 * Priority: CLI option > COUCHDB_URL env var > http://localhost:5984
 */
export function resolveUrl(cliUrl?: string, env: NodeJS.ProcessEnv = process.env): string {
  return cliUrl || env.COUCHDB_URL || DEFAULT_COUCHDB_URL;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.COUCHDB_MCP_CLI_DEBUG === "1";
}
