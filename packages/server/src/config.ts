/**
 * Server configuration loaded from the environment and command line
 */

import { z } from "zod";
import { DEFAULT_COUCHDB_URL } from "@couchdb-mcp/sdk";
import { LOG_LEVELS, type LogLevel } from "./observability/logger.js";

export interface ServerConfig {
  /** CouchDB base URL, credentials may be embedded */
  couchdbUrl: string;
  /** Only expose tools that never mutate backend state */
  readOnly: boolean;
  /** When false the server exits without serving */
  enabled: boolean;
  logLevel: LogLevel;
  /** Per-request backend timeout; undefined disables it */
  timeoutMs: number | undefined;
}

const UrlSchema = z.string().url({ message: "CouchDB URL must be an absolute URL" });
const LogLevelSchema = z.enum(LOG_LEVELS, {
  errorMap: () => ({ message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}` }),
});
const TimeoutSchema = z.coerce
  .number({ invalid_type_error: "COUCHDB_TIMEOUT_MS must be a number" })
  .int("COUCHDB_TIMEOUT_MS must be an integer")
  .positive("COUCHDB_TIMEOUT_MS must be positive");

function setting<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new Error(result.error.issues.map((issue) => issue.message).join(", "));
  }
  return result.data;
}

function env(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = source[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Resolve configuration. The first positional argument overrides COUCHDB_URL.
 * @throws Error on an invalid URL, log level or timeout
 */
export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv.slice(2)
): ServerConfig {
  const positional = argv.find((arg) => !arg.startsWith("-"));
  const timeout = env(source, "COUCHDB_TIMEOUT_MS");

  return {
    couchdbUrl: setting(UrlSchema, positional ?? env(source, "COUCHDB_URL") ?? DEFAULT_COUCHDB_URL),
    readOnly: source.COUCHDB_MCP_READONLY === "true",
    enabled: source.COUCHDB_MCP_ENABLED !== "false",
    logLevel: setting(LogLevelSchema, env(source, "LOG_LEVEL") ?? "info"),
    timeoutMs: timeout === undefined ? undefined : setting(TimeoutSchema, timeout),
  };
}
