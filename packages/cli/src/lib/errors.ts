/**
 * CLI error handling and exit code mapping
 */

import { CouchMcpError, TransportError, type ErrorKind, type ErrorPayload } from "@couchdb-mcp/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Exit codes by error kind
 * - 2: database or document not found
 * - 3: backend unreachable
 * - 1: everything else
 */
export function exitCodeForKind(kind: ErrorKind): number {
  switch (kind) {
    case "NotFound":
      return 2;
    case "BackendUnavailable":
      return 3;
    default:
      return 1;
  }
}

/**
 * A tool call that came back with a structured error
 */
export class ToolCallError extends CliError {
  readonly payload: ErrorPayload;

  constructor(payload: ErrorPayload) {
    const kind = payload.subKind ? `${payload.kind}/${payload.subKind}` : payload.kind;
    super(`${kind}: ${payload.message}`, { exitCode: exitCodeForKind(payload.kind) });
    this.name = "ToolCallError";
    this.payload = payload;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/backend error
 * - 2: not found
 * - 3: backend unavailable
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // CliError carries its own exit code
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CouchMcpError) {
    return exitCodeForKind(error.kind);
  }

  if (error instanceof TransportError) {
    return 3;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
