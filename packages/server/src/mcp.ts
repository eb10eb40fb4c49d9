/**
 * MCP server wiring for CouchDB tools
 *
 * Tool failures are returned as structured results with isError set; only
 * read-only refusals and unexpected faults surface as MCP protocol errors.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import {
  CouchMcpError,
  READ_ONLY_TOOLS,
  TransportError,
  isToolName,
  type OperationDispatcher,
} from "@couchdb-mcp/sdk";
import { toolDefinitions, createToolHandler } from "./tools.js";
import type { Logger } from "./observability/logger.js";
import type { MetricsRegistry } from "./observability/metrics.js";

export const SERVER_NAME = "couchdb-mcp-server";
export const SERVER_VERSION = "0.1.0";

/**
 * Map unexpected errors to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof CouchMcpError) {
    switch (error.kind) {
      case "UnknownOperation":
        return { code: ErrorCode.MethodNotFound, message: error.message };
      case "InvalidArgument":
        return { code: ErrorCode.InvalidParams, message: error.message };
      default:
        return { code: ErrorCode.InternalError, message: error.message };
    }
  }

  if (error instanceof TransportError && error.code === "ECONNABORTED") {
    return { code: ErrorCode.RequestTimeout, message: error.message };
  }

  if (error instanceof Error) {
    return { code: ErrorCode.InternalError, message: error.message };
  }

  return { code: ErrorCode.InternalError, message: String(error) };
}

/**
 * Whether a tool may be listed and called in the given mode
 */
export function isToolAllowed(name: string, readOnly: boolean): boolean {
  return !readOnly || (isToolName(name) && READ_ONLY_TOOLS.includes(name));
}

export interface McpServerOptions {
  dispatcher: OperationDispatcher;
  logger: Logger;
  metrics?: MetricsRegistry;
  readOnly?: boolean;
}

/**
 * Create and configure the MCP server
 */
export function createMcpServer(options: McpServerOptions): Server {
  const { logger, readOnly = false } = options;
  const handleTool = createToolHandler(options.dispatcher, { logger, metrics: options.metrics });

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // List available tools, filtered in read-only mode
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = toolDefinitions.filter((t) => isToolAllowed(t.name, readOnly));
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    try {
      // Unknown names still go to the dispatcher, which reports UnknownOperation
      if (isToolName(name) && !isToolAllowed(name, readOnly)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }

      return await handleTool(name, args ?? {}, extra.signal);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  return server;
}
