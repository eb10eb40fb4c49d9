/**
 * CouchDB MCP SDK
 *
 * Translation and consistency layer between MCP tool calls and the CouchDB HTTP API
 */

// Re-export types
export type {
  ToolName,
  Document,
  PageWindow,
  IndexKind,
  IndexSpec,
  ErrorKind,
  InvalidArgumentSubKind,
  ErrorPayload,
  ToolResult,
} from "./types.js";
export { TOOL_NAMES, READ_ONLY_TOOLS, isToolName } from "./types.js";

// Dispatcher
export { OperationDispatcher, classifyFailure, EMPTY_SEARCH_NOTE } from "./dispatcher.js";
export type { DispatchLogger, DispatcherOptions, DispatchOptions } from "./dispatcher.js";

// Components
export {
  parseSelector,
  serializeSelector,
  buildSelector,
  selectorFields,
  condition,
  matchAll,
  eq,
  ne,
  gt,
  gte,
  lt,
  lte,
  regex,
  allOf,
  anyOf,
  noneOf,
  not,
  VALUE_TYPES,
} from "./selector.js";
export type {
  SelectorNode,
  FieldCondition,
  AllOf,
  AnyOf,
  NoneOf,
  Not,
  LeafOperator,
  ComparisonOperator,
  CombinatorOperator,
  MangoSelector,
} from "./selector.js";
export {
  requireRevision,
  resolveUpdateRevision,
  withRevision,
  isRevisionConflict,
} from "./revision.js";
export { resolvePage, DEFAULT_LIMIT, DEFAULT_SKIP } from "./pagination.js";
export {
  resolveIndexSpec,
  indexRequestBody,
  servablePrefixes,
  servesFields,
  describeCoverage,
} from "./indexes.js";

// Transport
export { encodePath, checkConnection } from "./transport.js";
export type {
  CouchTransport,
  CouchRequest,
  CouchResponse,
  HttpMethod,
  QueryValue,
  ServerInfo,
} from "./transport.js";
export { HttpTransport, DEFAULT_COUCHDB_URL, splitCredentials, redactUrl } from "./http.js";
export type { HttpTransportOptions } from "./http.js";

// Errors
export {
  CouchMcpError,
  UnknownOperationError,
  InvalidArgumentError,
  MissingRevisionError,
  InvalidPaginationError,
  InvalidIndexSpecError,
  InvalidSelectorError,
  NotFoundError,
  RevisionConflictError,
  BackendUnavailableError,
  BackendError,
  TransportError,
  toErrorPayload,
} from "./errors.js";
export type { BackendFailure } from "./errors.js";

// Schemas
export * from "./schemas.js";
