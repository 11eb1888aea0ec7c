// Node adapters
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_WORKERS,
  defaultConfig,
} from "./config/server-config.js";
// HTTP
export { parseQueryString } from "./http/query.js";
export type {
  HttpRequestHead,
  HttpRequestParseErrorCode,
  ParseHttpRequestOptions,
} from "./http/request-parser.js";
export {
  createHttpRequestParser,
  HttpRequestParseError,
  HttpRequestStreamParser,
  parseContentLength,
  parseHttpRequest,
  splitRequestTarget,
} from "./http/request-parser.js";
export { formatResponse, sendResponse } from "./http/response-writer.js";
export type { HttpRequest, HttpResponseOptions } from "./http/types.js";
export {
  FALLBACK_STATUS_TEXT,
  STATUS_TEXT,
  statusTextFor,
} from "./http/types.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  prefixedLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type { RoutableRequest, RouteResponse } from "./server/router.js";
export { GREETING, NOT_FOUND_BODY, routeRequest } from "./server/router.js";
export type {
  ConnectionStats,
  WebServerEvents,
  WebServerOptions,
} from "./server/web-server.js";
export { classifyConnectionFailure, WebServer } from "./server/web-server.js";
export type { TakeResult } from "./server/work-queue.js";
export { WorkQueue } from "./server/work-queue.js";
export type { WorkerPoolOptions } from "./server/worker-pool.js";
export { DEFAULT_POOL_SIZE, WorkerPool } from "./server/worker-pool.js";
export type {
  InMemoryConnection,
  InMemorySocketFactoryOptions,
} from "./testing/in-memory-socket-factory.js";
export { InMemorySocketFactory } from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export type { EventMap, Listener } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";
