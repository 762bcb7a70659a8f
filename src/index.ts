/**
 * eventline public API barrel.
 *
 * Re-exports the client, its building blocks, the transport seam and the
 * error types that make up the public surface of the `eventline` package.
 * @module
 */

// Adapters
export { NoopLogger, noopLogger } from "./adapters/noop-logger.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export type { TcpConnectorOptions } from "./adapters/tcp-connector.js";
export { buildRequest, SocketByteStream, TcpConnector } from "./adapters/tcp-connector.js";
// Client
export type { ConnectionState } from "./core/connection-state.js";
export { CONNECTION_STATES, isConnectionTransitionAllowed } from "./core/connection-state.js";
export type { Endpoint, EndpointProtocol } from "./core/endpoint.js";
export { parseEndpoint } from "./core/endpoint.js";
export { EventDispatcher } from "./core/event-dispatcher.js";
export { EventSource } from "./core/event-source.js";
export { readLines } from "./core/frame-reader.js";
export { ListenerRegistry } from "./core/listener-registry.js";
export type { Field, ParseResult, ParserPhase } from "./core/stream-parser.js";
export { parseField, StreamParser } from "./core/stream-parser.js";
// Errors
export {
  ConfigError,
  ConnectionError,
  EndpointError,
  errorMessage,
  EventSourceError,
  toEventSourceError,
} from "./errors.js";
// Interfaces
export type { Logger } from "./interfaces/logger.js";
export type { ByteStream, Connector } from "./interfaces/transport.js";
// Types
export type { EventSourceOptions, ResolvedOptions } from "./types/config.js";
export { DEFAULT_OPTIONS, resolveOptions } from "./types/config.js";
export type { EventListener, OpenListener, SSEEvent } from "./types/sse-event.js";
export { DEFAULT_EVENT_TYPE } from "./types/sse-event.js";
// Utilities
export { LineBuffer } from "./utils/line-buffer.js";
