/**
 * Public test utilities, exported from the `"eventline/testing"` entry point.
 * Consumers can drive an EventSource without a network with these helpers.
 */
export { NoopLogger, noopLogger } from "./adapters/noop-logger.js";
export { FakeSseServer } from "./testing/fake-sse-server.js";
export { MemoryByteStream, MemoryConnector } from "./testing/memory-byte-stream.js";
