import type { Endpoint } from "../core/endpoint.js";

/**
 * Runtime-agnostic duplex byte stream. Only what the client uses:
 * the incoming chunks and a way to shut both directions down.
 */
export interface ByteStream {
  /**
   * Incoming data in arrival order. Ends when the peer closes the stream or
   * after shutdown(); may throw on an I/O error.
   */
  chunks(): AsyncIterable<Uint8Array>;
  /** Close both directions. Reads pending on chunks() end. */
  shutdown(): void;
}

/** Opens a ByteStream to an endpoint. Rejects with ConnectionError. */
export interface Connector {
  connect(endpoint: Endpoint): Promise<ByteStream>;
}
