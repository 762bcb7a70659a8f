import { AsyncMessageQueue } from "../core/async-message-queue.js";
import type { Endpoint } from "../core/endpoint.js";
import { ConnectionError } from "../errors.js";
import type { ByteStream, Connector } from "../interfaces/transport.js";

const encoder = new TextEncoder();

/**
 * In-memory ByteStream for tests. The test plays the server: push() delivers
 * text (encoded as UTF-8) or bytes, end() closes the stream, fail() simulates
 * an I/O error. Anything pushed after shutdown() is dropped.
 */
export class MemoryByteStream implements ByteStream {
  private readonly incoming = new AsyncMessageQueue<Uint8Array>();
  private shutdownCount = 0;

  chunks(): AsyncIterable<Uint8Array> {
    return this.incoming;
  }

  shutdown(): void {
    this.shutdownCount++;
    this.incoming.clear();
  }

  push(chunk: Uint8Array | string): void {
    this.incoming.enqueue(typeof chunk === "string" ? encoder.encode(chunk) : chunk);
  }

  end(): void {
    this.incoming.finish();
  }

  fail(error: unknown): void {
    this.incoming.fail(error);
  }

  get isShutdown(): boolean {
    return this.shutdownCount > 0;
  }

  /** Number of shutdown() calls. */
  get shutdownCalls(): number {
    return this.shutdownCount;
  }
}

/**
 * Connector handing out a prepared MemoryByteStream, or failing with a
 * ConnectionError when constructed with `{ fail: true }`.
 */
export class MemoryConnector implements Connector {
  readonly stream = new MemoryByteStream();
  readonly endpoints: Endpoint[] = [];

  constructor(private readonly options: { fail?: boolean } = {}) {}

  async connect(endpoint: Endpoint): Promise<ByteStream> {
    this.endpoints.push(endpoint);
    if (this.options.fail) {
      throw new ConnectionError(`Failed to connect to ${endpoint.url}`);
    }
    return this.stream;
  }
}
