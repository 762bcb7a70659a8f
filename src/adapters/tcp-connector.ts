/**
 * TcpConnector: opens the socket for an endpoint and sends the GET request
 * that starts the event stream.
 *
 * `http:` endpoints use node:net, `https:` endpoints use node:tls. The
 * response, status line and headers included, is handed to the caller
 * unparsed as a ByteStream.
 *
 * @module Transport
 */

import { connect as netConnect, isIP, type Socket } from "node:net";
import { type ConnectionOptions, connect as tlsConnect } from "node:tls";
import { AsyncMessageQueue } from "../core/async-message-queue.js";
import type { Endpoint } from "../core/endpoint.js";
import { ConnectionError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ByteStream, Connector } from "../interfaces/transport.js";
import { DEFAULT_OPTIONS } from "../types/config.js";
import { noopLogger } from "./noop-logger.js";

export interface TcpConnectorOptions {
  connectTimeoutMs?: number;
  /** Extra request headers, written after the fixed ones. */
  headers?: Record<string, string>;
  logger?: Logger;
  /** Passed to tls.connect for https endpoints (e.g. a test CA). */
  tls?: Pick<ConnectionOptions, "ca" | "rejectUnauthorized" | "servername">;
}

/** Build the request that asks the server for an event stream. */
export function buildRequest(endpoint: Endpoint, headers: Record<string, string> = {}): string {
  const lines = [
    `GET ${endpoint.path} HTTP/1.1`,
    `Host: ${endpoint.hostHeader}`,
    "Accept: text/event-stream",
    "Cache-Control: no-cache",
    ...Object.entries(headers).map(([name, value]) => `${name}: ${value}`),
  ];
  return `${lines.join("\r\n")}\r\n\r\n`;
}

/** ByteStream over a connected socket. */
export class SocketByteStream implements ByteStream {
  private readonly incoming = new AsyncMessageQueue<Uint8Array>();

  constructor(
    private readonly socket: Socket,
    private readonly logger: Logger = noopLogger,
  ) {
    socket.on("data", (chunk: Buffer) => this.incoming.enqueue(chunk));
    socket.on("end", () => this.incoming.finish());
    socket.on("close", () => this.incoming.finish());
    socket.on("error", (err) => {
      this.logger.debug?.("Socket error", { error: err });
      this.incoming.fail(err);
    });
  }

  chunks(): AsyncIterable<Uint8Array> {
    return this.incoming;
  }

  shutdown(): void {
    this.incoming.clear();
    if (!this.socket.destroyed) this.socket.destroy();
  }
}

export class TcpConnector implements Connector {
  private readonly connectTimeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  constructor(private readonly options: TcpConnectorOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_OPTIONS.connectTimeoutMs;
    this.headers = options.headers ?? {};
    this.logger = options.logger ?? noopLogger;
  }

  connect(endpoint: Endpoint): Promise<ByteStream> {
    return new Promise<ByteStream>((resolve, reject) => {
      const connectEvent = endpoint.protocol === "https" ? "secureConnect" : "connect";
      const socket: Socket =
        endpoint.protocol === "https"
          ? tlsConnect({
              host: endpoint.hostname,
              port: endpoint.port,
              servername: isIP(endpoint.hostname) ? undefined : endpoint.hostname,
              ...this.options.tls,
            })
          : netConnect({ host: endpoint.hostname, port: endpoint.port });

      const fail = (err: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(
          new ConnectionError(`Failed to connect to ${endpoint.url}: ${err.message}`, {
            cause: err,
          }),
        );
      };

      const timer = setTimeout(() => {
        fail(new Error(`timed out after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);

      socket.once("error", fail);
      socket.once(connectEvent, () => {
        clearTimeout(timer);
        socket.off("error", fail);
        const stream = new SocketByteStream(socket, this.logger);
        this.logger.debug?.("Socket connected", { host: endpoint.hostname, port: endpoint.port });
        socket.write(buildRequest(endpoint, this.headers));
        resolve(stream);
      });
    });
  }
}
