/**
 * EventSource: client for a server-sent event stream.
 *
 * `open()` parses the endpoint, connects, and starts one background worker
 * that reads lines, feeds them to the StreamParser and dispatches what the
 * parser completes. Registration, `state` and `close()` can be used at any
 * time from the caller's side; nothing they touch is held across a listener
 * call.
 *
 * State moves connecting → open → closed. The stream ending on its own (remote
 * close or read error) also moves it to closed. There is no reconnection.
 *
 * @example
 * ```ts
 * const source = await EventSource.open("http://127.0.0.1:8080/sub");
 * source.onOpen(() => console.log("open"));
 * source.onMessage((event) => console.log(event.data));
 * source.addEventListener("update", (event) => console.log(event.data));
 * // later
 * source.close();
 * ```
 *
 * @module Client
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { TcpConnector } from "../adapters/tcp-connector.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ByteStream } from "../interfaces/transport.js";
import { type EventSourceOptions, resolveOptions } from "../types/config.js";
import {
  DEFAULT_EVENT_TYPE,
  type EventListener,
  type OpenListener,
} from "../types/sse-event.js";
import { type ConnectionState, isConnectionTransitionAllowed } from "./connection-state.js";
import { parseEndpoint } from "./endpoint.js";
import { EventDispatcher } from "./event-dispatcher.js";
import { readLines } from "./frame-reader.js";
import { ListenerRegistry } from "./listener-registry.js";
import { StreamParser } from "./stream-parser.js";

export class EventSource {
  private currentState: ConnectionState = "connecting";
  private readonly registry = new ListenerRegistry();
  private readonly dispatcher: EventDispatcher;
  private readonly parser = new StreamParser();
  private worker: Promise<void> | null = null;

  private constructor(
    readonly url: string,
    private readonly stream: ByteStream,
    private readonly logger: Logger,
  ) {
    this.dispatcher = new EventDispatcher(this.registry, logger);
  }

  /**
   * Connect to `url` and start reading.
   *
   * Rejects with ConfigError for invalid options, EndpointError for a
   * malformed or non-http(s) URL (no connection is attempted), and
   * ConnectionError when the transport cannot be established.
   */
  static async open(url: string, options: EventSourceOptions = {}): Promise<EventSource> {
    const resolved = resolveOptions(options);
    const endpoint = parseEndpoint(url);
    const logger = options.logger ?? noopLogger;
    const connector =
      options.connector ??
      new TcpConnector({
        connectTimeoutMs: resolved.connectTimeoutMs,
        headers: resolved.headers,
        logger,
      });

    const stream = await connector.connect(endpoint);
    logger.info("Connected to event stream", { url: endpoint.url });

    const source = new EventSource(endpoint.url, stream, logger);
    source.start();
    return source;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  onOpen(listener: OpenListener): void {
    this.registry.registerOpen(listener);
  }

  onMessage(listener: EventListener): void {
    this.addEventListener(DEFAULT_EVENT_TYPE, listener);
  }

  addEventListener(eventType: string, listener: EventListener): void {
    this.registry.register(eventType, listener);
  }

  /** Shut the transport down and move to closed. Calling it again does nothing. */
  close(): void {
    if (this.currentState === "closed") return;
    this.transition("closed");
    this.stream.shutdown();
    this.logger.info("Event stream closed", { url: this.url });
  }

  /** Resolves once the background worker has exited. Never rejects. */
  stopped(): Promise<void> {
    return this.worker ?? Promise.resolve();
  }

  private start(): void {
    this.worker = this.run().catch((err: unknown) => {
      this.logger.error("Event stream worker failed", { url: this.url, error: err });
    });
  }

  private async run(): Promise<void> {
    try {
      for await (const line of readLines(this.stream.chunks())) {
        if (this.currentState === "closed") break;
        this.handleLine(line);
      }
      this.logger.debug?.("Event stream ended", { url: this.url });
    } catch (err) {
      if (this.currentState !== "closed") {
        this.logger.warn("Event stream read failed", { url: this.url, error: errorMessage(err) });
      }
    } finally {
      if (this.currentState !== "closed") {
        this.transition("closed");
        this.stream.shutdown();
      }
    }
  }

  private handleLine(line: string): void {
    const result = this.parser.feed(line);
    switch (result.kind) {
      case "open":
        this.transition("open");
        this.logger.debug?.("Event stream open", { url: this.url });
        this.dispatcher.dispatchOpen();
        break;
      case "event": {
        const invoked = this.dispatcher.dispatch(result.event);
        this.logger.debug?.("Dispatched event", {
          eventType: result.event.type,
          listeners: invoked,
        });
        break;
      }
      case "none":
        break;
    }
  }

  private transition(to: ConnectionState): void {
    if (!isConnectionTransitionAllowed(this.currentState, to)) {
      this.logger.warn("Ignored connection state transition", { from: this.currentState, to });
      return;
    }
    this.currentState = to;
  }
}
