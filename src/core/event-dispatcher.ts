/**
 * EventDispatcher: invokes the registered listeners for a completed event
 * or for the open transition.
 *
 * Listeners run in registration order. Each event listener gets its own copy
 * of the event. A listener that throws or rejects is logged and skipped; the
 * ones after it still run.
 *
 * Async listeners are started, not awaited.
 *
 * @module Client
 */

import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";
import type { SSEEvent } from "../types/sse-event.js";
import type { ListenerRegistry } from "./listener-registry.js";

export class EventDispatcher {
  constructor(
    private readonly registry: ListenerRegistry,
    private readonly logger: Logger = noopLogger,
  ) {}

  /** Returns the number of listeners invoked. Unregistered types are a no-op. */
  dispatch(event: SSEEvent): number {
    const listeners = this.registry.listenersFor(event.type);
    if (listeners.length === 0) {
      this.logger.debug?.("No listeners for event", { eventType: event.type });
      return 0;
    }

    for (const listener of listeners) {
      this.invoke(event.type, () => listener({ ...event }));
    }
    return listeners.length;
  }

  dispatchOpen(): number {
    const listeners = this.registry.openListeners();
    for (const listener of listeners) {
      this.invoke("open", () => listener());
    }
    return listeners.length;
  }

  private invoke(eventType: string, call: () => void | PromiseLike<void>): void {
    try {
      const result = call();
      if (isPromiseLike(result)) {
        Promise.resolve(result).catch((err: unknown) => {
          this.logger.warn("Event listener rejected", { eventType, error: err });
        });
      }
    } catch (err) {
      this.logger.warn("Event listener threw", { eventType, error: err });
    }
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}
