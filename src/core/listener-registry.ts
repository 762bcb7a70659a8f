/**
 * ListenerRegistry: event type → ordered listeners, plus ordered open-listeners.
 *
 * Append-only. Lookups return snapshots, so a listener registered while a
 * dispatch is running takes effect from the next dispatch on.
 *
 * @module Client
 */

import type { EventListener, OpenListener } from "../types/sse-event.js";

export class ListenerRegistry {
  private readonly byType = new Map<string, EventListener[]>();
  private readonly onOpen: OpenListener[] = [];

  register(eventType: string, listener: EventListener): void {
    const list = this.byType.get(eventType);
    if (list) {
      list.push(listener);
    } else {
      this.byType.set(eventType, [listener]);
    }
  }

  registerOpen(listener: OpenListener): void {
    this.onOpen.push(listener);
  }

  /** Listeners for a type in registration order; empty when none are registered. */
  listenersFor(eventType: string): readonly EventListener[] {
    return [...(this.byType.get(eventType) ?? [])];
  }

  openListeners(): readonly OpenListener[] {
    return [...this.onOpen];
  }

  listenerCount(eventType: string): number {
    return this.byType.get(eventType)?.length ?? 0;
  }

  /** Event types with at least one listener, in first-registration order. */
  eventTypes(): string[] {
    return [...this.byType.keys()];
  }
}
