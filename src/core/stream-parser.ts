/**
 * StreamParser: the line-level state machine of an event stream.
 *
 * Starts in the `header` phase and skips lines until the first empty line,
 * which ends the header block and opens the stream. In the `body` phase it
 * accumulates `field: value` lines into a pending event and emits the event
 * when an empty line closes the block.
 *
 * `feed` never throws: every line shape has a defined outcome.
 *
 * @module Client
 */

import { DEFAULT_EVENT_TYPE, type SSEEvent } from "../types/sse-event.js";

export type ParserPhase = "header" | "body";

export type ParseResult =
  | { kind: "none" }
  | { kind: "open" }
  | { kind: "event"; event: SSEEvent };

export interface Field {
  name: string;
  value: string;
}

const NONE: ParseResult = { kind: "none" };
const OPEN: ParseResult = { kind: "open" };

/**
 * Split a line at its first `:`. The value loses its leading whitespace.
 * A line without a separator is all name and has an empty value.
 */
export function parseField(line: string): Field {
  const idx = line.indexOf(":");
  if (idx === -1) return { name: line, value: "" };
  return { name: line.slice(0, idx), value: line.slice(idx + 1).trimStart() };
}

export class StreamParser {
  private currentPhase: ParserPhase = "header";
  private pending: SSEEvent | null = null;

  get phase(): ParserPhase {
    return this.currentPhase;
  }

  /** The event under construction, if any. Returned as a copy. */
  get pendingEvent(): SSEEvent | null {
    return this.pending ? { ...this.pending } : null;
  }

  feed(line: string): ParseResult {
    if (this.currentPhase === "header") {
      if (line !== "") return NONE;
      this.currentPhase = "body";
      return OPEN;
    }

    if (line === "") {
      const event = this.pending;
      this.pending = null;
      return event ? { kind: "event", event } : NONE;
    }

    if (line.startsWith(":")) return NONE;

    this.applyField(parseField(line));
    return NONE;
  }

  private applyField(field: Field): void {
    const event = this.pending ?? { type: DEFAULT_EVENT_TYPE, data: "" };
    switch (field.name) {
      case "event":
        event.type = field.value;
        break;
      case "data":
        event.data = field.value;
        break;
      default:
        // unknown fields are ignored
        break;
    }
    this.pending = event;
  }
}
