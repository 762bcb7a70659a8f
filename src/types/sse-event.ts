/**
 * Event records and listener signatures shared by the parser, the registry
 * and the client.
 * @module
 */

/** Type given to an event whose block carries no `event:` field. */
export const DEFAULT_EVENT_TYPE = "message";

/** One application-level event, built from the field lines of a single block. */
export interface SSEEvent {
  type: string;
  data: string;
}

/** Receives its own copy of each event of the type it was registered for. */
export type EventListener = (event: SSEEvent) => void | PromiseLike<void>;

/** Called once when the header block ends and the connection opens. */
export type OpenListener = () => void | PromiseLike<void>;
