/**
 * Connection state: the states an EventSource moves through and the
 * transitions between them.
 *
 * "open" is entered once, when the header block ends. "closed" is terminal.
 *
 * @module Client
 */

export const CONNECTION_STATES = ["connecting", "open", "closed"] as const;

export type ConnectionState = (typeof CONNECTION_STATES)[number];

const ALLOWED_TRANSITIONS: Record<ConnectionState, ReadonlySet<ConnectionState>> = {
  connecting: new Set(["open", "closed"]),
  open: new Set(["closed"]),
  closed: new Set(),
};

export function isConnectionTransitionAllowed(from: ConnectionState, to: ConnectionState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}
