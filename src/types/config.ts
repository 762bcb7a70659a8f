import { eventSourceOptionsSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { Connector } from "../interfaces/transport.js";

/** Options accepted by EventSource.open() */
export interface EventSourceOptions {
  // Transport
  connectTimeoutMs?: number; // default: 10000
  headers?: Record<string, string>; // extra request headers; Host and Accept are fixed

  // Collaborators (not validated)
  logger?: Logger; // default: noopLogger
  connector?: Connector; // default: TcpConnector
}

/** Validated transport settings with defaults applied. */
export type ResolvedOptions = Required<Pick<EventSourceOptions, "connectTimeoutMs" | "headers">>;

export const DEFAULT_OPTIONS: ResolvedOptions = {
  connectTimeoutMs: 10000,
  headers: {},
};

export function resolveOptions(options: EventSourceOptions = {}): ResolvedOptions {
  const validation = eventSourceOptionsSchema.safeParse({
    connectTimeoutMs: options.connectTimeoutMs,
    headers: options.headers,
  });
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  return {
    connectTimeoutMs: validation.data.connectTimeoutMs ?? DEFAULT_OPTIONS.connectTimeoutMs,
    headers: { ...DEFAULT_OPTIONS.headers, ...validation.data.headers },
  };
}
