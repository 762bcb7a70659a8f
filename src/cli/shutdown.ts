import type { EventSource } from "../core/event-source.js";
import type { Logger } from "../interfaces/logger.js";

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Close `source` when one of `signals` arrives. The caller keeps awaiting
 * `source.stopped()`, which resolves once the closed stream's worker exits.
 * Returns a function that removes the handlers.
 */
export function closeOnSignals(
  source: Pick<EventSource, "close" | "url">,
  logger: Logger,
  signals: readonly NodeJS.Signals[] = SHUTDOWN_SIGNALS,
): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info("Closing event stream", { signal, url: source.url });
    source.close();
  };

  for (const signal of signals) process.on(signal, onSignal);
  return () => {
    for (const signal of signals) process.off(signal, onSignal);
  };
}
