export class EventSourceError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EventSourceError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Malformed or unsupported endpoint URL. Never retried. */
export class EndpointError extends EventSourceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "ENDPOINT", options);
    this.name = "EndpointError";
  }
}

/** Transport could not be established. */
export class ConnectionError extends EventSourceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONNECTION", options);
    this.name = "ConnectionError";
  }
}

export class ConfigError extends EventSourceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to EventSourceError (preserves cause chain). */
export function toEventSourceError(value: unknown): EventSourceError {
  if (value instanceof EventSourceError) return value;
  if (value instanceof Error) return new EventSourceError(value.message, "UNKNOWN", { cause: value });
  return new EventSourceError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
