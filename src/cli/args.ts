import { DEFAULT_EVENT_TYPE, type SSEEvent } from "../types/sse-event.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface CliConfig {
  url: string;
  /** Event types to print; always includes "message". */
  eventTypes: string[];
  headers: Record<string, string>;
  connectTimeoutMs?: number;
  verbose: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const HELP_TEXT = `
  eventline: print a server-sent event stream as JSON lines

  Usage: eventline <url> [options]

  Options:
    --event <type>         Also print events of this type (repeatable)
    --header "Name: value" Extra request header (repeatable)
    --timeout <ms>         Connect timeout in milliseconds (default: 10000)
    --verbose, -v          Debug logging on stderr
    --help, -h             Show this help
`;

// ── Arg parsing ────────────────────────────────────────────────────────────

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined) throw new CliUsageError(`${flag} requires a value`);
  return value;
}

/** Parse `process.argv`. Throws CliUsageError on bad input. */
export function parseArgs(argv: string[]): CliConfig {
  const config: CliConfig = {
    url: "",
    eventTypes: [DEFAULT_EVENT_TYPE],
    headers: {},
    verbose: false,
    help: false,
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--event": {
        const type = requireValue(argv, ++i, arg);
        if (!config.eventTypes.includes(type)) config.eventTypes.push(type);
        break;
      }
      case "--header": {
        const header = requireValue(argv, ++i, arg);
        const idx = header.indexOf(":");
        if (idx <= 0) throw new CliUsageError(`--header expects "Name: value", got "${header}"`);
        config.headers[header.slice(0, idx).trim()] = header.slice(idx + 1).trim();
        break;
      }
      case "--timeout": {
        const timeout = Number(requireValue(argv, ++i, arg));
        if (!Number.isInteger(timeout) || timeout <= 0) {
          throw new CliUsageError("--timeout requires a positive integer");
        }
        config.connectTimeoutMs = timeout;
        break;
      }
      case "--verbose":
      case "-v":
        config.verbose = true;
        break;
      case "--help":
      case "-h":
        config.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        if (config.url) throw new CliUsageError(`Unexpected argument: ${arg}`);
        config.url = arg;
    }
  }

  if (!config.url && !config.help) throw new CliUsageError("Missing <url>");
  return config;
}

/** One output line per event. */
export function formatEvent(event: SSEEvent): string {
  return JSON.stringify({ type: event.type, data: event.data });
}
