#!/usr/bin/env node
import { LogLevel, parseLogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { type CliConfig, CliUsageError, formatEvent, HELP_TEXT, parseArgs } from "../cli/args.js";
import { closeOnSignals } from "../cli/shutdown.js";
import { EventSource } from "../core/event-source.js";
import { EventSourceError } from "../errors.js";

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  let config: CliConfig;
  try {
    config = parseArgs(process.argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}\nRun with --help for usage.`);
      process.exit(1);
    }
    throw err;
  }

  if (config.help) {
    console.log(HELP_TEXT);
    return;
  }

  const envLevel = parseLogLevel(process.env.EVENTLINE_LOG_LEVEL ?? "");
  const logger = new StructuredLogger({
    component: "eventline",
    level: config.verbose ? LogLevel.DEBUG : (envLevel ?? LogLevel.WARN),
  });

  let source: EventSource;
  try {
    source = await EventSource.open(config.url, {
      headers: config.headers,
      connectTimeoutMs: config.connectTimeoutMs,
      logger: logger.child("event-source"),
    });
  } catch (err) {
    if (err instanceof EventSourceError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  source.onOpen(() => {
    logger.info("Stream open", { url: source.url });
  });
  for (const type of config.eventTypes) {
    source.addEventListener(type, (event) => {
      process.stdout.write(`${formatEvent(event)}\n`);
    });
  }

  const removeSignalHandlers = closeOnSignals(source, logger);
  await source.stopped();
  removeSignalHandlers();
  logger.info("Stream ended", { url: source.url });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
