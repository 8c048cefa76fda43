#!/usr/bin/env node
import { createToolClient } from "./core/tool-client.js";
import { PlainTextFormatter } from "./interfaces/formatter.js";
import { loadConfig } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";
import { exitCodeForSignal, type ShutdownSignal } from "./utils/signals.js";

const logger = createLogger();

/**
 * toolpipe                          list the tools of every enabled server
 * toolpipe <server> <tool> [json]   invoke one tool and print its result
 */
async function main() {
  const [serverName, toolName, rawArgs] = process.argv.slice(2);

  const config = loadConfig();
  logger.info({ servers: Object.keys(config.servers) }, "Configuration loaded");

  const client = createToolClient(config, logger);
  const formatter = new PlainTextFormatter();

  let shuttingDown = false;
  const shutdown = async (signal: ShutdownSignal) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received shutdown signal");
    await client.shutdown();
    process.exit(exitCodeForSignal(signal));
  };
  const onSignal = (signal: ShutdownSignal) => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ error: err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  let exitCode = 0;
  try {
    if (serverName && toolName) {
      const args = parseArguments(rawArgs);
      const handle = await client.open(serverName);
      try {
        const result = await client.invoke(handle, toolName, args);
        process.stdout.write(`${formatter.formatResult(result)}\n`);
      } catch (err) {
        logger.debug({ error: err }, "Invocation failed");
        process.stderr.write(`${formatter.formatError(err)}\n`);
        exitCode = 1;
      }
    } else {
      for (const [name, server] of Object.entries(config.servers)) {
        if (!server.enabled) {
          logger.info({ server: name }, "Server disabled, skipping");
          continue;
        }
        try {
          const handle = await client.open(name);
          const tools = await client.listTools(handle);
          process.stdout.write(`# ${name}\n${formatter.formatToolList(tools)}\n\n`);
        } catch (err) {
          logger.warn({ server: name, error: err }, "Could not list tools");
          process.stderr.write(`# ${name}\n${formatter.formatError(err)}\n\n`);
          exitCode = 1;
        }
      }
    }
  } finally {
    if (!shuttingDown) {
      shuttingDown = true;
      const report = await client.shutdown();
      if (report.failures.length > 0) exitCode = 1;
    }
  }

  process.exit(exitCode);
}

function parseArguments(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new TypeError("Tool arguments must be a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal error");
  process.exit(1);
});
