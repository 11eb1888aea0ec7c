import {
  defaultConfig,
  filteredLogger,
  type Logger,
  prefixedLogger,
  type ServerConfig,
  type WebServer,
} from "@poolhttp/engine";
import { HELP_TEXT, parseArgs } from "./args.js";
import { VERSION } from "./version.js";

export type ShutdownSignal = "SIGINT" | "SIGTERM";

/** Process-level effects the CLI needs, so it can run outside a real process. */
export interface CliRuntime {
  print(text: string): void;
  printError(text: string): void;
  logger: Logger;
  createServer(config: ServerConfig, logger: Logger): WebServer;
  onSignal(signal: ShutdownSignal, handler: () => void): void;
  exit(code: number): void;
}

export type CliOutcome =
  | { kind: "exited"; code: number }
  | { kind: "running"; server: WebServer; port: number };

export async function runCli(
  argv: string[],
  runtime: CliRuntime,
): Promise<CliOutcome> {
  const parsed = parseArgs(argv);
  switch (parsed.kind) {
    case "help":
      runtime.print(HELP_TEXT);
      return { kind: "exited", code: 0 };
    case "version":
      runtime.print(VERSION);
      return { kind: "exited", code: 0 };
    case "error":
      runtime.printError(parsed.message);
      runtime.print(HELP_TEXT);
      return { kind: "exited", code: 1 };
  }

  const { options } = parsed;
  const logger = prefixedLogger(
    "poolhttp",
    filteredLogger(options.logLevel, runtime.logger),
  );

  const config: ServerConfig = {
    ...defaultConfig(),
    port: options.port,
    host: options.host,
    workers: options.workers,
    requestTimeoutMs: options.timeoutMs,
    quiet: options.quiet,
  };

  const server = runtime.createServer(config, logger);
  let port: number;
  try {
    port = await server.start();
  } catch (err) {
    logger.error("Failed to start server:", err);
    return { kind: "exited", code: 1 };
  }
  logger.info(
    `Listening on ${config.host}:${port} with ${config.workers} workers`,
  );

  let stopping = false;
  const shutdown = () => {
    if (stopping) {
      // Second signal: stop waiting on connections that never finish.
      runtime.exit(1);
      return;
    }
    stopping = true;
    logger.info("Shutting down...");
    server.stop().then(
      () => runtime.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed:", err);
        runtime.exit(1);
      },
    );
  };

  runtime.onSignal("SIGINT", shutdown);
  runtime.onSignal("SIGTERM", shutdown);

  return { kind: "running", server, port };
}
