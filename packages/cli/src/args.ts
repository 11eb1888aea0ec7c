import {
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_WORKERS,
  isLogLevel,
  type LogLevel,
} from "@poolhttp/engine";

export interface CliOptions {
  port: number;
  host: string;
  workers: number;
  timeoutMs: number;
  quiet: boolean;
  logLevel: LogLevel;
}

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

function parseInteger(raw: string | undefined, min: number): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  const value = Number.parseInt(raw, 10);
  return value >= min ? value : null;
}

export function parseArgs(args: string[]): ParsedArgs {
  const options: CliOptions = {
    port: DEFAULT_PORT,
    host: DEFAULT_HOST,
    workers: DEFAULT_WORKERS,
    timeoutMs: 0,
    quiet: false,
    logLevel: "info",
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      const port = parseInteger(args[++i], 0);
      if (port === null || port > 65535) {
        return { kind: "error", message: "Invalid port number" };
      }
      options.port = port;
    } else if (arg === "--host" || arg === "-H") {
      const host = args[++i];
      if (!host) {
        return { kind: "error", message: "Missing value for --host" };
      }
      options.host = host;
    } else if (arg === "--workers" || arg === "-w") {
      const workers = parseInteger(args[++i], 1);
      if (workers === null) {
        return { kind: "error", message: "Invalid worker count" };
      }
      options.workers = workers;
    } else if (arg === "--timeout") {
      const timeoutMs = parseInteger(args[++i], 0);
      if (timeoutMs === null) {
        return { kind: "error", message: "Invalid timeout" };
      }
      options.timeoutMs = timeoutMs;
    } else if (arg === "--log-level") {
      const level = args[++i] ?? "";
      if (!isLogLevel(level)) {
        return { kind: "error", message: `Unknown log level: ${level}` };
      }
      options.logLevel = level;
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  return { kind: "run", options };
}

export const HELP_TEXT = `
poolhttp - minimal HTTP server with a fixed worker pool

Usage: poolhttp [options]

Options:
  --port, -p <port>      Port to listen on (default: ${DEFAULT_PORT})
  --host, -H <host>      Host to bind (default: ${DEFAULT_HOST})
  --workers, -w <n>      Connection workers (default: ${DEFAULT_WORKERS})
  --timeout <ms>         Request read timeout, 0 to wait forever (default: 0)
  --log-level <level>    debug, info, warn or error (default: info)
  --quiet, -q            Suppress request logging
  --version, -v          Show version
  --help, -h             Show this help
`;
