import type { ServerConfig } from "../config/server-config.js";
import {
  createHttpRequestParser,
  HttpRequestParseError,
} from "../http/request-parser.js";
import { sendResponse } from "../http/response-writer.js";
import type { HttpRequest } from "../http/types.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { routeRequest } from "./router.js";
import { WorkerPool } from "./worker-pool.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  config: ServerConfig;
  logger?: Logger;
}

export type WebServerEvents = {
  listening: [port: number];
  error: [err: Error];
  close: [];
};

export interface ConnectionStats {
  /** Connections a worker is processing. */
  active: number;
  /** Accepted connections waiting for a free worker. */
  queued: number;
}

/**
 * Accepts connections and hands them to a fixed worker pool. Each connection
 * carries exactly one request: parse, route, respond, close.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private pool: WorkerPool<ITcpSocket> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
  }

  get connectionStats(): ConnectionStats {
    return {
      active: this.pool?.active ?? 0,
      queued: this.pool?.pending ?? 0,
    };
  }

  async start(): Promise<number> {
    if (this.tcpServer) {
      throw new Error("Server is already started");
    }

    const server = this.socketFactory.createTcpServer();
    const pool = new WorkerPool<ITcpSocket>({
      size: this.config.workers,
      handler: (socket) => this.handleConnection(socket),
      onDropped: (socket) => socket.close(),
      logger: this.logger,
    });
    this.tcpServer = server;
    this.pool = pool;

    server.on("connection", (rawSocket) => {
      this.acceptConnection(pool, rawSocket);
    });

    let port: number;
    try {
      port = await this.listen(server);
    } catch (err) {
      this.tcpServer = null;
      this.pool = null;
      await pool.shutdown();
      throw err;
    }

    this.emit("listening", port);
    return port;
  }

  /**
   * Stop accepting, then wait for every accepted connection to be handled.
   * A peer that never finishes its request holds this open. Calls made
   * while stopping share the same promise; later calls do nothing.
   */
  stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }

    const server = this.tcpServer;
    const pool = this.pool;
    if (!server || !pool) {
      return Promise.resolve();
    }
    this.tcpServer = null;
    this.pool = null;

    this.stopping = this.shutdown(server, pool).finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async shutdown(
    server: ITcpServer,
    pool: WorkerPool<ITcpSocket>,
  ): Promise<void> {
    await Promise.all([
      new Promise<void>((resolve) => server.close(() => resolve())),
      pool.shutdown(),
    ]);

    this.emit("close");
  }

  private listen(server: ITcpServer): Promise<number> {
    return new Promise((resolve, reject) => {
      let settled = false;

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        resolve(addr?.port ?? this.config.port);
      });
    });
  }

  private acceptConnection(
    pool: WorkerPool<ITcpSocket>,
    rawSocket: unknown,
  ): void {
    let socket: ITcpSocket;
    try {
      socket = this.socketFactory.wrapTcpSocket(rawSocket);
    } catch (err) {
      this.logger.warn("Failed to accept connection:", err);
      return;
    }
    pool.submit(socket);
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    socket.setNoDelay?.(true);
    const parser = createHttpRequestParser(socket);

    try {
      let request: HttpRequest;
      try {
        request = await parser.readRequest({
          timeoutMs: this.config.requestTimeoutMs,
          maxHeaderSize: this.config.maxHeaderSize,
          maxBodySize: this.config.maxRequestBodySize,
        });
      } catch (err) {
        this.logDroppedConnection(socket, err);
        return;
      }

      if (!this.config.quiet) {
        const addr = socket.remoteAddress ?? "?";
        this.logger.info(`${request.method} ${request.url} - ${addr}`);
      }

      const response = routeRequest(request);
      try {
        await sendResponse(socket, response);
      } catch (err) {
        this.logger.debug("Failed to write response:", err);
      }
    } finally {
      socket.close();
    }
  }

  private logDroppedConnection(socket: ITcpSocket, err: unknown): void {
    const addr = socket.remoteAddress ?? "?";
    if (classifyConnectionFailure(err) === "expected") {
      this.logger.debug(`Connection from ${addr} closed without a request`);
      return;
    }
    this.logger.warn(`Dropped connection from ${addr}:`, err);
  }
}

/**
 * Peers that connect and leave (or idle out) are routine; anything else that
 * stops a request from being read is worth a warning.
 */
export function classifyConnectionFailure(
  err: unknown,
): "expected" | "unexpected" {
  if (
    err instanceof HttpRequestParseError &&
    (err.code === "CONNECTION_CLOSED" || err.code === "IDLE_TIMEOUT")
  ) {
    return "expected";
  }
  return "unexpected";
}
