import * as net from "node:net";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../../interfaces/socket.js";

export class NodeTcpSocket implements ITcpSocket {
  private readonly socket: net.Socket;
  private closedWithError: boolean | null = null;
  private lastError: Error | null = null;
  private ended = false;

  constructor(socket: net.Socket) {
    this.socket = socket;

    // Accepted sockets can wait in the work queue before anyone subscribes;
    // record what happens meanwhile so late subscribers still hear about it.
    this.socket.on("error", (err) => {
      this.lastError = err;
    });
    this.socket.on("end", () => {
      this.ended = true;
    });
    this.socket.on("close", (hadError) => {
      this.closedWithError = hadError;
    });
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get remotePort(): number | undefined {
    return this.socket.remotePort;
  }

  send(data: Uint8Array): void {
    if (this.socket.destroyed || !this.socket.writable) {
      return;
    }
    this.socket.write(data);
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new Error("Socket is not writable"));
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      const done = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      };

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(err);
      };

      const onDrain = () => done();
      const onClose = () => fail(new Error("Socket closed during write"));
      const onError = (err: Error) => fail(err);

      const cleanup = () => {
        this.socket.off("drain", onDrain);
        this.socket.off("close", onClose);
        this.socket.off("error", onError);
      };

      this.socket.once("close", onClose);
      this.socket.once("error", onError);

      try {
        const accepted = this.socket.write(data);
        if (accepted) {
          done();
        } else {
          this.socket.once("drain", onDrain);
        }
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.socket.on("data", (data: Buffer) => {
      cb(new Uint8Array(data));
    });
  }

  onEnd(cb: () => void): void {
    if (this.ended) {
      queueMicrotask(cb);
      return;
    }
    this.socket.on("end", cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    const hadError = this.closedWithError;
    if (hadError !== null) {
      queueMicrotask(() => cb(hadError));
      return;
    }
    this.socket.on("close", cb);
  }

  onError(cb: (err: Error) => void): void {
    const err = this.lastError;
    if (err) {
      queueMicrotask(() => cb(err));
    }
    this.socket.on("error", cb);
  }

  close(): void {
    if (this.socket.destroyed) {
      return;
    }
    // The server is created half-open, so end() alone may leave the socket
    // waiting on the peer; destroy once our side has flushed.
    this.socket.end(() => {
      this.socket.destroy();
    });
  }

  setNoDelay(enabled: boolean): void {
    this.socket.setNoDelay(enabled);
  }
}

export class NodeTcpServer implements ITcpServer {
  private readonly server: net.Server;

  constructor() {
    // Half-open lets a client that shuts down its write side after sending
    // still receive the response.
    this.server = net.createServer({ allowHalfOpen: true });
  }

  listen(port: number, host?: string, callback?: () => void): void {
    this.server.listen(port, host, callback);
  }

  address(): { port: number } | null {
    const addr = this.server.address();
    if (addr && typeof addr === "object" && "port" in addr) {
      return { port: addr.port };
    }
    return null;
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    if (event === "connection") {
      this.server.on("connection", cb as (socket: net.Socket) => void);
      return;
    }
    this.server.on("error", cb as (err: Error) => void);
  }

  close(callback?: () => void): void {
    this.server.close(() => callback?.());
  }
}

export class NodeSocketFactory implements ISocketFactory {
  createTcpServer(): ITcpServer {
    return new NodeTcpServer();
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof net.Socket)) {
      throw new Error("Expected a Node net.Socket");
    }
    return new NodeTcpSocket(socket);
  }
}
