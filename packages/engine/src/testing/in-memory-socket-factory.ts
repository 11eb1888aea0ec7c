import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";

const DEFAULT_RESPONSE_TIMEOUT_MS = 1000;

/**
 * One end of an in-process socket pair. Like a paused Node socket, data,
 * end and close that arrive before anyone subscribes are held and replayed
 * to the first subscriber.
 */
export class InMemoryTcpSocket implements ITcpSocket {
  remoteAddress?: string;
  remotePort?: number;
  noDelay = false;

  private peer: InMemoryTcpSocket | null = null;
  private closed = false;
  private ended = false;
  private lastError: Error | null = null;
  private pendingData: Uint8Array[] = [];
  private dataCallbacks: Array<(data: Uint8Array) => void> = [];
  private endCallbacks: Array<() => void> = [];
  private closeCallbacks: Array<(hadError: boolean) => void> = [];
  private errorCallbacks: Array<(err: Error) => void> = [];

  static createPair(): [InMemoryTcpSocket, InMemoryTcpSocket] {
    const a = new InMemoryTcpSocket();
    const b = new InMemoryTcpSocket();
    a.peer = b;
    b.peer = a;
    a.remoteAddress = "in-memory";
    b.remoteAddress = "in-memory";
    a.remotePort = 1;
    b.remotePort = 2;
    return [a, b];
  }

  send(data: Uint8Array): void {
    if (this.closed || !this.peer || this.peer.closed) {
      return;
    }

    const copy = data.slice();
    queueMicrotask(() => {
      this.peer?.emitData(copy);
    });
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error("Socket is not writable"));
    }
    this.send(data);
    return Promise.resolve();
  }

  /** Half-close: the peer sees end of stream but can still write back. */
  end(): void {
    queueMicrotask(() => {
      this.peer?.emitEnd();
    });
  }

  /** Fail this end as a transport error would. */
  fail(err: Error): void {
    queueMicrotask(() => {
      if (this.closed) return;
      this.lastError = err;
      for (const cb of this.errorCallbacks) {
        cb(err);
      }
      this.closeInternal(true, false);
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.dataCallbacks.push(cb);
    const pending = this.pendingData;
    this.pendingData = [];
    for (const data of pending) {
      cb(data);
    }
  }

  onEnd(cb: () => void): void {
    this.endCallbacks.push(cb);
    if (this.ended) {
      queueMicrotask(cb);
    }
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.closeCallbacks.push(cb);
    if (this.closed) {
      queueMicrotask(() => cb(false));
    }
  }

  onError(cb: (err: Error) => void): void {
    this.errorCallbacks.push(cb);
    const err = this.lastError;
    if (err) {
      queueMicrotask(() => cb(err));
    }
  }

  // Deferred so that data queued by earlier sends reaches the peer first.
  close(): void {
    queueMicrotask(() => this.closeInternal(false, false));
  }

  setNoDelay(enabled: boolean): void {
    this.noDelay = enabled;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private emitData(data: Uint8Array): void {
    if (this.closed) return;
    if (this.dataCallbacks.length === 0) {
      this.pendingData.push(data);
      return;
    }
    for (const cb of this.dataCallbacks) {
      cb(data);
    }
  }

  private emitEnd(): void {
    if (this.closed || this.ended) return;
    this.ended = true;
    for (const cb of this.endCallbacks) {
      cb();
    }
  }

  private closeInternal(hadError: boolean, fromPeer: boolean): void {
    if (this.closed) return;
    this.closed = true;

    for (const cb of this.closeCallbacks) {
      cb(hadError);
    }

    if (!fromPeer && this.peer) {
      this.peer.closeInternal(hadError, true);
    }
  }
}

class InMemoryTcpServer implements ITcpServer {
  private listening = false;
  private port: number | null = null;
  private connectionCallbacks: Array<(socket: unknown) => void> = [];
  private errorCallbacks: Array<(err: Error) => void> = [];

  constructor(
    private readonly allocatePort: () => number,
    private readonly bindError: Error | null,
  ) {}

  listen(port: number, _host?: string, callback?: () => void): void {
    const bindError = this.bindError;
    if (bindError) {
      queueMicrotask(() => {
        for (const cb of this.errorCallbacks) {
          cb(bindError);
        }
      });
      return;
    }

    this.port = port === 0 ? this.allocatePort() : port;
    this.listening = true;
    queueMicrotask(() => callback?.());
  }

  address(): { port: number } | null {
    if (!this.listening || this.port === null) {
      return null;
    }
    return { port: this.port };
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    if (event === "connection") {
      this.connectionCallbacks.push(cb as (socket: unknown) => void);
      return;
    }
    this.errorCallbacks.push(cb as (err: Error) => void);
  }

  close(callback?: () => void): void {
    this.listening = false;
    this.port = null;
    queueMicrotask(() => callback?.());
  }

  isListening(): boolean {
    return this.listening;
  }

  accept(socket: unknown): void {
    if (!this.listening) {
      throw new Error("In-memory server is not listening");
    }
    for (const cb of this.connectionCallbacks) {
      cb(socket);
    }
  }
}

/** Client side of an in-memory connection, for driving the server by hand. */
export interface InMemoryConnection {
  write(data: string | Uint8Array): void;
  /** Half-close the client side. */
  end(): void;
  /** Close the connection from the client side. */
  close(): void;
  /** Raise a transport error on the server's end, which then closes. */
  fail(err: Error): void;
  /** Everything the server sent, once it closes the connection. */
  response: Promise<Uint8Array>;
}

export interface InMemorySocketFactoryOptions {
  /** Make `listen` fail with this error. */
  bindError?: Error;
  /** How long `request`/`connect` wait for the server to close. */
  responseTimeoutMs?: number;
}

export class InMemorySocketFactory implements ISocketFactory {
  private nextPort = 41000;
  private server: InMemoryTcpServer | null = null;
  private readonly bindError: Error | null;
  private readonly responseTimeoutMs: number;

  /** Server-side sockets, in accept order. */
  readonly accepted: InMemoryTcpSocket[] = [];

  constructor(options: InMemorySocketFactoryOptions = {}) {
    this.bindError = options.bindError ?? null;
    this.responseTimeoutMs =
      options.responseTimeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS;
  }

  createTcpServer(): ITcpServer {
    const server = new InMemoryTcpServer(
      () => this.nextPort++,
      this.bindError,
    );
    this.server = server;
    return server;
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof InMemoryTcpSocket)) {
      throw new Error("Expected an InMemoryTcpSocket instance");
    }
    return socket;
  }

  /** Hand the server something that is not a socket, as a broken accept would. */
  acceptRaw(raw: unknown): void {
    this.requireServer().accept(raw);
  }

  /** Open a connection without sending anything yet. */
  connect(): InMemoryConnection {
    const server = this.requireServer();
    const [clientSocket, serverSocket] = InMemoryTcpSocket.createPair();

    const response = new Promise<Uint8Array>((resolve, reject) => {
      const chunks: Uint8Array[] = [];
      let done = false;

      const timeout = setTimeout(() => {
        if (done) return;
        done = true;
        reject(new Error("Timed out waiting for in-memory response"));
      }, this.responseTimeoutMs);

      const finish = () => {
        if (done) return;
        done = true;
        clearTimeout(timeout);
        resolve(concat(chunks));
      };

      clientSocket.onData((data) => {
        chunks.push(data.slice());
      });
      clientSocket.onClose(() => finish());
    });

    this.accepted.push(serverSocket);
    server.accept(serverSocket);

    return {
      write: (data) =>
        clientSocket.send(typeof data === "string" ? fromString(data) : data),
      end: () => clientSocket.end(),
      close: () => clientSocket.close(),
      fail: (err) => serverSocket.fail(err),
      response,
    };
  }

  /** Send a raw request on a fresh connection and collect the response. */
  async request(
    rawHttp: string | Uint8Array,
    options?: { halfClose?: boolean },
  ): Promise<Uint8Array> {
    const connection = this.connect();
    connection.write(rawHttp);
    if (options?.halfClose) {
      connection.end();
    }
    return connection.response;
  }

  private requireServer(): InMemoryTcpServer {
    if (!this.server || !this.server.isListening()) {
      throw new Error("In-memory server is not listening");
    }
    return this.server;
  }
}
