import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString } from "../utils/buffer.js";
import type { HttpRequest } from "./types.js";

const LF = 10; // \n
const CR = "\r";
const HEADER_SEPARATOR = ": ";
const DEFAULT_MAX_HEADER_SIZE = 8 * 1024; // 8KB
const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024; // 10MB
const MIN_BUFFER_CAPACITY = 4 * 1024;

export interface ParseHttpRequestOptions {
  /** Max time to wait for the complete request. 0 or unset waits forever. */
  timeoutMs?: number;
  /** Limit on the request line plus headers, terminators included. */
  maxHeaderSize?: number;
  /**
   * Declared bodies larger than this are read and discarded, never
   * buffered, and the request sees an empty body.
   */
  maxBodySize?: number;
}

export interface HttpRequestHead {
  method: string;
  url: string;
  path: string;
  query: string;
  httpVersion: string;
  headers: Map<string, string>;
  contentLength: number;
}

export type HttpRequestParseErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "HEADERS_TOO_LARGE"
  | "MALFORMED_REQUEST_LINE";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

/** Split a request target on its first `?`. */
export function splitRequestTarget(target: string): {
  path: string;
  query: string;
} {
  const idx = target.indexOf("?");
  if (idx === -1) {
    return { path: target, query: "" };
  }
  return { path: target.slice(0, idx), query: target.slice(idx + 1) };
}

/**
 * Content-Length as an unsigned decimal integer. Anything else, including a
 * missing header, counts as 0.
 */
export function parseContentLength(value: string | undefined): number {
  if (value === undefined) return 0;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return 0;
  const length = Number(trimmed);
  return Number.isSafeInteger(length) ? length : 0;
}

/**
 * Line-oriented reader over a single connection. Bytes are buffered as they
 * arrive; `readLine` and `readExact` suspend until enough data is present or
 * the peer stops sending.
 */
export class HttpRequestStreamParser {
  // Received bytes live in storage[start, end); storage grows by doubling.
  private storage: Uint8Array = new Uint8Array(0);
  private start = 0;
  private end = 0;
  private headBytes = 0;
  private bytesReceived = 0;
  private ended = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];
  private deadline = Number.POSITIVE_INFINITY;

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.append(data);
      this.bytesReceived += data.length;
      this.notifyWaiters();
    });

    socket.onEnd(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.ended = true;
      this.notifyWaiters();
    });
  }

  async readRequest(options?: ParseHttpRequestOptions): Promise<HttpRequest> {
    this.startDeadline(options);
    const head = await this.readRequestHead({
      maxHeaderSize: options?.maxHeaderSize,
    });
    const body = await this.readBody(head.contentLength, options);

    return {
      method: head.method,
      url: head.url,
      path: head.path,
      query: head.query,
      httpVersion: head.httpVersion,
      headers: head.headers,
      body,
    };
  }

  async readRequestHead(
    options?: ParseHttpRequestOptions,
  ): Promise<HttpRequestHead> {
    if (options?.timeoutMs !== undefined) {
      this.startDeadline(options);
    }
    const maxHeaderSize = options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;

    const requestLine = await this.readHeadLine(maxHeaderSize);
    if (requestLine === null) {
      if (this.socketError) {
        throw this.socketError;
      }
      throw new HttpRequestParseError("CONNECTION_CLOSED", "Connection closed");
    }

    const tokens = requestLine.split(/\s+/).filter((token) => token !== "");
    if (tokens.length < 2) {
      throw new HttpRequestParseError(
        "MALFORMED_REQUEST_LINE",
        "Malformed request line",
      );
    }

    const [method, url, httpVersion = ""] = tokens;
    const { path, query } = splitRequestTarget(url);

    // A read failure ends the header block rather than the request.
    const headers = new Map<string, string>();
    while (true) {
      const line = await this.readHeadLine(maxHeaderSize);
      if (line === null) break;
      const trimmed = line.trim();
      if (trimmed === "") break;

      const sep = trimmed.indexOf(HEADER_SEPARATOR);
      if (sep === -1) continue;
      headers.set(
        trimmed.slice(0, sep).toLowerCase(),
        trimmed.slice(sep + HEADER_SEPARATOR.length),
      );
    }

    return {
      method,
      url,
      path,
      query,
      httpVersion,
      headers,
      contentLength: parseContentLength(headers.get("content-length")),
    };
  }

  /**
   * Read exactly `contentLength` bytes. A peer that closes early yields an
   * empty body. A declared length over `maxBodySize` is drained from the
   * connection so the response is not answered with a reset, and also
   * yields an empty body.
   */
  async readBody(
    contentLength: number,
    options?: ParseHttpRequestOptions,
  ): Promise<Uint8Array> {
    if (contentLength <= 0) {
      return new Uint8Array(0);
    }

    const maxBodySize = options?.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
    if (contentLength > maxBodySize) {
      await this.skip(contentLength);
      return new Uint8Array(0);
    }

    const body = await this.readExact(contentLength);
    return body ?? new Uint8Array(0);
  }

  private get buffered(): Uint8Array {
    return this.storage.subarray(this.start, this.end);
  }

  private append(data: Uint8Array): void {
    const live = this.end - this.start;
    if (this.end + data.length > this.storage.length) {
      const needed = live + data.length;
      if (needed <= this.storage.length) {
        this.storage.copyWithin(0, this.start, this.end);
      } else {
        const capacity = Math.max(
          MIN_BUFFER_CAPACITY,
          this.storage.length * 2,
          needed,
        );
        const grown = new Uint8Array(capacity);
        grown.set(this.buffered);
        this.storage = grown;
      }
      this.start = 0;
      this.end = live;
    }

    this.storage.set(data, this.end);
    this.end += data.length;
  }

  private consume(length: number): void {
    this.start += length;
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
  }

  /**
   * Next head line without its terminator. At end of stream the
   * unterminated remainder is returned as a last line; after that, `null`.
   * Fails once the head would exceed `maxHeaderSize` bytes.
   */
  private async readHeadLine(maxHeaderSize: number): Promise<string | null> {
    while (true) {
      const pending = this.buffered;
      const lf = pending.indexOf(LF);
      const lineBytes = lf === -1 ? pending.length : lf + 1;
      if (this.headBytes + lineBytes > maxHeaderSize) {
        throw new HttpRequestParseError(
          "HEADERS_TOO_LARGE",
          "Request headers too large",
        );
      }

      if (lf !== -1) {
        const line = decodeToString(pending.subarray(0, lf));
        this.consume(lineBytes);
        this.headBytes += lineBytes;
        return stripTrailingCr(line);
      }

      if (this.ended) {
        if (pending.length === 0) return null;
        const rest = decodeToString(pending);
        this.consume(lineBytes);
        this.headBytes += lineBytes;
        return stripTrailingCr(rest);
      }

      await this.waitForData();
    }
  }

  private async readExact(length: number): Promise<Uint8Array | null> {
    while (this.end - this.start < length) {
      if (this.ended) return null;
      await this.waitForData();
    }

    const chunk = this.storage.slice(this.start, this.start + length);
    this.consume(length);
    return chunk;
  }

  private async skip(length: number): Promise<void> {
    let remaining = length;
    while (true) {
      const available = Math.min(remaining, this.end - this.start);
      this.consume(available);
      remaining -= available;
      if (remaining === 0 || this.ended) return;
      await this.waitForData();
    }
  }

  private startDeadline(options?: ParseHttpRequestOptions): void {
    const timeoutMs = options?.timeoutMs ?? 0;
    this.deadline =
      timeoutMs > 0 ? Date.now() + timeoutMs : Number.POSITIVE_INFINITY;
  }

  private async waitForData(): Promise<void> {
    const hadActivity = await this.waitForActivity(this.deadline - Date.now());
    if (hadActivity) return;

    if (this.bytesReceived === 0) {
      throw new HttpRequestParseError(
        "IDLE_TIMEOUT",
        "Connection idle timed out",
      );
    }
    throw new HttpRequestParseError(
      "REQUEST_TIMEOUT",
      "Request timed out before completion",
    );
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      if (Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          if (settled) return;
          settled = true;
          this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
          resolve(false);
        }, timeoutMs);
      }

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

function stripTrailingCr(line: string): string {
  return line.endsWith(CR) ? line.slice(0, -1) : line;
}

export function createHttpRequestParser(
  socket: ITcpSocket,
): HttpRequestStreamParser {
  return new HttpRequestStreamParser(socket);
}

/**
 * Parse a single request from a TCP socket stream.
 * Returns a promise that resolves with the parsed request.
 */
export function parseHttpRequest(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): Promise<HttpRequest> {
  return createHttpRequestParser(socket).readRequest(options);
}
