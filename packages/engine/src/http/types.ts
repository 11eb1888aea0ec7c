export interface HttpRequest {
  method: string;
  /** Request target exactly as sent, query string included. */
  url: string;
  path: string;
  /** Raw query string without the leading `?`; empty when absent. */
  query: string;
  /** Third request-line token, e.g. `HTTP/1.1`; empty when omitted. */
  httpVersion: string;
  headers: Map<string, string>;
  body: Uint8Array;
}

export interface HttpResponseOptions {
  status: number;
  statusText?: string;
  contentType: string;
  body?: Uint8Array;
}

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  404: "Not Found",
};

export const FALLBACK_STATUS_TEXT = "Error";

export function statusTextFor(status: number): string {
  return STATUS_TEXT[status] ?? FALLBACK_STATUS_TEXT;
}
