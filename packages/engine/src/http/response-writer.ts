import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { type HttpResponseOptions, statusTextFor } from "./types.js";

/**
 * Serialize a response: status line, Content-Type, Content-Length,
 * Connection: close, blank line, body.
 */
export function formatResponse(response: HttpResponseOptions): Uint8Array {
  const body = response.body ?? new Uint8Array(0);
  const statusText = response.statusText ?? statusTextFor(response.status);

  const lines = [
    `HTTP/1.1 ${response.status} ${statusText}`,
    `Content-Type: ${response.contentType}`,
    `Content-Length: ${body.length}`,
    "Connection: close",
    "",
    "",
  ];
  return concat([fromString(lines.join("\r\n")), body]);
}

/**
 * Send a complete response over a socket, waiting for the write to be
 * accepted when the socket supports it.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponseOptions,
): Promise<void> {
  const data = formatResponse(response);
  if (socket.sendAndWait) {
    await socket.sendAndWait(data);
    return;
  }
  socket.send(data);
}
