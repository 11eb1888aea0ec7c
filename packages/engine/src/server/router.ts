/**
 * Fixed route table. Dispatch is a pure function of the request; nothing
 * here touches a socket.
 */

import { parseQueryString } from "../http/query.js";
import type { HttpRequest } from "../http/types.js";
import { decodeToString, fromString } from "../utils/buffer.js";

export const GREETING = "Hello from TypeScript!";
export const NOT_FOUND_BODY = "Not Found";

const TEXT_PLAIN = "text/plain";
const APPLICATION_JSON = "application/json";

export interface RouteResponse {
  status: number;
  contentType: string;
  body: Uint8Array;
}

export type RoutableRequest = Pick<
  HttpRequest,
  "method" | "path" | "query" | "body"
>;

type RouteHandler = (request: RoutableRequest) => RouteResponse;

function text(status: number, body: string): RouteResponse {
  return { status, contentType: TEXT_PLAIN, body: fromString(body) };
}

function json(status: number, body: string): RouteResponse {
  return { status, contentType: APPLICATION_JSON, body: fromString(body) };
}

function handleRoot(): RouteResponse {
  return text(200, GREETING);
}

function handleSomethingQuery(request: RoutableRequest): RouteResponse {
  const params = parseQueryString(request.query);

  if (params.get("json") === "true") {
    return json(
      200,
      JSON.stringify({
        route: request.path,
        query: Object.fromEntries(params),
      }),
    );
  }

  return text(200, `Route: ${request.path}, Query: ${formatParams(params)}`);
}

function handleSomethingBody(request: RoutableRequest): RouteResponse {
  const route = JSON.stringify(request.path);
  if (request.body.length === 0) {
    return json(200, `{"route":${route},"body":{}}`);
  }

  return json(
    200,
    `{"route":${route},"body":${embedBody(decodeToString(request.body))}}`,
  );
}

/**
 * A body that is already JSON goes in verbatim; anything else is encoded
 * as a JSON string so the response stays parseable.
 */
export function embedBody(raw: string): string {
  const trimmed = raw.trim();
  return isJson(trimmed) ? trimmed : JSON.stringify(raw);
}

function isJson(candidate: string): boolean {
  if (candidate === "") return false;
  try {
    JSON.parse(candidate);
    return true;
  } catch {
    return false;
  }
}

function formatParams(params: Map<string, string>): string {
  const pairs = [...params].map(
    ([key, value]) => `${JSON.stringify(key)}: ${JSON.stringify(value)}`,
  );
  return `{${pairs.join(", ")}}`;
}

const ROUTES = new Map<string, RouteHandler>([
  ["GET /", handleRoot],
  ["GET /something", handleSomethingQuery],
  ["POST /something", handleSomethingBody],
]);

export function routeRequest(request: RoutableRequest): RouteResponse {
  const handler = ROUTES.get(`${request.method} ${request.path}`);
  if (!handler) {
    return text(404, NOT_FOUND_BODY);
  }
  return handler(request);
}
