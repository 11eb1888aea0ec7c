import { NodeSocketFactory } from "../adapters/node/node-socket.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import { WebServer } from "../server/web-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): WebServer {
  return new WebServer({
    socketFactory: new NodeSocketFactory(),
    config: options.config,
    logger: options.logger,
  });
}
