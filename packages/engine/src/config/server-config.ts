export const DEFAULT_PORT = 3003;
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_WORKERS = 8;

export interface ServerConfig {
  /** Port to listen on. Default: 3003 */
  port: number;
  /** Host/IP to bind. Default: '0.0.0.0' (all interfaces) */
  host: string;
  /** Number of pooled connection workers. Default: 8 */
  workers: number;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Max time allowed for receiving a full request. 0 disables. Default: 0 */
  requestTimeoutMs: number;
  /** Request line plus headers beyond this drop the connection. Default: 8KB */
  maxHeaderSize: number;
  /** Larger declared request bodies are ignored. Default: 10MB */
  maxRequestBodySize: number;
}

export function defaultConfig(): ServerConfig {
  return {
    port: DEFAULT_PORT,
    host: DEFAULT_HOST,
    workers: DEFAULT_WORKERS,
    quiet: false,
    requestTimeoutMs: 0,
    maxHeaderSize: 8 * 1024,
    maxRequestBodySize: 10 * 1024 * 1024,
  };
}
