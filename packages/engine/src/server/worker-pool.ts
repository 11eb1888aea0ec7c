import type { Logger } from "../logging/logger.js";
import { basicLogger, prefixedLogger } from "../logging/logger.js";
import { WorkQueue } from "./work-queue.js";

export const DEFAULT_POOL_SIZE = 8;

export interface WorkerPoolOptions<T> {
  /** Number of long-lived workers. Default: 8 */
  size?: number;
  /** Runs one item to completion. Rejections are logged, never rethrown. */
  handler: (item: T) => Promise<void>;
  /** Called with items refused after shutdown, so the owner can release them. */
  onDropped?: (item: T) => void;
  logger?: Logger;
}

/**
 * Fixed set of workers draining a shared queue. Each worker handles one item
 * at a time, so at most `size` handlers are in flight however many items are
 * submitted.
 */
export class WorkerPool<T> {
  readonly size: number;
  private readonly queue = new WorkQueue<T>();
  private readonly handler: (item: T) => Promise<void>;
  private readonly onDropped?: (item: T) => void;
  private readonly logger: Logger;
  private readonly workers: Array<Promise<void>>;
  private activeCount = 0;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: WorkerPoolOptions<T>) {
    const size = options.size ?? DEFAULT_POOL_SIZE;
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(
        `Worker pool size must be a positive integer, got ${size}`,
      );
    }

    this.size = size;
    this.handler = options.handler;
    this.onDropped = options.onDropped;
    this.logger = prefixedLogger("pool", options.logger ?? basicLogger());
    this.workers = Array.from({ length: size }, (_, id) => this.runWorker(id));
  }

  /** Items waiting for a worker. */
  get pending(): number {
    return this.queue.length;
  }

  /** Items currently being handled. */
  get active(): number {
    return this.activeCount;
  }

  get isShutdown(): boolean {
    return this.queue.isClosed;
  }

  /**
   * Enqueue without waiting. After shutdown the item is dropped, reported
   * to the log and to `onDropped`, and false is returned.
   */
  submit(item: T): boolean {
    if (this.queue.push(item)) {
      return true;
    }

    this.logger.error("Failed to submit work: pool is shut down");
    try {
      this.onDropped?.(item);
    } catch (err) {
      this.logger.error("Failed to release dropped work:", err);
    }
    return false;
  }

  /**
   * Refuse new work, let the workers drain the queue, and resolve once every
   * worker has exited.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.queue.close();
      this.shutdownPromise = Promise.all(this.workers).then(() => undefined);
    }
    return this.shutdownPromise;
  }

  private async runWorker(id: number): Promise<void> {
    for await (const item of this.queue) {
      this.activeCount++;
      try {
        await this.handler(item);
      } catch (err) {
        this.logger.error(`Worker ${id} failed to handle work:`, err);
      } finally {
        this.activeCount--;
      }
    }
    this.logger.debug(`Worker ${id} exited`);
  }
}
