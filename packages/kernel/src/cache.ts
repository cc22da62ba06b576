import type { Scheduler, Task } from "./scheduler.js";
import { Logger } from "./logger.js";

const log = Logger.for("AsyncCache");

export interface AsyncCacheOptions<K, V, I> {
  /** Label used for task names and log records. */
  name: string;
  /**
   * Build the value for `key`. `info` is the key's entry from a batch
   * fetch when the key was prefetched, `undefined` otherwise.
   */
  create: (key: K, info: I | undefined) => Promise<V>;
  /** Fetch info for many keys in one request. Required for `prefetch`. */
  fetchMany?: (keys: K[]) => Promise<Map<K, I>>;
}

/**
 * Per-key cache of in-flight or completed initializations.
 *
 * Concurrent `get` calls for the same key share one task. Failed tasks are
 * evicted, so the next `get` starts over.
 */
export class AsyncCache<K, V, I = never> {
  private readonly entries = new Map<K, Task<V>>();
  private readonly scheduler: Scheduler;
  private readonly options: AsyncCacheOptions<K, V, I>;

  constructor(scheduler: Scheduler, options: AsyncCacheOptions<K, V, I>) {
    this.scheduler = scheduler;
    this.options = options;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  get(key: K): Task<V> {
    const existing = this.entries.get(key);
    if (existing) return existing;
    return this.start(key, () => this.options.create(key, undefined));
  }

  /**
   * Start initializing every key not yet cached, sharing a single
   * `fetchMany` call between them.
   */
  prefetch(keys: Iterable<K>): void {
    const fetchMany = this.options.fetchMany;
    if (!fetchMany) {
      throw new Error(`AsyncCache ${this.options.name}: prefetch requires fetchMany`);
    }

    const missing = [...new Set(keys)].filter((key) => !this.entries.has(key));
    if (missing.length === 0) return;

    const batch = this.scheduler.createTask(
      () => fetchMany(missing),
      `${this.options.name}:batch`,
    );
    for (const key of missing) {
      this.start(key, async () => {
        const infos = await batch;
        return this.options.create(key, infos.get(key));
      });
    }
  }

  private start(key: K, computation: () => Promise<V>): Task<V> {
    const task = this.scheduler.createTask(async () => {
      try {
        return await computation();
      } catch (error) {
        if (this.entries.get(key) === task) {
          this.entries.delete(key);
        }
        log.warn({ err: error, cache: this.options.name, key: String(key) }, "initialization failed");
        throw error;
      }
    }, `${this.options.name}:${String(key)}`);
    this.entries.set(key, task);
    return task;
  }
}
