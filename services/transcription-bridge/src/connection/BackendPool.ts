/**
 * Recognition Backend Pool
 * Bounds the number of concurrent recognizer streams across all sessions.
 * A session checks a backend out for the lifetime of one stream and returns
 * it when the stream closes; failed backends are removed.
 */

import { EventEmitter } from 'node:events';
import type { RecognitionBackend } from '../providers/RecognitionBackend';
import { componentLogger } from '../utils/logger';
import { sleep } from '../utils/retry';

export interface BackendPoolConfig {
  maxPoolSize?: number;
  minPoolSize?: number;
  acquireTimeout?: number;
  idleTimeout?: number; // 0 disables idle eviction
}

export interface BackendLease {
  id: string;
  backend: RecognitionBackend;
}

interface PooledBackend {
  id: string;
  backend: RecognitionBackend;
  inUse: boolean;
  createdAt: number;
  lastUsed: number;
  usageCount: number;
  acquiredAt?: number;
}

export type BackendFactory = () => RecognitionBackend;

/** Backends with an underlying channel to release when evicted. */
interface Closable {
  close(): void;
}

function isClosable(value: object): value is Closable {
  return 'close' in value && typeof value.close === 'function';
}

export class BackendPool extends EventEmitter {
  private pool: PooledBackend[] = [];
  private config: Required<BackendPoolConfig>;
  private factory: BackendFactory;
  private idleCheckInterval?: NodeJS.Timeout;
  private nextId: number = 1;
  private log = componentLogger('backend-pool');

  constructor(factory: BackendFactory, config: BackendPoolConfig = {}) {
    super();

    this.factory = factory;
    this.config = {
      maxPoolSize: config.maxPoolSize ?? 100,
      minPoolSize: config.minPoolSize ?? 0,
      acquireTimeout: config.acquireTimeout ?? 5000,
      idleTimeout: config.idleTimeout ?? 60000,
    };

    this.ensureMinPoolSize();

    if (this.config.idleTimeout > 0) {
      this.startIdleCheck();
    }
  }

  /**
   * Check a backend out of the pool
   */
  async acquire(): Promise<BackendLease> {
    const startTime = Date.now();

    do {
      const available = this.pool.find((p) => !p.inUse);

      if (available) {
        return this.checkout(available);
      }

      // If pool is not at max size, create a new backend
      if (this.pool.length < this.config.maxPoolSize) {
        const pooled = this.createPooledBackend();
        this.pool.push(pooled);
        this.emit('backend:created', { id: pooled.id, name: pooled.backend.getName() });
        return this.checkout(pooled);
      }

      await sleep(Math.min(100, this.config.acquireTimeout));
    } while (Date.now() - startTime < this.config.acquireTimeout);

    throw new Error(`Failed to acquire recognizer stream within timeout (${this.config.acquireTimeout}ms)`);
  }

  /**
   * Return a backend to the pool
   */
  release(id: string): void {
    const pooled = this.pool.find((p) => p.id === id);

    if (!pooled) {
      this.log.warn({ id }, 'Released backend not found in pool');
      return;
    }

    const now = Date.now();
    const heldMs = pooled.acquiredAt ? now - pooled.acquiredAt : undefined;
    pooled.inUse = false;
    pooled.lastUsed = now;
    pooled.acquiredAt = undefined;

    this.emit('backend:released', { id, heldMs });
  }

  /**
   * Drop a backend from the pool (e.g. after its stream failed)
   */
  remove(id: string, error?: Error): void {
    const index = this.pool.findIndex((p) => p.id === id);

    if (index === -1) {
      return;
    }

    const [pooled] = this.pool.splice(index, 1);
    this.dispose(pooled);

    this.emit('backend:removed', { id, reason: error?.message });

    this.ensureMinPoolSize();
  }

  getStats() {
    const inUse = this.pool.filter((p) => p.inUse).length;

    return {
      poolSize: this.pool.length,
      inUse,
      available: this.pool.length - inUse,
      maxPoolSize: this.config.maxPoolSize,
      minPoolSize: this.config.minPoolSize,
    };
  }

  /**
   * Cleanup the pool and all backends
   */
  async cleanup(): Promise<void> {
    if (this.idleCheckInterval) {
      clearInterval(this.idleCheckInterval);
      this.idleCheckInterval = undefined;
    }

    for (const pooled of this.pool) {
      this.dispose(pooled);
    }
    this.pool = [];

    this.emit('pool:cleanup');
  }

  private checkout(pooled: PooledBackend): BackendLease {
    const now = Date.now();
    pooled.inUse = true;
    pooled.lastUsed = now;
    pooled.acquiredAt = now;
    pooled.usageCount++;

    this.emit('backend:acquired', { id: pooled.id });

    return { id: pooled.id, backend: pooled.backend };
  }

  private dispose(pooled: PooledBackend): void {
    pooled.backend.cancel();
    if (isClosable(pooled.backend)) {
      pooled.backend.close();
    }
  }

  private ensureMinPoolSize(): void {
    while (this.pool.length < this.config.minPoolSize) {
      this.pool.push(this.createPooledBackend());
    }
  }

  private createPooledBackend(): PooledBackend {
    const now = Date.now();
    return {
      id: `backend-${this.nextId++}`,
      backend: this.factory(),
      inUse: false,
      createdAt: now,
      lastUsed: now,
      usageCount: 0,
    };
  }

  /**
   * Private: evict idle backends above the minimum size
   */
  private startIdleCheck(): void {
    this.idleCheckInterval = setInterval(() => {
      const now = Date.now();
      const idle = this.pool.filter((p) => !p.inUse && now - p.lastUsed > this.config.idleTimeout);

      for (const pooled of idle) {
        if (this.pool.length > this.config.minPoolSize) {
          this.remove(pooled.id);
        }
      }
    }, this.config.idleTimeout / 2);

    this.idleCheckInterval.unref();
  }
}
