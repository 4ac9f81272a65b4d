import type { DurableQueue } from '../src/application/ports.js';

interface Waiter {
  resolve: (item: string | null) => void;
  timer: NodeJS.Timeout;
}

interface StoredKey {
  value: string;
  expiresAt: number;
}

/**
 * In-process stand-in for the Redis-backed queue.
 *
 * Lists push at the head and pop from the tail. Blocking pops park a
 * waiter that the next push on the same list hands its item to.
 * Setting `down` makes every call reject like a lost connection.
 */
export class InMemoryDurableQueue implements DurableQueue {
  readonly lists = new Map<string, string[]>();
  readonly keys = new Map<string, StoredKey>();
  readonly ttls = new Map<string, number>();
  readonly published: Array<{ channel: string; message: string }> = [];
  down = false;

  private readonly waiters = new Map<string, Waiter[]>();

  async push(list: string, item: string): Promise<void> {
    this.check();
    const waiting = this.waiters.get(list)?.shift();
    if (waiting !== undefined) {
      clearTimeout(waiting.timer);
      waiting.resolve(item);
      return;
    }
    this.list(list).unshift(item);
  }

  async popBlocking(list: string, timeoutSeconds: number): Promise<string | null> {
    this.check();
    const item = this.list(list).pop();
    if (item !== undefined) return item;

    return new Promise((resolve) => {
      const waiters = this.waiters.get(list) ?? [];
      this.waiters.set(list, waiters);

      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          const index = waiters.indexOf(waiter);
          if (index >= 0) waiters.splice(index, 1);
          resolve(null);
        }, timeoutSeconds * 1000),
      };
      waiters.push(waiter);
    });
  }

  async pop(list: string): Promise<string | null> {
    this.check();
    return this.list(list).pop() ?? null;
  }

  async length(list: string): Promise<number> {
    this.check();
    return this.list(list).length;
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    this.check();
    this.ttls.set(key, ttlSeconds);
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    this.check();
    if (this.read(key) !== null) return false;
    this.keys.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
    this.ttls.set(key, ttlSeconds);
    return true;
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.check();
    this.keys.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
    this.ttls.set(key, ttlSeconds);
  }

  async remove(key: string): Promise<void> {
    this.check();
    this.keys.delete(key);
  }

  async get(key: string): Promise<string | null> {
    this.check();
    return this.read(key);
  }

  async publish(channel: string, message: string): Promise<void> {
    this.check();
    this.published.push({ channel, message });
  }

  async ping(): Promise<void> {
    this.check();
  }

  /** Releases parked blocking pops with null. */
  close(): void {
    for (const waiters of this.waiters.values()) {
      for (const waiter of waiters.splice(0)) {
        clearTimeout(waiter.timer);
        waiter.resolve(null);
      }
    }
  }

  items(list: string): string[] {
    return [...this.list(list)];
  }

  private list(name: string): string[] {
    let list = this.lists.get(name);
    if (list === undefined) {
      list = [];
      this.lists.set(name, list);
    }
    return list;
  }

  private read(key: string): string | null {
    const stored = this.keys.get(key);
    if (stored === undefined) return null;
    if (stored.expiresAt <= Date.now()) {
      this.keys.delete(key);
      return null;
    }
    return stored.value;
  }

  private check(): void {
    if (this.down) throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
  }
}
