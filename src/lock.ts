import { LedgerError } from "./errors";

export type Release = () => void;

/**
 * Account rows are always locked in ascending account-number order so two
 * units of work touching the same pair cannot wait on each other.
 */
export function lockOrder(keys: readonly string[]): string[] {
  return [...new Set(keys)].sort();
}

/**
 * In-process exclusive locks keyed by string. Waiters are served in arrival
 * order; a waiter that is not granted the lock within `timeoutMs` is rejected
 * with a retryable CONFLICT.
 */
export class KeyedLock {
  private held: Set<string> = new Set();
  private waiters: Map<string, Array<() => void>> = new Map();

  acquire(key: string, timeoutMs: number): Promise<Release> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve(this.releaser(key));
    }

    return new Promise<Release>((resolve, reject) => {
      const queue = this.waiters.get(key) ?? [];

      const grant = () => {
        clearTimeout(timer);
        resolve(this.releaser(key));
      };

      const timer = setTimeout(() => {
        this.removeWaiter(key, grant);
        reject(
          new LedgerError(
            `Timed out after ${timeoutMs}ms waiting for lock on ${key}`,
            "CONFLICT",
            { key, timeoutMs }
          )
        );
      }, timeoutMs);

      queue.push(grant);
      this.waiters.set(key, queue);
    });
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  private releaser(key: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff(key);
    };
  }

  private handOff(key: string): void {
    const queue = this.waiters.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) {
      this.waiters.delete(key);
    }
    if (next) {
      // ownership passes straight to the next waiter
      next();
    } else {
      this.held.delete(key);
    }
  }

  private removeWaiter(key: string, waiter: () => void): void {
    const queue = this.waiters.get(key);
    if (!queue) return;
    const index = queue.indexOf(waiter);
    if (index >= 0) queue.splice(index, 1);
    if (queue.length === 0) this.waiters.delete(key);
  }
}
