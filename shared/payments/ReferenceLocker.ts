import { Mutex } from 'async-mutex';

type ReleaseFunc = () => void;

/**
 * One mutex per transaction reference, dropped once nobody holds or waits for
 * it. Serializes verifications within a process only.
 */
export class ReferenceLocker {
  private readonly locks = new Map<string, { count: number; mu: Mutex }>();

  async lock(reference: string): Promise<ReleaseFunc> {
    let entry = this.locks.get(reference);
    if (entry) {
      entry.count++;
    } else {
      entry = { count: 1, mu: new Mutex() };
      this.locks.set(reference, entry);
    }

    const held = entry;
    const release = await held.mu.acquire();
    return () => {
      held.count--;
      if (held.count === 0) {
        this.locks.delete(reference);
      }
      release();
    };
  }

  async run<T>(reference: string, operation: () => Promise<T>): Promise<T> {
    const release = await this.lock(reference);
    try {
      return await operation();
    } finally {
      release();
    }
  }
}
