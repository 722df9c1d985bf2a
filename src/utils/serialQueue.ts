/**
 * Runs tasks one at a time in submission order. A task that rejects does not
 * stall the queue; its error is delivered through the promise `run` returns.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(() => task()).finally(() => {
      this.pending -= 1;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/**
 * Serializes tasks per key. `run` claims every listed key at once and holds
 * them for the whole task, so tasks that share a key run in submission order
 * and no task ever waits while holding only part of its keys.
 */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  get activeKeys(): number {
    return this.tails.size;
  }

  run<T>(keys: readonly string[], task: () => Promise<T> | T): Promise<T> {
    const ordered = [...new Set(keys)];
    const previous = ordered.map((key) => this.tails.get(key));

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    for (const key of ordered) {
      this.tails.set(key, done);
    }

    return Promise.all(previous)
      .then(() => task())
      .finally(() => {
        for (const key of ordered) {
          if (this.tails.get(key) === done) {
            this.tails.delete(key);
          }
        }
        release();
      });
  }
}
