/**
 * Per-key serial task queue.
 *
 * Tasks posted under the same key run one at a time in posting order, each
 * starting only after the previous one (sync or async) has settled. Tasks
 * under different keys do not wait on each other.
 */
export class KeyedMailbox {
  private readonly tails = new Map<string, Promise<unknown>>();

  constructor(private readonly onError: (key: string, err: unknown) => void) {}

  /** Queue a task and return its result. Rejections reach the caller only. */
  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    // a failed predecessor must not stop the chain
    const next = prev.then(task, task);
    this.tails.set(key, next);
    const cleanup = () => {
      if (this.tails.get(key) === next) this.tails.delete(key);
    };
    next.then(cleanup, cleanup);
    return next;
  }

  /** Queue a task nobody awaits; a rejection goes to the error callback. */
  post(key: string, task: () => void | Promise<void>): void {
    this.run(key, task).catch((err: unknown) => this.onError(key, err));
  }

  /** Resolve once every task queued so far (under any key) has settled. */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.allSettled([...this.tails.values()]);
    }
  }

  get pending(): number {
    return this.tails.size;
  }
}
