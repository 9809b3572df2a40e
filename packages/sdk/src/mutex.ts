/**
 * @judgekit/sdk — Request serialization.
 *
 * The lock SerialJudgeClient holds around each request: one request in
 * flight, started in call order. A rejected request releases the lock
 * the same way a fulfilled one does.
 */
export class AsyncMutex {
  private tail: Promise<unknown> = Promise.resolve();
  private waiting = 0;

  /** Tasks holding or waiting for the lock. */
  get pending(): number {
    return this.waiting;
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.waiting++;
    const run = this.tail.then(() => task()).finally(() => {
      this.waiting--;
    });
    // The rejection reaches the caller through `run`; the chain only waits on it
    this.tail = run.catch(() => undefined);
    return run;
  }
}
