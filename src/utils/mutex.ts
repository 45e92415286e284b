// Promise-chain mutex: tasks run one at a time in call order.
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private locked = false;

  isLocked(): boolean {
    return this.locked;
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      this.locked = true;
      try {
        return await task();
      } finally {
        this.locked = false;
      }
    });
    // The next task waits for this one whether it resolved or rejected.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
