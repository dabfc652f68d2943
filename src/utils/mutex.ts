/**
 * Promise-chain mutex: tasks passed to `runExclusive` run one at a time in
 * submission order. A rejected task does not block the ones behind it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
