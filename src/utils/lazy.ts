/**
 * Compute-once slot for an async value. Concurrent first callers share the
 * in-flight promise; a rejected computation leaves the slot unset so a later
 * call starts over.
 */
export class Lazy<T> {
  private pending: Promise<T> | undefined;
  private settled = false;

  constructor(private readonly compute: () => Promise<T>) {}

  get isSet(): boolean {
    return this.settled;
  }

  get(): Promise<T> {
    if (this.pending) return this.pending;
    const pending: Promise<T> = this.compute().then(
      (value) => {
        this.settled = true;
        return value;
      },
      (err: unknown) => {
        if (this.pending === pending) this.pending = undefined;
        throw err;
      }
    );
    this.pending = pending;
    return pending;
  }
}
