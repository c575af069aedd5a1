/**
 * Memoized async value.
 *
 * The factory runs on first get(). Concurrent callers share the pending
 * promise. A rejected attempt is forgotten so the next get() tries again;
 * a resolved value is kept for the lifetime of the instance.
 */
export class Lazy<T> {
  private pending: Promise<T> | undefined;

  constructor(private readonly factory: () => Promise<T>) {}

  get(): Promise<T> {
    if (!this.pending) {
      this.pending = this.factory().catch((error: unknown) => {
        this.pending = undefined;
        throw error;
      });
    }
    return this.pending;
  }

  /** True once a value or a pending attempt exists */
  isStarted(): boolean {
    return this.pending !== undefined;
  }
}
