// MultiError: ordered accumulator for independent validation failures.
//
// One instance per validation call. Not meant to be shared between callers.

export class MultiError extends Error {
  private readonly failures: Error[] = [];

  constructor() {
    super("");
    this.name = "MultiError";
  }

  /** Records `err`; null/undefined are ignored. */
  append(err: Error | null | undefined): void {
    if (!err) return;
    this.failures.push(err); // first detected, first reported
    this.message = this.failures.map((e) => e.message).join("; ");
  }

  /** Snapshot of the recorded failures in append order. */
  get errors(): readonly Error[] {
    return Object.freeze([...this.failures]); // copy; later appends do not show up in it
  }

  get size(): number {
    return this.failures.length;
  }

  /**
   * All recorded failures as one combined cause, or null when nothing was
   * recorded.
   */
  unwrap(): AggregateError | null {
    if (this.failures.length === 0) return null;
    return new AggregateError([...this.failures], this.message);
  }

  /** True when `target` (by identity) or a failure matching the predicate was recorded. */
  has(target: Error | ((err: Error) => boolean)): boolean {
    if (typeof target === "function") return this.failures.some(target);
    return this.failures.includes(target);
  }

  /**
   * The exit point for validators: null when clean, otherwise this instance.
   * Never hands out an aggregator wrapping zero failures.
   */
  nilOrError(): MultiError | null {
    return this.failures.length === 0 ? null : this;
  }
}
