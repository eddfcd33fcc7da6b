/**
 * Single-assignment cell
 *
 * Holds a value that is computed at most once. While the first computation
 * is in flight, every other caller awaits the same promise instead of
 * starting a second one. A failed computation leaves the cell empty so the
 * next caller starts over.
 */
export class SingleAssignmentCell<T> {
  private value: T | undefined;
  private pending: Promise<T> | undefined;

  constructor(initial?: T) {
    this.value = initial;
  }

  /**
   * Whether a value has been stored
   */
  get isSet(): boolean {
    return this.value !== undefined;
  }

  /**
   * Whether an initializer is currently running
   */
  get isPending(): boolean {
    return this.pending !== undefined;
  }

  /**
   * The stored value, if any
   */
  get(): T | undefined {
    return this.value;
  }

  /**
   * Return the stored value, or run `init` to produce it
   *
   * `init` runs at most once at a time; concurrent callers share its result.
   * `onAssigned` runs right after the value is stored. If it fails, the value
   * stays stored and the failure reaches every caller of this round.
   */
  getOrInit(init: () => Promise<T>, onAssigned?: (value: T) => void | Promise<void>): Promise<T> {
    if (this.value !== undefined) {
      return Promise.resolve(this.value);
    }

    if (this.pending === undefined) {
      const pending: Promise<T> = this.run(init, onAssigned).finally(() => {
        if (this.pending === pending) {
          this.pending = undefined;
        }
      });
      this.pending = pending;
    }

    return this.pending;
  }

  private async run(
    init: () => Promise<T>,
    onAssigned?: (value: T) => void | Promise<void>
  ): Promise<T> {
    const value = await init();
    this.value = value;
    if (onAssigned) {
      await onAssigned(value);
    }
    return value;
  }
}
