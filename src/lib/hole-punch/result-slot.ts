/**
 * Single-capacity result slot.
 *
 * The first offer is kept; every later offer is refused and the caller
 * keeps ownership of what it tried to deliver.
 */
export class ResultSlot<T> {
  private filled?: { value: T };
  private waiters: Array<(value: T) => void> = [];

  get isFilled(): boolean {
    return this.filled !== undefined;
  }

  /**
   * @returns true if the value now occupies the slot
   */
  offer(value: T): boolean {
    if (this.filled) {
      return false;
    }
    this.filled = { value };
    for (const waiter of this.waiters.splice(0)) {
      waiter(value);
    }
    return true;
  }

  /**
   * Resolves with the accepted value once there is one
   */
  take(): Promise<T> {
    if (this.filled) {
      return Promise.resolve(this.filled.value);
    }
    return new Promise<T>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
