/**
 * Invocation Gate
 *
 * Bounds how many handler invocations run at once. With one slot (the
 * default) invocations run strictly one after another in arrival order,
 * which protects inference engines that are not safe for concurrent use.
 * Requests keep being accepted and decoded while they wait here.
 */

export class InvocationGate {
  private active = 0;
  private waiting: Array<() => void> = [];
  private slots: number;

  constructor(slots: number = 1) {
    if (!Number.isSafeInteger(slots) || slots < 1) {
      throw new RangeError(`Invocation slots must be a positive integer, got ${slots}`);
    }
    this.slots = slots;
  }

  /**
   * Run `task` once a slot is free. The slot is released when the task
   * settles, whether it resolved or threw.
   */
  async run<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Invocations currently holding a slot */
  get running(): number {
    return this.active;
  }

  /** Invocations queued for a slot */
  get queued(): number {
    return this.waiting.length;
  }

  get capacity(): number {
    return this.slots;
  }

  private acquire(): Promise<void> {
    if (this.active < this.slots) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Hand the slot straight to the next waiter
      next();
    } else {
      this.active--;
    }
  }
}
