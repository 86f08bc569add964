export interface Drained {
  fetch: boolean;
  redraw: boolean;
}

/**
 * Wake-up point shared by the signal handlers, the scheduler and the worker.
 *
 * Everything here runs on the event loop, so each method body is already a
 * critical section; the parked resolver plays the role of a condition
 * variable. Wakes that arrive before the worker drains collapse into one.
 */
export class Trigger {
  private needsFetch = true;
  private needsRedraw = true;
  private pendingToggles = 0;
  private index = 0;
  private waiter: (() => void) | null = null;
  private closed = false;

  constructor(readonly targetCount: number) {
    if (!Number.isInteger(targetCount) || targetCount < 1) {
      throw new RangeError(`targetCount must be a positive integer, got ${targetCount}`);
    }
  }

  get formatIndex(): number {
    return this.index;
  }

  wake(fetch: boolean, redraw: boolean): void {
    this.needsFetch ||= fetch;
    // A fetch always ends in a redraw
    this.needsRedraw ||= redraw || fetch;
    this.release();
  }

  /**
   * Records a format toggle. The index moves when the worker drains.
   */
  requestToggle(): void {
    this.pendingToggles += 1;
    this.wake(false, true);
  }

  /**
   * Resolves once a fetch or redraw is pending, clearing both flags.
   * Resolves `undefined` after `close()`.
   */
  async waitAndDrain(): Promise<Drained | undefined> {
    while (!this.closed && !(this.needsFetch || this.needsRedraw)) {
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
    if (this.closed) return undefined;

    this.applyToggles();

    const drained = { fetch: this.needsFetch, redraw: this.needsRedraw };
    this.needsFetch = false;
    this.needsRedraw = false;
    return drained;
  }

  /**
   * Moves the index by the toggles received so far. The worker calls this
   * before rendering, so a toggle that lands mid-fetch is already visible.
   */
  applyToggles(): void {
    this.index = (this.index + this.pendingToggles) % this.targetCount;
    this.pendingToggles = 0;
  }

  close(): void {
    this.closed = true;
    this.release();
  }

  private release(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
