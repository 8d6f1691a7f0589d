/** Default cap on concurrent bulk writes. */
export const DEFAULT_MAX_INFLIGHT_WRITES = 4;

export type WriteTask = () => Promise<void>;

/**
 * Runs write tasks with at most `maxInFlight` of them in progress.
 * `submit` resolves once the task has started, so a caller looping over a
 * feed waits whenever the pool is saturated.
 */
export class WritePool {
  private inFlight = 0;
  private peakInFlight = 0;
  private slotWaiters: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly maxInFlight: number,
    private readonly onError: (err: unknown) => void,
  ) {
    if (!Number.isInteger(maxInFlight) || maxInFlight < 1) {
      throw new RangeError("maxInFlight must be a positive integer");
    }
  }

  async submit(task: WriteTask): Promise<void> {
    while (this.inFlight >= this.maxInFlight) {
      await new Promise<void>((resolve) => this.slotWaiters.push(resolve));
    }
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    void this.execute(task);
  }

  /**
   * Resolves when no task is running.
   */
  async drain(): Promise<void> {
    if (this.inFlight === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  get active(): number {
    return this.inFlight;
  }

  /** Highest number of tasks seen running at once. */
  get peak(): number {
    return this.peakInFlight;
  }

  private async execute(task: WriteTask): Promise<void> {
    try {
      await task();
    } catch (err) {
      this.onError(err);
    } finally {
      this.inFlight--;
      this.slotWaiters.shift()?.();
      if (this.inFlight === 0) {
        for (const resolve of this.idleWaiters.splice(0)) resolve();
      }
    }
  }
}
