import { delay } from "../utils/delay.js";

/**
 * Spaces out calls to a shared provider. Each `wait()` reserves the next free slot,
 * so concurrent workers are bounded by the aggregate rate, not per worker.
 */
export class Pacer {
  private nextSlotAt = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now
  ) {}

  async wait(signal?: AbortSignal): Promise<void> {
    const current = this.now();
    const slotStart = Math.max(current, this.nextSlotAt);
    this.nextSlotAt = slotStart + this.intervalMs;
    await delay(this.nextSlotAt - current, signal);
  }
}
