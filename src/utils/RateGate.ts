import { sleep, type SleepFn } from './sleep';

/**
 * Shared gate that spaces out outgoing requests across all workers
 */
export interface IRateGate {
  /**
   * Wait for the gate, hold it for the configured delay, then release it
   */
  pass(): Promise<void>;
}

/**
 * Mutual-exclusion gate: one holder at a time, each holding it for `delayMs`.
 * With N queued tasks the last one is released after N * delayMs.
 */
export class RateGate implements IRateGate {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly delayMs: number,
    private readonly sleepFn: SleepFn = sleep
  ) {}

  pass(): Promise<void> {
    const turn = this.tail.then(() => this.sleepFn(this.delayMs));
    this.tail = turn;
    return turn;
  }

  getDelay(): number {
    return this.delayMs;
  }
}
