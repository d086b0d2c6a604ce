import { Clock, Sleep } from '../../domain/interfaces/services.interface';

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Single shared clock enforcing a minimum spacing between outbound calls, across
 * every symbol and provider that goes through it. Not safe for concurrent callers.
 */
export class CallThrottle {
  private lastCallAt = 0;

  constructor(
    private readonly enabled: boolean,
    private readonly minIntervalMs: number,
    private readonly clock: Clock = Date.now,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  async acquire(): Promise<void> {
    if (!this.enabled) return;

    const elapsed = this.clock() - this.lastCallAt;
    if (elapsed < this.minIntervalMs) {
      await this.sleep(this.minIntervalMs - elapsed);
    }

    this.lastCallAt = this.clock();
  }
}
