import type { Logger } from '../logger.js';

/**
 * Fixed-rate timer: one tick right away, then one every `intervalMs`.
 * `stop()` takes effect immediately; no tick runs after it returns.
 */
export class HeartbeatScheduler {
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly intervalMs: number,
    private readonly tick: () => void,
    private readonly logger: Logger
  ) {}

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): boolean {
    if (this.timer) return false;
    this.timer = setInterval(() => this.runTick(), this.intervalMs);
    this.timer.unref();
    this.logger.info('heartbeat', `enabled, every ${this.intervalMs}ms`);
    this.runTick();
    return true;
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  private runTick(): void {
    try {
      this.tick();
    } catch (error) {
      this.logger.error('heartbeat', 'tick failed', error);
    }
  }
}
