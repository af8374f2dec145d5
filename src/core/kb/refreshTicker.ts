import { errorMessage } from './errors.js';

/**
 * Runs `tick` every `intervalMs`. A tick that comes due while the previous
 * one is still running is skipped rather than queued.
 */
export class RefreshTicker {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly tick: () => Promise<unknown>
  ) {}

  public start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.fire(), this.intervalMs);
    console.error(`URL refresh ticker started (every ${this.intervalMs}ms).`);
  }

  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.running;
  }

  public isRunning(): boolean {
    return this.timer !== null;
  }

  private fire(): void {
    if (this.running) {
      console.error('Previous URL refresh still running; skipping this tick.');
      return;
    }
    this.running = this.tick()
      .then(() => undefined)
      .catch((error: unknown) => {
        console.error(`URL refresh tick failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.running = null;
      });
  }
}
