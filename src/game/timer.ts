type Handle = ReturnType<typeof setInterval>;

/**
 * Recurring tick owned by a single round. `start` replaces any running
 * interval, so there is never more than one.
 */
export class Countdown {
  private handle: Handle | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly onTick: () => void,
  ) {}

  get running(): boolean {
    return this.handle !== null;
  }

  start(): void {
    this.stop();
    this.handle = setInterval(() => this.onTick(), this.intervalMs);
    // Never keep the process alive on our account.
    this.handle.unref?.();
  }

  stop(): void {
    if (this.handle === null) return;
    clearInterval(this.handle);
    this.handle = null;
  }
}
