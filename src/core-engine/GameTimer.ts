/**
 * Elapsed-time tracking with pause/resume.
 *
 * Accumulates play time across pause/resume and save/restore
 * cycles. The clock is injectable for tests.
 */

/** Returns the current time in milliseconds. */
export type Clock = () => number;

export type TimerState = 'stopped' | 'running' | 'paused';

export class GameTimer {
  private startedAt = 0;
  private accumulatedMs = 0;
  private timerState: TimerState = 'stopped';

  constructor(private readonly clock: Clock = Date.now) {}

  get state(): TimerState {
    return this.timerState;
  }

  /** Start the timer. No-op unless stopped. */
  start(): void {
    if (this.timerState !== 'stopped') return;
    this.startedAt = this.clock();
    this.timerState = 'running';
  }

  /** Pause the timer. No-op unless running. */
  pause(): void {
    if (this.timerState !== 'running') return;
    this.accumulatedMs += this.clock() - this.startedAt;
    this.timerState = 'paused';
  }

  /** Resume the timer. No-op unless paused. */
  resume(): void {
    if (this.timerState !== 'paused') return;
    this.startedAt = this.clock();
    this.timerState = 'running';
  }

  /** Reset to zero and stop. */
  reset(): void {
    this.startedAt = 0;
    this.accumulatedMs = 0;
    this.timerState = 'stopped';
  }

  /** Total elapsed play time in seconds. */
  getElapsedSeconds(): number {
    const running =
      this.timerState === 'running' ? this.clock() - this.startedAt : 0;
    return (this.accumulatedMs + running) / 1000;
  }

  /**
   * Overwrite the elapsed time (used when resuming a saved game).
   * Negative values are treated as zero.
   */
  setElapsedSeconds(seconds: number): void {
    this.accumulatedMs = Math.max(0, seconds) * 1000;
    if (this.timerState === 'running') {
      this.startedAt = this.clock();
    }
  }
}
