import type { TimeSourceService } from '../services/time-source.service';

// setTimeout overflows past 2^31 - 1 ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * One-shot timer aimed at an absolute instant. When the underlying timeout
 * fires before the time source reaches the target (clock offset changes,
 * oversized delays) it re-arms for the remainder instead of firing early.
 */
export class DeadlineTimer {
  private handle: ReturnType<typeof globalThis.setTimeout> | null = null;
  private target: number | null = null;
  private callback: (() => void) | null = null;

  constructor(private readonly timeSource: TimeSourceService) {}

  get armed(): boolean {
    return this.handle !== null;
  }

  get targetAt(): number | null {
    return this.target;
  }

  arm(at: number, callback: () => void): void {
    this.disarm();
    this.target = at;
    this.callback = callback;
    this.schedule();
  }

  disarm(): void {
    if (this.handle !== null) {
      clearTimeout(this.handle);
    }
    this.handle = null;
    this.target = null;
    this.callback = null;
  }

  private schedule(): void {
    if (this.target === null) {
      return;
    }
    const remaining = Math.max(0, this.target - this.timeSource.now());
    this.handle = setTimeout(() => this.handleFire(), Math.min(remaining, MAX_TIMER_DELAY_MS));
  }

  private handleFire(): void {
    this.handle = null;
    if (this.target === null) {
      return;
    }
    if (this.timeSource.now() < this.target) {
      this.schedule();
      return;
    }
    const callback = this.callback;
    this.target = null;
    this.callback = null;
    callback?.();
  }
}
