import type { Sample } from '../models/sample';

export interface SampleWindowOptions {
  lookBackMs: number;
  maxSamples: number;
}

/**
 * Time-ordered samples for one session, bounded by look-back and count.
 */
export class SampleWindow {
  private samples: Sample[] = [];

  constructor(
    readonly sessionId: string,
    private readonly options: SampleWindowOptions
  ) {}

  get size(): number {
    return this.samples.length;
  }

  append(incoming: readonly Sample[], now: number): void {
    if (incoming.length === 0) {
      this.evict(now);
      return;
    }
    const merged = [...this.samples];
    for (const sample of incoming) {
      const index = merged.findIndex(existing => existing.timestamp === sample.timestamp);
      if (index >= 0) {
        merged[index] = sample;
      } else {
        merged.push(sample);
      }
    }
    merged.sort((a, b) => a.timestamp - b.timestamp);
    this.samples = merged;
    this.evict(now);
  }

  evict(now: number): void {
    const cutoff = now - this.options.lookBackMs;
    let kept = this.samples.filter(sample => sample.timestamp > cutoff);
    if (kept.length > this.options.maxSamples) {
      kept = kept.slice(kept.length - this.options.maxSamples);
    }
    this.samples = kept;
  }

  snapshot(): readonly Sample[] {
    return [...this.samples];
  }

  latestHeartRate(): number | null {
    for (let index = this.samples.length - 1; index >= 0; index -= 1) {
      const rate = this.samples[index].heartRate;
      if (rate != null) {
        return rate;
      }
    }
    return null;
  }

  clear(): void {
    this.samples = [];
  }
}
