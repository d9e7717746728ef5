import type { MotionLevel, Sample } from './models/sample';
import type { StageEstimate } from './models/stage-estimate';

/**
 * Thresholds of the light/deep/awake heuristic. These values and the order in
 * which `estimateStage` checks them are fixed; later branches are wider.
 */
export const ESTIMATOR_THRESHOLDS = Object.freeze({
  minSamples: 3,
  lightMaxVariation: 5,
  deepMaxVariation: 3,
  awakeMinVariation: 7,
  awakeRiseBpm: 5
});

export interface StageEstimatorOptions {
  /** Lowest motion level that counts as movement. */
  motionFlagLevel?: Exclude<MotionLevel, 'still'>;
}

export interface StageFeatures {
  ratedSamples: number;
  variation: number;
  partialMovement: boolean;
  anyMovement: boolean;
  firstHeartRate: number | null;
  lastHeartRate: number | null;
}

const motionRank: Record<MotionLevel, number> = {
  still: 0,
  light: 1,
  significant: 2
};

export function sortSamples(samples: readonly Sample[]): Sample[] {
  return [...samples].sort((a, b) => a.timestamp - b.timestamp);
}

export function extractFeatures(samples: readonly Sample[], options?: StageEstimatorOptions): StageFeatures {
  const flagRank = motionRank[options?.motionFlagLevel ?? 'light'];
  const ordered = sortSamples(samples);
  const heartRates: number[] = [];
  let moving = 0;

  for (const sample of ordered) {
    if (sample.heartRate != null && Number.isFinite(sample.heartRate)) {
      heartRates.push(sample.heartRate);
    }
    if (motionRank[sample.motion] >= flagRank) {
      moving += 1;
    }
  }

  const variation = heartRates.length > 0 ? Math.max(...heartRates) - Math.min(...heartRates) : 0;

  return {
    ratedSamples: heartRates.length,
    variation,
    partialMovement: moving > 0 && moving < ordered.length,
    anyMovement: moving > 0,
    firstHeartRate: heartRates.length > 0 ? heartRates[0] : null,
    lastHeartRate: heartRates.length > 0 ? heartRates[heartRates.length - 1] : null
  };
}

export function estimateStage(samples: readonly Sample[], options?: StageEstimatorOptions): StageEstimate {
  const features = extractFeatures(samples, options);
  const t = ESTIMATOR_THRESHOLDS;

  if (features.ratedSamples < t.minSamples) {
    return 'unknown';
  }
  if (features.variation < t.lightMaxVariation && features.partialMovement) {
    return 'light';
  }
  if (features.variation < t.deepMaxVariation && !features.anyMovement) {
    return 'deep';
  }
  const risingWhileMoving =
    features.partialMovement &&
    features.firstHeartRate != null &&
    features.lastHeartRate != null &&
    features.lastHeartRate > features.firstHeartRate + t.awakeRiseBpm;
  if (features.variation > t.awakeMinVariation || risingWhileMoving) {
    return 'awakeOrREM';
  }
  return 'core';
}
