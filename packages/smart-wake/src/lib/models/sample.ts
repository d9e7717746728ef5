export type MotionLevel = 'still' | 'light' | 'significant';

export const MOTION_LEVELS = ['still', 'light', 'significant'] as const satisfies readonly MotionLevel[];

export interface Sample {
  timestamp: number;
  heartRate: number | null;
  motion: MotionLevel;
}

export interface HeartRateSample {
  timestamp: number;
  bpm: number;
}
