export type StageEstimate = 'unknown' | 'deep' | 'light' | 'core' | 'awakeOrREM';

export const STAGE_ESTIMATES = [
  'unknown',
  'deep',
  'light',
  'core',
  'awakeOrREM'
] as const satisfies readonly StageEstimate[];

export const STAGE_LABELS: Readonly<Record<StageEstimate, string>> = Object.freeze({
  unknown: 'unknown',
  deep: 'deep sleep',
  light: 'light sleep',
  core: 'core sleep',
  awakeOrREM: 'REM/awake'
});
