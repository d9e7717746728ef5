import { decideWake, type WakeDecisionInput } from './wake-decision-policy';

describe('decideWake', () => {
  const base: WakeDecisionInput = {
    stage: 'unknown',
    now: 0,
    windowStart: 100_000,
    deadline: 2_000_000,
    lastChanceMs: 60_000
  };

  it('never triggers before the window opens', () => {
    expect(decideWake({ ...base, stage: 'light', now: 50_000 })).toEqual({ trigger: false, reason: 'before-window' });
  });

  it('triggers on light sleep inside the window', () => {
    expect(decideWake({ ...base, stage: 'light', now: 500_000 })).toEqual({ trigger: true, reason: 'optimal' });
  });

  it('takes the last chance outside deep sleep', () => {
    expect(decideWake({ ...base, stage: 'core', now: 1_950_000 })).toEqual({ trigger: true, reason: 'last-chance' });
    expect(decideWake({ ...base, stage: 'unknown', now: 1_950_000 })).toEqual({ trigger: true, reason: 'last-chance' });
    expect(decideWake({ ...base, stage: 'awakeOrREM', now: 1_940_000 })).toEqual({
      trigger: true,
      reason: 'last-chance'
    });
  });

  it('never takes the last chance from deep sleep', () => {
    expect(decideWake({ ...base, stage: 'deep', now: 1_990_000 })).toEqual({ trigger: false, reason: 'continue' });
  });

  it('keeps sampling while more than the last-chance margin remains', () => {
    expect(decideWake({ ...base, stage: 'core', now: 1_939_999 })).toEqual({ trigger: false, reason: 'continue' });
  });

  it('leaves the deadline itself to the failsafe timers', () => {
    expect(decideWake({ ...base, stage: 'light', now: 2_000_000 })).toEqual({ trigger: false, reason: 'past-deadline' });
  });
});
