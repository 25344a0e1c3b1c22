import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../../src/core/errors.js';
import { assertModeCoherence, createModeState } from '../../src/core/mode.js';
import {
  assertAboveSafetyFloor,
  PRODUCTION_THRESHOLDS,
  resolveThresholds,
  type ThresholdProfile,
} from '../../src/core/threshold_policy.js';

function profiles(...entries: ThresholdProfile[]): ReadonlyMap<string, ThresholdProfile> {
  return new Map(entries.map((entry) => [entry.name, entry]));
}

const learningProfile: ThresholdProfile = {
  name: 'paper_learning',
  policy: 'learning',
  minTrustScore: 30,
  minConfidenceScore: 40,
  minSignalScore: 30,
};

const zeroProfile: ThresholdProfile = {
  name: 'wide_open',
  policy: 'learning',
  minTrustScore: 0,
  minConfidenceScore: 0,
  minSignalScore: 0,
};

describe('mode coherence', () => {
  it('rejects a production portfolio under a learning operating mode', () => {
    expect(() =>
      createModeState({ operatingMode: 'LEARNING', portfolioMode: 'PRODUCTION', activeProfile: 'paper_learning' })
    ).toThrow(ConfigurationError);
  });

  it('rejects a learning portfolio under a production operating mode', () => {
    expect(() =>
      createModeState({ operatingMode: 'PRODUCTION', portfolioMode: 'LEARNING', activeProfile: 'strict' })
    ).toThrow(/does not match/);
  });

  it('rejects unknown mode values and empty profile names', () => {
    expect(() =>
      assertModeCoherence({ operatingMode: 'PAPER', portfolioMode: 'PAPER', activeProfile: 'strict' })
    ).toThrow(/Unknown operating mode "PAPER"/);
    expect(() =>
      assertModeCoherence({ operatingMode: 'LEARNING', portfolioMode: 'LEARNING', activeProfile: ' ' })
    ).toThrow(/Active profile name is required/);
  });

  it('returns a frozen state when the modes agree', () => {
    const state = createModeState({ operatingMode: 'LEARNING', portfolioMode: 'LEARNING', activeProfile: 'p' });
    expect(Object.isFrozen(state)).toBe(true);
    expect(state.operatingMode).toBe('LEARNING');
  });
});

describe('resolveThresholds', () => {
  it('returns the active learning profile unchanged in LEARNING mode', () => {
    const mode = createModeState({
      operatingMode: 'LEARNING',
      portfolioMode: 'LEARNING',
      activeProfile: 'paper_learning',
    });
    const resolved = resolveThresholds(mode, profiles(learningProfile));

    expect(resolved.thresholds).toEqual({ minTrustScore: 30, minConfidenceScore: 40, minSignalScore: 30 });
    expect(resolved.policy).toBe('learning');
    expect(resolved.productionOverlay).toBe(false);
  });

  it('overlays the strict triple in PRODUCTION even for a profile of zeros', () => {
    const mode = createModeState({ operatingMode: 'PRODUCTION', portfolioMode: 'PRODUCTION', activeProfile: 'wide_open' });
    const resolved = resolveThresholds(mode, profiles(zeroProfile));

    expect(resolved.thresholds).toEqual({ minTrustScore: 70, minConfidenceScore: 60, minSignalScore: 70 });
    expect(resolved.thresholds).toEqual(PRODUCTION_THRESHOLDS);
    expect(resolved.policy).toBe('strict');
    expect(resolved.productionOverlay).toBe(true);
  });

  it('throws for an unknown active profile', () => {
    const mode = createModeState({ operatingMode: 'LEARNING', portfolioMode: 'LEARNING', activeProfile: 'missing' });
    expect(() => resolveThresholds(mode, profiles(learningProfile))).toThrow(/Active profile "missing" is not defined/);
  });

  it('re-validates coherence on every call, not only at construction', () => {
    const incoherent = { operatingMode: 'LEARNING', portfolioMode: 'PRODUCTION', activeProfile: 'paper_learning' } as const;
    expect(() => resolveThresholds(incoherent, profiles(learningProfile))).toThrow(ConfigurationError);
  });

  it('returns frozen results', () => {
    const mode = createModeState({ operatingMode: 'LEARNING', portfolioMode: 'LEARNING', activeProfile: 'paper_learning' });
    const resolved = resolveThresholds(mode, profiles(learningProfile));
    expect(Object.isFrozen(resolved)).toBe(true);
    expect(Object.isFrozen(resolved.thresholds)).toBe(true);
  });
});

describe('assertAboveSafetyFloor', () => {
  it('throws below the floor in PRODUCTION with the below_safety_floor code', () => {
    try {
      assertAboveSafetyFloor({ minTrustScore: 70, minConfidenceScore: 59, minSignalScore: 70 }, 'PRODUCTION');
      expect.fail('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError ? error.code : null).toBe('config.below_safety_floor');
    }
  });

  it('allows low thresholds in LEARNING but never non-finite ones', () => {
    expect(() =>
      assertAboveSafetyFloor({ minTrustScore: 0, minConfidenceScore: 0, minSignalScore: 0 }, 'LEARNING')
    ).not.toThrow();
    expect(() =>
      assertAboveSafetyFloor({ minTrustScore: Number.NaN, minConfidenceScore: 0, minSignalScore: 0 }, 'LEARNING')
    ).toThrow(/not a finite number/);
  });
});
