import { ConfigurationError } from './errors.js';
import { assertModeCoherence, type ModeState, type OperatingMode } from './mode.js';

export type ProfilePolicy = 'strict' | 'learning';

export type EffectiveThresholds = Readonly<{
  minTrustScore: number;
  minConfidenceScore: number;
  minSignalScore: number;
}>;

export type ThresholdProfile = Readonly<
  {
    name: string;
    policy: ProfilePolicy;
  } & EffectiveThresholds
>;

export type ResolvedThresholds = Readonly<{
  thresholds: EffectiveThresholds;
  operatingMode: OperatingMode;
  profile: string;
  policy: ProfilePolicy;
  productionOverlay: boolean;
}>;

/** Applied over whatever profile is active whenever the operating mode is PRODUCTION. */
export const PRODUCTION_THRESHOLDS: EffectiveThresholds = Object.freeze({
  minTrustScore: 70,
  minConfidenceScore: 60,
  minSignalScore: 70,
});

/** Hard minimums for PRODUCTION, checked after the overlay. */
export const SAFETY_FLOOR: EffectiveThresholds = Object.freeze({
  minTrustScore: 70,
  minConfidenceScore: 60,
  minSignalScore: 70,
});

const THRESHOLD_FIELDS = ['minTrustScore', 'minConfidenceScore', 'minSignalScore'] as const;

export function assertAboveSafetyFloor(
  thresholds: EffectiveThresholds,
  operatingMode: OperatingMode
): void {
  for (const field of THRESHOLD_FIELDS) {
    const value = thresholds[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ConfigurationError(
        `Threshold ${field} is not a finite number (${String(value)})`,
        'config.invalid',
        { field }
      );
    }
    if (operatingMode === 'PRODUCTION' && value < SAFETY_FLOOR[field]) {
      throw new ConfigurationError(
        `Threshold ${field}=${value} is below the production safety floor ${SAFETY_FLOOR[field]}`,
        'config.below_safety_floor',
        { field, value, floor: SAFETY_FLOOR[field] }
      );
    }
  }
}

/**
 * Resolve the thresholds in force for one decision context. Pure and uncached:
 * mode coherence and the safety floor are re-checked on every call.
 */
export function resolveThresholds(
  mode: ModeState,
  profiles: ReadonlyMap<string, ThresholdProfile>
): ResolvedThresholds {
  assertModeCoherence(mode);

  const profile = profiles.get(mode.activeProfile);
  if (!profile) {
    throw new ConfigurationError(
      `Active profile "${mode.activeProfile}" is not defined`,
      'config.unknown_profile',
      { profile: mode.activeProfile, known: [...profiles.keys()] }
    );
  }

  let thresholds: EffectiveThresholds = {
    minTrustScore: profile.minTrustScore,
    minConfidenceScore: profile.minConfidenceScore,
    minSignalScore: profile.minSignalScore,
  };
  let policy: ProfilePolicy = profile.policy;
  const productionOverlay = mode.operatingMode === 'PRODUCTION';
  if (productionOverlay) {
    thresholds = { ...PRODUCTION_THRESHOLDS };
    policy = 'strict';
  }

  assertAboveSafetyFloor(thresholds, mode.operatingMode);

  return Object.freeze({
    thresholds: Object.freeze(thresholds),
    operatingMode: mode.operatingMode,
    profile: profile.name,
    policy,
    productionOverlay,
  });
}
