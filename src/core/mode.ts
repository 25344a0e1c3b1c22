import { ConfigurationError } from './errors.js';

export type OperatingMode = 'LEARNING' | 'PRODUCTION';

export type ModeState = Readonly<{
  operatingMode: OperatingMode;
  portfolioMode: OperatingMode;
  activeProfile: string;
}>;

export function isOperatingMode(value: unknown): value is OperatingMode {
  return value === 'LEARNING' || value === 'PRODUCTION';
}

/**
 * Throws unless the capital mode and the operating mode agree. A production
 * portfolio under a learning operating mode is the case this exists for.
 */
export function assertModeCoherence(state: {
  operatingMode: unknown;
  portfolioMode: unknown;
  activeProfile: unknown;
}): asserts state is ModeState {
  if (!isOperatingMode(state.operatingMode)) {
    throw new ConfigurationError(
      `Unknown operating mode "${String(state.operatingMode)}"`,
      'config.mode_incoherent'
    );
  }
  if (!isOperatingMode(state.portfolioMode)) {
    throw new ConfigurationError(
      `Unknown portfolio mode "${String(state.portfolioMode)}"`,
      'config.mode_incoherent'
    );
  }
  if (state.portfolioMode === 'PRODUCTION' && state.operatingMode !== 'PRODUCTION') {
    throw new ConfigurationError(
      `Mode incoherence: portfolio mode PRODUCTION requires operating mode PRODUCTION (got ${state.operatingMode})`,
      'config.mode_incoherent',
      { operatingMode: state.operatingMode, portfolioMode: state.portfolioMode }
    );
  }
  if (state.portfolioMode !== state.operatingMode) {
    throw new ConfigurationError(
      `Mode incoherence: portfolio mode ${state.portfolioMode} does not match operating mode ${state.operatingMode}`,
      'config.mode_incoherent',
      { operatingMode: state.operatingMode, portfolioMode: state.portfolioMode }
    );
  }
  if (typeof state.activeProfile !== 'string' || state.activeProfile.trim().length === 0) {
    throw new ConfigurationError('Active profile name is required', 'config.unknown_profile');
  }
}

export function createModeState(input: {
  operatingMode: OperatingMode;
  portfolioMode: OperatingMode;
  activeProfile: string;
}): ModeState {
  const candidate = {
    operatingMode: input.operatingMode,
    portfolioMode: input.portfolioMode,
    activeProfile: input.activeProfile,
  };
  assertModeCoherence(candidate);
  return Object.freeze(candidate);
}
