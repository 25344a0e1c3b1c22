import { z } from 'zod';

import { describeError } from './errors.js';
import { isOperatingMode, type OperatingMode } from './mode.js';
import {
  assertAboveSafetyFloor,
  type EffectiveThresholds,
  type ProfilePolicy,
  type ResolvedThresholds,
} from './threshold_policy.js';

export const CandidateSignalSchema = z.object({
  signalId: z.string().min(1).optional(),
  source: z.string().trim().min(1),
  token: z.string().min(1).optional(),
  strategyHint: z.string().trim().min(1).nullish(),
  trustScore: z.number().finite().min(0).max(100),
  confidenceScore: z.number().finite().min(0).max(100),
  signalScore: z.number().finite().min(0).max(100),
  referencePrice: z.number().finite().positive().optional(),
});

export const DeliberationSchema = z.object({
  verdict: z.enum(['APPROVE', 'REVISE', 'REJECT']),
  confidence: z.number().finite().min(0).max(100),
});

export type CandidateSignal = z.infer<typeof CandidateSignalSchema>;
export type Deliberation = z.infer<typeof DeliberationSchema>;

export type GateDecision = 'APPROVE' | 'REJECT';
export type VerdictTag = 'revise_probe' | 'confidence_inferred';

export type RejectReasonCode =
  | 'below_trust_threshold'
  | 'below_confidence_threshold'
  | 'below_signal_threshold'
  | 'missing_deliberation'
  | 'deliberation_rejected'
  | 'unmeasured_confidence'
  | 'revise_not_allowed'
  | 'malformed_signal'
  | 'malformed_deliberation'
  | 'internal_error';

export type ApproveReasonCode = 'approved' | 'revise_probe';

export type Verdict = {
  decision: GateDecision;
  sizeMultiplier: number;
  tags: VerdictTag[];
  reasonCode: RejectReasonCode | ApproveReasonCode;
  reason: string;
  strategy: string | null;
  sourceScore: number | null;
  effectiveConfidence: number | null;
  thresholds: EffectiveThresholds | null;
  operatingMode: OperatingMode | null;
  profile: string | null;
  policy: ProfilePolicy | null;
};

export type GateLearningParams = {
  reviseSizeMultiplier: number;
  inferredConfidence: { approve: number; revise: number };
};

export const DEFAULT_GATE_LEARNING: GateLearningParams = {
  reviseSizeMultiplier: 0.3,
  inferredConfidence: { approve: 60, revise: 40 },
};

export interface DecisionInput {
  signal: unknown;
  deliberation: unknown;
  resolved: ResolvedThresholds;
  bandit?: { strategy: string | null; sourceScore: number | null };
  learning?: Partial<GateLearningParams>;
}

const REJECT_REASONS: Record<RejectReasonCode, string> = {
  below_trust_threshold: 'below trust threshold',
  below_confidence_threshold: 'below confidence threshold',
  below_signal_threshold: 'below signal threshold',
  missing_deliberation: 'no deliberation verdict',
  deliberation_rejected: 'deliberation rejected the signal',
  unmeasured_confidence: 'confidence unmeasured; inference not allowed under strict policy',
  revise_not_allowed: 'REVISE is not allowed under strict policy',
  malformed_signal: 'malformed signal',
  malformed_deliberation: 'malformed deliberation',
  internal_error: 'internal error',
};

function isStrict(resolved: ResolvedThresholds): boolean {
  return resolved.operatingMode === 'PRODUCTION' || resolved.policy === 'strict';
}

function baseVerdict(input: DecisionInput): Omit<Verdict, 'decision' | 'reasonCode' | 'reason'> {
  return {
    sizeMultiplier: 0,
    tags: [],
    strategy: input.bandit?.strategy ?? null,
    sourceScore: input.bandit?.sourceScore ?? null,
    effectiveConfidence: null,
    thresholds: input.resolved.thresholds,
    operatingMode: input.resolved.operatingMode,
    profile: input.resolved.profile,
    policy: input.resolved.policy,
  };
}

function reject(
  input: DecisionInput,
  reasonCode: RejectReasonCode,
  extra?: { detail?: string; tags?: VerdictTag[]; effectiveConfidence?: number | null }
): Verdict {
  const reason = extra?.detail ? `${REJECT_REASONS[reasonCode]}: ${extra.detail}` : REJECT_REASONS[reasonCode];
  return {
    ...baseVerdict(input),
    decision: 'REJECT',
    reasonCode,
    reason,
    tags: extra?.tags ?? [],
    effectiveConfidence: extra?.effectiveConfidence ?? null,
  };
}

function firstThresholdFailure(
  signal: CandidateSignal,
  thresholds: EffectiveThresholds
): RejectReasonCode | null {
  if (signal.trustScore < thresholds.minTrustScore) return 'below_trust_threshold';
  if (signal.confidenceScore < thresholds.minConfidenceScore) return 'below_confidence_threshold';
  if (signal.signalScore < thresholds.minSignalScore) return 'below_signal_threshold';
  return null;
}

function evaluateValidated(
  input: DecisionInput,
  signal: CandidateSignal,
  deliberation: Deliberation | null
): Verdict {
  const { resolved } = input;
  const strict = isStrict(resolved);
  const learning: GateLearningParams = {
    ...DEFAULT_GATE_LEARNING,
    ...input.learning,
  };

  const failure = firstThresholdFailure(signal, resolved.thresholds);
  if (failure) {
    // Threshold failures are terminal in every policy.
    return reject(input, failure);
  }

  if (!deliberation) {
    return reject(input, 'missing_deliberation');
  }
  if (deliberation.verdict === 'REJECT') {
    return reject(input, 'deliberation_rejected', { effectiveConfidence: deliberation.confidence });
  }

  const tags: VerdictTag[] = [];
  let effectiveConfidence = deliberation.confidence;
  if (effectiveConfidence === 0) {
    if (strict) {
      return reject(input, 'unmeasured_confidence', { effectiveConfidence: 0 });
    }
    effectiveConfidence =
      deliberation.verdict === 'APPROVE'
        ? learning.inferredConfidence.approve
        : learning.inferredConfidence.revise;
    tags.push('confidence_inferred');
  }

  if (deliberation.verdict === 'REVISE') {
    if (strict) {
      return reject(input, 'revise_not_allowed', { tags, effectiveConfidence });
    }
    const multiplier = learning.reviseSizeMultiplier;
    if (!(multiplier > 0 && multiplier < 1)) {
      return reject(input, 'internal_error', {
        detail: `revise size multiplier ${multiplier} outside (0, 1)`,
        tags,
        effectiveConfidence,
      });
    }
    tags.push('revise_probe');
    return {
      ...baseVerdict(input),
      decision: 'APPROVE',
      sizeMultiplier: multiplier,
      tags,
      reasonCode: 'revise_probe',
      reason: `REVISE approved as probe at ${multiplier}x size`,
      effectiveConfidence,
    };
  }

  return {
    ...baseVerdict(input),
    decision: 'APPROVE',
    sizeMultiplier: 1,
    tags,
    reasonCode: 'approved',
    reason: 'passed thresholds and deliberation',
    effectiveConfidence,
  };
}

/**
 * Single enforcement point for mode-dependent gating. Never throws and never
 * approves on failure: malformed input or an internal error yields REJECT.
 */
export function evaluateDecision(input: DecisionInput): Verdict {
  try {
    // The resolved context is re-checked here; NaN thresholds would pass every comparison.
    if (!isOperatingMode(input.resolved.operatingMode)) {
      throw new Error(`unknown operating mode ${String(input.resolved.operatingMode)}`);
    }
    assertAboveSafetyFloor(input.resolved.thresholds, input.resolved.operatingMode);

    const signal = CandidateSignalSchema.safeParse(input.signal);
    if (!signal.success) {
      return reject(input, 'malformed_signal', { detail: signal.error.issues[0]?.message });
    }

    let deliberation: Deliberation | null = null;
    if (input.deliberation !== null && input.deliberation !== undefined) {
      const parsed = DeliberationSchema.safeParse(input.deliberation);
      if (!parsed.success) {
        return reject(input, 'malformed_deliberation', { detail: parsed.error.issues[0]?.message });
      }
      deliberation = parsed.data;
    }

    return evaluateValidated(input, signal.data, deliberation);
  } catch (error) {
    return {
      decision: 'REJECT',
      sizeMultiplier: 0,
      tags: [],
      reasonCode: 'internal_error',
      reason: `${REJECT_REASONS.internal_error}: ${describeError(error)}`,
      strategy: null,
      sourceScore: null,
      effectiveConfidence: null,
      thresholds: null,
      operatingMode: null,
      profile: null,
      policy: null,
    };
  }
}
