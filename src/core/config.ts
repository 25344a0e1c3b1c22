import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';
import { createModeState, type ModeState } from './mode.js';
import { resolveThresholds, type ThresholdProfile } from './threshold_policy.js';

const OperatingModeSchema = z.enum(['LEARNING', 'PRODUCTION']);

const ScoreSchema = z.number().finite().min(0).max(100);

const ProfileSchema = z.object({
  policy: z.enum(['strict', 'learning']),
  minTrustScore: ScoreSchema,
  minConfidenceScore: ScoreSchema,
  minSignalScore: ScoreSchema,
});

const JobSchema = z.object({
  enabled: z.boolean().default(true),
  intervalMs: z.number().int().positive(),
  budgetMs: z.number().int().positive(),
  leaseMs: z.number().int().positive().optional(),
});

const DEFAULT_PROFILES = {
  strict: { policy: 'strict', minTrustScore: 70, minConfidenceScore: 60, minSignalScore: 70 },
  paper_learning: { policy: 'learning', minTrustScore: 30, minConfidenceScore: 40, minSignalScore: 30 },
} as const;

export const ArbiterConfigSchema = z.object({
  mode: z
    .object({
      operatingMode: OperatingModeSchema.default('LEARNING'),
      portfolioMode: OperatingModeSchema.default('LEARNING'),
      activeProfile: z.string().min(1).default('paper_learning'),
    })
    .default({}),
  profiles: z.record(z.string().min(1), ProfileSchema).default(DEFAULT_PROFILES),
  learning: z
    .object({
      reviseSizeMultiplier: z.number().gt(0).lt(1).default(0.3),
      inferredConfidence: z
        .object({
          approve: ScoreSchema.default(60),
          revise: ScoreSchema.default(40),
        })
        .default({}),
      minGradeSamples: z.number().int().min(1).default(5),
      ucbExploration: z.number().positive().default(2),
      optimisticSourceScore: ScoreSchema.default(100),
    })
    .default({}),
  router: z
    .object({
      maxApprovalsPerRun: z.number().int().min(1).default(5),
    })
    .default({}),
  counterfactual: z
    .object({
      horizonHours: z.number().positive().default(24),
      missedOpportunityPct: z.number().positive().default(20),
      correctRejectionPct: z.number().positive().default(20),
      lookupTimeoutMs: z.number().int().positive().default(10_000),
      maxPerRun: z.number().int().min(1).default(50),
      maxLookupAttempts: z.number().int().min(1).default(5),
    })
    .default({}),
  patterns: z
    .object({
      window: z.number().int().min(1).default(20),
      minTrades: z.number().int().min(1).default(10),
    })
    .default({}),
  jobs: z
    .object({
      signalRouter: JobSchema.default({ intervalMs: 60_000, budgetMs: 45_000 }),
      postTradeAnalyzer: JobSchema.default({ intervalMs: 300_000, budgetMs: 120_000 }),
      counterfactual: JobSchema.default({ intervalMs: 3_600_000, budgetMs: 300_000 }),
      pollIntervalMs: z.number().int().positive().default(1_000),
    })
    .default({}),
  storage: z
    .object({
      dbPath: z.string().min(1).optional(),
      busyTimeoutMs: z.number().int().min(0).default(5_000),
      retries: z.number().int().min(0).default(3),
      retryBaseDelayMs: z.number().int().min(0).default(50),
      retryMaxDelayMs: z.number().int().min(0).default(2_000),
    })
    .default({}),
  feeds: z
    .object({
      signalsPath: z.string().min(1).optional(),
      closedTradesPath: z.string().min(1).optional(),
      pricesPath: z.string().min(1).optional(),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),
});

export type ArbiterConfig = z.infer<typeof ArbiterConfigSchema>;
export type JobConfig = z.infer<typeof JobSchema>;

export function getConfigPath(): string {
  return process.env.ARBITER_CONFIG_PATH ?? join(homedir(), '.arbiter', 'config.yaml');
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

export function parseConfig(raw: unknown): ArbiterConfig {
  const parsed = ArbiterConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const config = parsed.data;

  const envDbPath = process.env.ARBITER_DB_PATH;
  if (envDbPath && envDbPath.trim().length > 0) {
    config.storage.dbPath = envDbPath;
  }
  const envLevel = process.env.ARBITER_LOG_LEVEL;
  if (envLevel === 'debug' || envLevel === 'info' || envLevel === 'warn' || envLevel === 'error') {
    config.logging.level = envLevel;
  }

  // Load-time safety check; resolution repeats it for every decision.
  resolveThresholds(getModeState(config), getProfiles(config));
  return config;
}

/**
 * Load and validate the YAML config. A missing file yields the defaults;
 * anything unparseable, incoherent or below the safety floor throws
 * ConfigurationError.
 */
export function loadConfig(configPath?: string): ArbiterConfig {
  const path = configPath ?? getConfigPath();
  if (!existsSync(path)) {
    return parseConfig({});
  }
  let raw: unknown;
  try {
    raw = yaml.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Unable to parse config at ${path}: ${message}`);
  }
  return parseConfig(raw);
}

export function getModeState(config: ArbiterConfig): ModeState {
  return createModeState({
    operatingMode: config.mode.operatingMode,
    portfolioMode: config.mode.portfolioMode,
    activeProfile: config.mode.activeProfile,
  });
}

export function getProfiles(config: ArbiterConfig): ReadonlyMap<string, ThresholdProfile> {
  const profiles = new Map<string, ThresholdProfile>();
  for (const [name, profile] of Object.entries(config.profiles)) {
    profiles.set(name, Object.freeze({ name, ...profile }));
  }
  return profiles;
}
