import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';

import type Database from 'better-sqlite3';

import { BanditSelector } from './core/bandit.js';
import { getModeState, getProfiles, loadConfig, type ArbiterConfig } from './core/config.js';
import { CounterfactualTracker } from './core/counterfactual.js';
import {
  JsonFileClosedTradeFeed,
  JsonFilePriceProvider,
  JsonFileSignalFeed,
  type ClosedTradeFeed,
  type PriceProvider,
  type SignalFeed,
} from './core/feeds.js';
import { registerArbiterJobs, type ArbiterJobName } from './core/jobs.js';
import { createLogger, type Logger } from './core/logger.js';
import type { ModeState } from './core/mode.js';
import { OutcomeUpdater } from './core/outcome_updater.js';
import { SchedulerControlPlane } from './core/scheduler_control_plane.js';
import { SignalRouter } from './core/signal_router.js';
import { resolveThresholds, type ResolvedThresholds, type ThresholdProfile } from './core/threshold_policy.js';
import { closeDatabase, openDatabase } from './memory/db.js';
import { ReliabilityStore } from './memory/reliability_store.js';

export const VERSION = '0.1.0';

export { BanditSelector } from './core/bandit.js';
export type { SourceScore, StrategyRanking } from './core/bandit.js';
export { createSeededRandom, sampleBeta, sampleGamma } from './core/beta_sampling.js';
export { ArbiterConfigSchema, getModeState, getProfiles, loadConfig, parseConfig } from './core/config.js';
export type { ArbiterConfig } from './core/config.js';
export { classifyPriceChange, CounterfactualTracker } from './core/counterfactual.js';
export { evaluateDecision } from './core/decision_gate.js';
export type { CandidateSignal, Deliberation, Verdict } from './core/decision_gate.js';
export {
  ArbiterError,
  ConfigurationError,
  DataQualityError,
  TransientStorageError,
} from './core/errors.js';
export type { ClosedTradeFeed, PriceProvider, SignalBatch, SignalEnvelope, SignalFeed } from './core/feeds.js';
export { Logger, createLogger } from './core/logger.js';
export { assertModeCoherence, createModeState } from './core/mode.js';
export type { ModeState, OperatingMode } from './core/mode.js';
export { OutcomeUpdater } from './core/outcome_updater.js';
export type { RecordResult, TradeOutcome } from './core/outcome_updater.js';
export { extractPatterns } from './core/pattern_extraction.js';
export type { PatternReport } from './core/pattern_extraction.js';
export { computeSourceGrade, computeUcbScore } from './core/reliability.js';
export type { SourceGrade, SourceStat, StrategyStat } from './core/reliability.js';
export { SignalRouter } from './core/signal_router.js';
export type { RouteOptions, RouteResult, RoutedSignal } from './core/signal_router.js';
export {
  assertAboveSafetyFloor,
  PRODUCTION_THRESHOLDS,
  resolveThresholds,
  SAFETY_FLOOR,
} from './core/threshold_policy.js';
export type { EffectiveThresholds, ResolvedThresholds, ThresholdProfile } from './core/threshold_policy.js';
export { ReliabilityStore } from './memory/reliability_store.js';

export interface SignalArbiterOptions {
  config?: ArbiterConfig;
  configPath?: string;
  logger?: Logger;
  db?: Database.Database;
  signalFeed?: SignalFeed;
  closedTradeFeed?: ClosedTradeFeed;
  priceProvider?: PriceProvider;
  ownerId?: string;
}

/**
 * Wires config, storage and the learning components together. Configuration
 * problems surface from the constructor or `start()` as ConfigurationError.
 */
export class SignalArbiter {
  readonly config: ArbiterConfig;
  readonly logger: Logger;
  readonly mode: ModeState;
  readonly profiles: ReadonlyMap<string, ThresholdProfile>;
  readonly store: ReliabilityStore;
  readonly bandit: BanditSelector;
  readonly updater: OutcomeUpdater;
  readonly router: SignalRouter;
  readonly tracker: CounterfactualTracker;
  readonly scheduler: SchedulerControlPlane;
  private readonly db: Database.Database;
  private readonly ownsDb: boolean;
  private readonly ownsLogger: boolean;
  private readonly options: SignalArbiterOptions;
  private registered: ArbiterJobName[] | null = null;

  constructor(options: SignalArbiterOptions = {}) {
    this.options = options;
    this.config = options.config ?? loadConfig(options.configPath);
    this.ownsLogger = options.logger === undefined;
    this.logger =
      options.logger ?? createLogger({ level: this.config.logging.level, filePath: this.config.logging.filePath });
    this.mode = getModeState(this.config);
    this.profiles = getProfiles(this.config);

    const { storage, learning } = this.config;
    this.ownsDb = options.db === undefined;
    this.db = options.db ?? openDatabase(storage.dbPath, { busyTimeoutMs: storage.busyTimeoutMs });
    const retry = {
      retries: storage.retries,
      baseDelayMs: storage.retryBaseDelayMs,
      maxDelayMs: storage.retryMaxDelayMs,
    };
    const scoring = {
      minGradeSamples: learning.minGradeSamples,
      exploration: learning.ucbExploration,
      optimisticScore: learning.optimisticSourceScore,
    };

    this.store = new ReliabilityStore({ db: this.db, scoring });
    this.bandit = new BanditSelector({ store: this.store, scoring });
    this.updater = new OutcomeUpdater({ store: this.store, logger: this.logger.child('outcome'), retry });
    this.router = new SignalRouter({
      store: this.store,
      bandit: this.bandit,
      mode: this.mode,
      profiles: this.profiles,
      learning: {
        reviseSizeMultiplier: learning.reviseSizeMultiplier,
        inferredConfidence: learning.inferredConfidence,
      },
      maxApprovalsPerRun: this.config.router.maxApprovalsPerRun,
      retry,
      logger: this.logger.child('router'),
    });
    this.tracker = new CounterfactualTracker({
      db: this.db,
      logger: this.logger.child('counterfactual'),
      params: this.config.counterfactual,
    });
    this.scheduler = new SchedulerControlPlane({
      ownerId: options.ownerId ?? `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`,
      db: this.db,
      pollIntervalMs: this.config.jobs.pollIntervalMs,
      logger: this.logger.child('scheduler'),
    });
  }

  /** Fresh resolution; re-validates mode coherence and the safety floor. */
  resolveThresholds(): ResolvedThresholds {
    return resolveThresholds(this.mode, this.profiles);
  }

  registerJobs(): ArbiterJobName[] {
    if (this.registered) return this.registered;
    const { feeds } = this.config;
    this.registered = registerArbiterJobs(
      this.scheduler,
      {
        config: this.config,
        logger: this.logger.child('jobs'),
        router: this.router,
        updater: this.updater,
        tracker: this.tracker,
        signalFeed: this.options.signalFeed ?? (feeds.signalsPath ? new JsonFileSignalFeed(feeds.signalsPath) : undefined),
        closedTradeFeed:
          this.options.closedTradeFeed ??
          (feeds.closedTradesPath ? new JsonFileClosedTradeFeed(feeds.closedTradesPath) : undefined),
        priceProvider:
          this.options.priceProvider ?? (feeds.pricesPath ? new JsonFilePriceProvider(feeds.pricesPath) : undefined),
      },
      this.db
    );
    return this.registered;
  }

  async start(): Promise<ArbiterJobName[]> {
    const resolved = this.resolveThresholds();
    const jobs = this.registerJobs();
    this.logger.info('arbiter.start', {
      operatingMode: resolved.operatingMode,
      profile: resolved.profile,
      policy: resolved.policy,
      thresholds: resolved.thresholds,
      jobs,
    });
    this.scheduler.start();
    return jobs;
  }

  async stop(): Promise<void> {
    await this.scheduler.stop();
    this.logger.info('arbiter.stop');
    if (this.ownsDb) {
      closeDatabase(this.config.storage.dbPath);
    }
    if (this.ownsLogger) {
      this.logger.close();
    }
  }
}
