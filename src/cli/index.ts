#!/usr/bin/env node
/**
 * signal-arbiter CLI
 *
 * Inspect thresholds and learned statistics, evaluate a single signal, record
 * closed trades, and run the scheduled jobs.
 */

import 'dotenv/config';
import { readFileSync } from 'node:fs';

import { Command } from 'commander';

import { SignalArbiter, VERSION } from '../index.js';
import { evaluateDecision } from '../core/decision_gate.js';
import { ConfigurationError, describeError } from '../core/errors.js';
import { JOB_NAMES, type ArbiterJobName } from '../core/jobs.js';
import { extractPatterns } from '../core/pattern_extraction.js';
import { listAppliedOutcomes } from '../memory/outcome_log.js';
import { listRejections, summarizeRejectionAccuracy } from '../memory/rejection_log.js';

const program = new Command();

program
  .name('arbiter')
  .description('Adaptive decision and learning engine for trade signals')
  .version(VERSION)
  .option('-c, --config <path>', 'Config file (defaults to ARBITER_CONFIG_PATH or ~/.arbiter/config.yaml)');

function createArbiter(): SignalArbiter {
  const { config } = program.opts<{ config?: string }>();
  return new SignalArbiter({ configPath: config });
}

function readJson(path: string): unknown {
  const raw = readFileSync(path, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`Unable to parse ${path}: ${describeError(error)}`);
  }
}

function isJobName(value: string): value is ArbiterJobName {
  return Object.values(JOB_NAMES).some((name) => name === value);
}

// ============================================================================
// Policy
// ============================================================================

program
  .command('thresholds')
  .description('Show the thresholds in force for the configured mode and profile')
  .action(async () => {
    const arbiter = createArbiter();
    const resolved = arbiter.resolveThresholds();
    console.log('Effective Thresholds');
    console.log('─'.repeat(40));
    console.log(`Mode: ${resolved.operatingMode}`);
    console.log(`Profile: ${resolved.profile} (${resolved.policy})`);
    if (resolved.productionOverlay) {
      console.log('Production overlay applied');
    }
    console.log(`Trust:      ${resolved.thresholds.minTrustScore}`);
    console.log(`Confidence: ${resolved.thresholds.minConfidenceScore}`);
    console.log(`Signal:     ${resolved.thresholds.minSignalScore}`);
    await arbiter.stop();
  });

program
  .command('evaluate <file>')
  .description('Evaluate one { signal, deliberation } record without recording anything')
  .action(async (file: string) => {
    const arbiter = createArbiter();
    const payload = readJson(file);
    const envelope: object = payload !== null && typeof payload === 'object' ? payload : {};
    const signal = 'signal' in envelope ? envelope.signal : undefined;
    const deliberation = 'deliberation' in envelope ? envelope.deliberation : null;
    const source =
      signal && typeof signal === 'object' && 'source' in signal && typeof signal.source === 'string'
        ? signal.source
        : null;
    const hint =
      signal && typeof signal === 'object' && 'strategyHint' in signal && typeof signal.strategyHint === 'string'
        ? signal.strategyHint
        : null;
    const { learning } = arbiter.config;
    const verdict = evaluateDecision({
      signal,
      deliberation,
      resolved: arbiter.resolveThresholds(),
      bandit: {
        strategy: arbiter.bandit.selectStrategy(hint)?.name ?? hint,
        sourceScore: source && source.trim().length > 0 ? arbiter.bandit.scoreSource(source).score : null,
      },
      learning: {
        reviseSizeMultiplier: learning.reviseSizeMultiplier,
        inferredConfidence: learning.inferredConfidence,
      },
    });
    console.log(JSON.stringify(verdict, null, 2));
    await arbiter.stop();
  });

// ============================================================================
// Learning State
// ============================================================================

program
  .command('record-outcome <file>')
  .description('Apply a closed trade (or an array of them) to the reliability store')
  .action(async (file: string) => {
    const arbiter = createArbiter();
    const payload = readJson(file);
    const trades = Array.isArray(payload) ? payload : [payload];
    for (const trade of trades) {
      const result = await arbiter.updater.record(trade);
      if (result.status === 'duplicate') {
        console.log(`${result.tradeId}: duplicate, skipped`);
      } else {
        console.log(
          `${result.tradeId}: ${result.isWin ? 'win' : 'loss'} | ${result.strategy.name} α=${result.strategy.alpha} β=${result.strategy.beta} | ${result.source.name} grade ${result.source.grade}`
        );
      }
    }
    await arbiter.stop();
  });

program
  .command('stats')
  .description('Show strategy and source statistics')
  .action(async () => {
    const arbiter = createArbiter();
    const strategies = arbiter.store.listStrategies();
    const sources = arbiter.store.listSources();

    console.log('Strategies');
    console.log('─'.repeat(60));
    if (strategies.length === 0) console.log('No strategies recorded.');
    for (const stat of strategies) {
      const mean = stat.alpha / (stat.alpha + stat.beta);
      console.log(`${stat.name} | α=${stat.alpha} β=${stat.beta} | trades ${stat.trades} | mean ${(mean * 100).toFixed(1)}%`);
    }

    console.log('');
    console.log('Sources');
    console.log('─'.repeat(60));
    if (sources.length === 0) console.log('No sources recorded.');
    for (const stat of sources) {
      console.log(
        `${stat.name} | ${stat.grade} | score ${stat.score.toFixed(2)} | ${stat.wins}W/${stat.losses}L | signals ${stat.signals}`
      );
    }
    await arbiter.stop();
  });

program
  .command('rank')
  .description('Draw one Thompson-sampling ranking of strategies')
  .action(async () => {
    const arbiter = createArbiter();
    const ranked = arbiter.bandit.rankStrategies();
    if (ranked.length === 0) {
      console.log('No strategies recorded.');
    }
    ranked.forEach((entry, index) => {
      console.log(`${index + 1}. ${entry.name} | sample ${entry.sample.toFixed(4)} | mean ${entry.expected.toFixed(4)}`);
    });
    await arbiter.stop();
  });

program
  .command('patterns')
  .description('Win-rate breakdown over recent closed trades')
  .action(async () => {
    const arbiter = createArbiter();
    const { window, minTrades } = arbiter.config.patterns;
    const report = extractPatterns(listAppliedOutcomes({ limit: window }, arbiter.store.database), {
      window,
      minTrades,
    });
    if (!report) {
      console.log(`Not enough trades yet (need ${minTrades}).`);
      await arbiter.stop();
      return;
    }
    console.log(`Last ${report.trades} trades: ${(report.winRate * 100).toFixed(1)}% win rate, avg ${report.avgPnlPercent.toFixed(2)}%`);
    for (const insight of report.insights) {
      console.log(`- ${insight.message}`);
    }
    await arbiter.stop();
  });

program
  .command('rejections')
  .description('Show recent rejections and counterfactual accuracy')
  .option('-r, --reason <code>', 'Filter by reason code')
  .option('-l, --limit <number>', 'Limit entries', '20')
  .action(async (options: { reason?: string; limit: string }) => {
    const arbiter = createArbiter();
    const db = arbiter.store.database;
    const summary = summarizeRejectionAccuracy(db);
    console.log(
      `Correct: ${summary.correct_rejection} | Missed: ${summary.missed_opportunity} | Neutral: ${summary.neutral} | ` +
        `Pending: ${summary.pending} | Expired: ${summary.expired} | Untracked: ${summary.untracked}`
    );
    console.log('─'.repeat(60));
    for (const row of listRejections({ reasonCode: options.reason, limit: Number(options.limit) || 20 }, db)) {
      const outcome = row.outcome ?? row.status;
      console.log(`[${row.rejectedAt}] ${row.source} ${row.token ?? '-'} | ${row.reasonCode} | ${outcome}`);
    }
    await arbiter.stop();
  });

// ============================================================================
// Jobs
// ============================================================================

program
  .command('run')
  .description('Run the scheduled jobs until interrupted')
  .option('--once <job>', `Run one job immediately and exit (${Object.values(JOB_NAMES).join(', ')})`)
  .action(async (options: { once?: string }) => {
    const arbiter = createArbiter();
    const once = options.once;
    if (once !== undefined) {
      if (!isJobName(once)) {
        await arbiter.stop();
        throw new Error(`Unknown job "${once}"`);
      }
      const registered = arbiter.registerJobs();
      if (!registered.includes(once)) {
        await arbiter.stop();
        throw new Error(`Job "${once}" is disabled or its feed is not configured`);
      }
      const result = await arbiter.scheduler.runJobNow(once);
      console.log(`${result.name}: ${result.status}${result.error ? ` (${result.error})` : ''}`);
      await arbiter.stop();
      if (result.status === 'failed') process.exitCode = 1;
      return;
    }

    const jobs = await arbiter.start();
    console.log(`Running ${jobs.length} job(s): ${jobs.join(', ') || 'none'}. Ctrl+C to stop.`);
    await new Promise<void>((resolve) => {
      const shutdown = () => {
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
        resolve();
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });
    await arbiter.stop();
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`FATAL: ${error.message}`);
  } else {
    console.error(`Error: ${describeError(error)}`);
  }
  process.exitCode = 1;
});
