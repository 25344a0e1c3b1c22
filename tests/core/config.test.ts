import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getProfiles, loadConfig, parseConfig } from '../../src/core/config.js';
import { ConfigurationError } from '../../src/core/errors.js';

function writeConfig(contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'arbiter-config-'));
  const path = join(dir, 'config.yaml');
  writeFileSync(path, contents, 'utf-8');
  return path;
}

describe('config', () => {
  const savedEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.ARBITER_DB_PATH;
    delete process.env.ARBITER_LOG_LEVEL;
  });

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  it('falls back to defaults when the file is missing', () => {
    const config = loadConfig(join(tmpdir(), 'arbiter-missing', 'nope.yaml'));

    expect(config.mode).toEqual({ operatingMode: 'LEARNING', portfolioMode: 'LEARNING', activeProfile: 'paper_learning' });
    expect(config.learning.reviseSizeMultiplier).toBe(0.3);
    expect(config.learning.inferredConfidence).toEqual({ approve: 60, revise: 40 });
    expect(config.counterfactual.horizonHours).toBe(24);
    expect(config.patterns).toEqual({ window: 20, minTrades: 10 });
    expect(getProfiles(config).get('strict')).toEqual({
      name: 'strict',
      policy: 'strict',
      minTrustScore: 70,
      minConfidenceScore: 60,
      minSignalScore: 70,
    });
  });

  it('parses YAML and applies nested defaults', () => {
    const path = writeConfig(
      [
        'mode:',
        '  operatingMode: PRODUCTION',
        '  portfolioMode: PRODUCTION',
        '  activeProfile: strict',
        'router:',
        '  maxApprovalsPerRun: 2',
        'jobs:',
        '  counterfactual:',
        '    enabled: false',
        '    intervalMs: 1000',
        '    budgetMs: 500',
        '',
      ].join('\n')
    );
    const config = loadConfig(path);

    expect(config.mode.operatingMode).toBe('PRODUCTION');
    expect(config.router.maxApprovalsPerRun).toBe(2);
    expect(config.jobs.counterfactual).toEqual({ enabled: false, intervalMs: 1000, budgetMs: 500 });
    expect(config.jobs.signalRouter.intervalMs).toBe(60_000);
  });

  it('fails fast on incoherent modes', () => {
    expect(() =>
      parseConfig({ mode: { operatingMode: 'LEARNING', portfolioMode: 'PRODUCTION', activeProfile: 'strict' } })
    ).toThrow(ConfigurationError);
  });

  it('fails fast on an unknown active profile', () => {
    expect(() => parseConfig({ mode: { activeProfile: 'does_not_exist' } })).toThrow(
      /Active profile "does_not_exist" is not defined/
    );
  });

  it('rejects invalid enums and out-of-range values with the offending path', () => {
    expect(() => parseConfig({ mode: { operatingMode: 'PAPER' } })).toThrow(/mode\.operatingMode/);
    expect(() => parseConfig({ learning: { reviseSizeMultiplier: 1 } })).toThrow(/learning\.reviseSizeMultiplier/);
  });

  it('wraps unparseable YAML in a ConfigurationError', () => {
    const path = writeConfig('mode: [unterminated\n');
    expect(() => loadConfig(path)).toThrow(ConfigurationError);
  });

  it('applies environment overrides for the database path and log level', () => {
    process.env.ARBITER_DB_PATH = '/tmp/arbiter-env.sqlite';
    process.env.ARBITER_LOG_LEVEL = 'debug';
    const config = parseConfig({});

    expect(config.storage.dbPath).toBe('/tmp/arbiter-env.sqlite');
    expect(config.logging.level).toBe('debug');
  });
});
