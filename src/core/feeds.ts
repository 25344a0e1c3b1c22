import { existsSync } from 'node:fs';
import { readFile, rename, writeFile } from 'node:fs/promises';

import { z } from 'zod';

import { DataQualityError } from './errors.js';

/** One candidate plus the upstream deliberation verdict, both unvalidated. */
export type SignalEnvelope = {
  signal: unknown;
  deliberation: unknown;
};

export type SignalBatch = {
  envelopes: SignalEnvelope[];
  /** Remove the settled envelopes, by index into `envelopes`; the rest stay queued. */
  commit(settled: ReadonlySet<number>): Promise<void>;
};

export interface SignalFeed {
  /** Hand out pending candidates without removing them from the queue. */
  take(limit?: number): Promise<SignalBatch>;
}

export interface ClosedTradeFeed {
  listClosedTrades(): Promise<unknown[]>;
}

export type PriceChangeQuery = {
  token: string;
  source: string;
  referencePrice: number | null;
  rejectedAt: string;
  horizonHours: number;
};

export interface PriceProvider {
  /** Percent change since the rejection, or null when no price is known. */
  getPriceChangePct(query: PriceChangeQuery, signal: AbortSignal): Promise<number | null>;
}

const EnvelopeSchema = z.object({
  signal: z.unknown(),
  deliberation: z.unknown().optional(),
});

const PriceFileSchema = z.record(z.string(), z.number().finite().positive());

async function readJsonFile(path: string): Promise<unknown> {
  if (!existsSync(path)) return null;
  const raw = await readFile(path, 'utf-8');
  if (raw.trim().length === 0) return null;
  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DataQualityError(`Unable to parse JSON at ${path}: ${message}`, { path });
  }
}

async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  const tmp = `${path}.tmp`;
  await writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
  await rename(tmp, path);
}

/**
 * Queue file of `{ signal, deliberation }` entries. Entries leave the file only
 * when committed as settled; writers may append while a batch is out.
 */
export class JsonFileSignalFeed implements SignalFeed {
  constructor(private readonly path: string) {}

  async take(limit = Number.POSITIVE_INFINITY): Promise<SignalBatch> {
    const taken = (await this.readQueue()).slice(0, limit);
    return {
      envelopes: taken.map((entry) => ({ signal: entry.signal, deliberation: entry.deliberation ?? null })),
      commit: async (settled) => {
        if (settled.size === 0) return;
        const current = await this.readQueue();
        const kept = current.slice(0, taken.length).filter((_, index) => !settled.has(index));
        await writeJsonAtomic(this.path, [...kept, ...current.slice(taken.length)]);
      },
    };
  }

  private async readQueue(): Promise<Array<z.infer<typeof EnvelopeSchema>>> {
    const raw = await readJsonFile(this.path);
    if (raw === null) return [];
    const parsed = z.array(EnvelopeSchema).safeParse(raw);
    if (!parsed.success) {
      throw new DataQualityError(`Signal queue at ${this.path} is not an array of envelopes`, {
        path: this.path,
      });
    }
    return parsed.data;
  }
}

/** Array of closed-trade records; re-reading is safe because recording is idempotent. */
export class JsonFileClosedTradeFeed implements ClosedTradeFeed {
  constructor(private readonly path: string) {}

  async listClosedTrades(): Promise<unknown[]> {
    const raw = await readJsonFile(this.path);
    if (raw === null) return [];
    if (!Array.isArray(raw)) {
      throw new DataQualityError(`Closed trades at ${this.path} must be a JSON array`, { path: this.path });
    }
    return raw;
  }
}

/** Token to current price map; change is measured against the rejection's reference price. */
export class JsonFilePriceProvider implements PriceProvider {
  constructor(private readonly path: string) {}

  async getPriceChangePct(query: PriceChangeQuery, signal: AbortSignal): Promise<number | null> {
    if (signal.aborted) return null;
    if (query.referencePrice === null || query.referencePrice <= 0) return null;
    const raw = await readJsonFile(this.path);
    if (raw === null) return null;
    const parsed = PriceFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DataQualityError(`Price file at ${this.path} must map tokens to positive prices`, {
        path: this.path,
      });
    }
    const current = parsed.data[query.token];
    if (current === undefined) return null;
    return ((current - query.referencePrice) / query.referencePrice) * 100;
  }
}
