import { differenceInMilliseconds, parseISO } from "date-fns";
import { z } from "zod";
import type {
  FundComposition,
  PriceSeries,
  ValidationReport,
} from "../types/index.ts";
import { DataCorruptError, errorMessage } from "../errors.ts";
import { createPriceSeries } from "../services/adjustment.ts";
import { isAdjustedVendor } from "../services/sources/vendors.ts";

export const CACHE_KINDS = [
  "historical",
  "description",
  "benchmark",
  "composition",
] as const;

export type CacheKind = (typeof CACHE_KINDS)[number];

export function isCacheKind(value: string): value is CacheKind {
  return CACHE_KINDS.some((kind) => kind === value);
}

const HOUR_MS = 60 * 60 * 1000;

export const CACHE_TTL_MS: Record<CacheKind, number> = {
  historical: 24 * HOUR_MS,
  benchmark: 24 * HOUR_MS,
  composition: 24 * HOUR_MS,
  description: 7 * 24 * HOUR_MS,
};

export interface CacheKey {
  identifier: string;
  kind: CacheKind;
}

/**
 * Raw persistence for serialized cache entries. Implementations only move
 * text around; parsing and expiry live in CacheManager.
 */
export interface CacheStore {
  read(key: CacheKey): Promise<string | null>;
  write(key: CacheKey, contents: string): Promise<void>;
  remove(key: CacheKey): Promise<void>;
  list(): Promise<CacheKey[]>;
}

export interface CachePayloads {
  historical: PriceSeries;
  benchmark: PriceSeries;
  description: string;
  composition: FundComposition;
}

export interface CacheEntry<T> {
  data: T;
  timestamp: string;
  source: string;
  validation?: ValidationReport;
}

export interface CacheListing extends CacheKey {
  source: string;
  timestamp: string;
  ageMs: number;
  expired: boolean;
}

const CheckResultSchema = z.object({
  passed: z.boolean(),
  message: z.string(),
  warnings: z.array(z.string()).optional(),
});

const ValidationReportSchema = z.object({
  valid: z.boolean(),
  checks: z.object({
    total_return: CheckResultSchema,
    consistency: CheckResultSchema,
    completeness: CheckResultSchema,
  }),
});

const EnvelopeSchema = z.object({
  data: z.unknown(),
  timestamp: z.string().datetime({ offset: true }),
  source: z.string(),
  validation: ValidationReportSchema.optional(),
});

// Entries written by older versions may lack distributions or the adjusted flag
const StoredSeriesSchema = z.object({
  identifier: z.string(),
  symbol: z.string().optional(),
  records: z
    .array(
      z.object({
        date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
        price: z.number().finite().positive(),
        dividend: z.number().finite().nonnegative().default(0),
        capitalGain: z.number().finite().nonnegative().default(0),
      })
    )
    .superRefine((records, ctx) => {
      records.forEach((record, idx) => {
        const previous = records[idx - 1];
        if (previous && record.date <= previous.date) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [idx, "date"],
            message: `${record.date} does not follow ${previous.date}`,
          });
        }
      });
    }),
  isAdjusted: z.boolean().optional(),
  sourceName: z.string().optional(),
  fetchedAt: z.string().optional(),
});

const CompositionSchema = z.object({
  sectors: z.record(z.number()),
  topHoldings: z.array(
    z.object({
      symbol: z.string().optional(),
      name: z.string(),
      weight: z.number(),
    })
  ),
  dataSource: z.string().nullable(),
});

type Envelope = z.infer<typeof EnvelopeSchema>;

function decodeSeries(envelope: Envelope): PriceSeries {
  const parsed = StoredSeriesSchema.safeParse(envelope.data);
  if (!parsed.success) {
    throw new DataCorruptError(`invalid series: ${parsed.error.message}`);
  }
  const stored = parsed.data;
  return createPriceSeries({
    identifier: stored.identifier,
    symbol: stored.symbol,
    records: stored.records,
    isAdjusted: stored.isAdjusted ?? isAdjustedVendor(envelope.source),
    sourceName: stored.sourceName ?? envelope.source,
    fetchedAt: stored.fetchedAt ?? envelope.timestamp,
  });
}

const decoders: { [K in CacheKind]: (envelope: Envelope) => CachePayloads[K] } = {
  historical: decodeSeries,
  benchmark: decodeSeries,
  description: (envelope) => {
    if (typeof envelope.data !== "string") {
      throw new DataCorruptError("description is not a string");
    }
    return envelope.data;
  },
  composition: (envelope) => {
    const parsed = CompositionSchema.safeParse(envelope.data);
    if (!parsed.success) {
      throw new DataCorruptError(`invalid composition: ${parsed.error.message}`);
    }
    return parsed.data;
  },
};

/**
 * TTL-based cache of fetched payloads. Any entry that cannot be read back is
 * treated as a miss; get never throws.
 */
export class CacheManager {
  constructor(
    private readonly store: CacheStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async get<K extends CacheKind>(
    identifier: string,
    kind: K
  ): Promise<CacheEntry<CachePayloads[K]> | null> {
    const entry = await this.peek(identifier, kind);
    if (!entry) return null;
    return this.isExpired(kind, entry.timestamp) ? null : entry;
  }

  /**
   * Reads an entry whatever its age.
   */
  async peek<K extends CacheKind>(
    identifier: string,
    kind: K
  ): Promise<CacheEntry<CachePayloads[K]> | null> {
    try {
      const raw = await this.store.read({ identifier, kind });
      if (raw === null) return null;
      const envelope = this.parseEnvelope(raw);
      return {
        data: decoders[kind](envelope),
        timestamp: envelope.timestamp,
        source: envelope.source,
        validation: envelope.validation,
      };
    } catch (error) {
      console.warn(
        `Cache entry ${identifier}_${kind} unreadable, ignoring: ${errorMessage(error)}`
      );
      return null;
    }
  }

  async put<K extends CacheKind>(
    identifier: string,
    kind: K,
    data: CachePayloads[K],
    source: string,
    validation?: ValidationReport
  ): Promise<void> {
    const entry: CacheEntry<CachePayloads[K]> = {
      data,
      timestamp: this.now().toISOString(),
      source,
      validation,
    };
    await this.store.write({ identifier, kind }, JSON.stringify(entry, null, 2));
  }

  async remove(identifier: string, kind: CacheKind): Promise<void> {
    await this.store.remove({ identifier, kind });
  }

  async list(): Promise<CacheListing[]> {
    const keys = await this.store.list();
    const listings: CacheListing[] = [];

    for (const key of keys) {
      try {
        const raw = await this.store.read(key);
        if (raw === null) continue;
        const envelope = this.parseEnvelope(raw);
        listings.push({
          ...key,
          source: envelope.source,
          timestamp: envelope.timestamp,
          ageMs: this.ageMs(envelope.timestamp),
          expired: this.isExpired(key.kind, envelope.timestamp),
        });
      } catch (error) {
        console.warn(
          `Skipping unreadable cache entry ${key.identifier}_${key.kind}: ${errorMessage(error)}`
        );
      }
    }

    return listings.sort(
      (a, b) =>
        a.identifier.localeCompare(b.identifier) || a.kind.localeCompare(b.kind)
    );
  }

  ageMs(timestamp: string): number {
    return differenceInMilliseconds(this.now(), parseISO(timestamp));
  }

  private parseEnvelope(raw: string): Envelope {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new DataCorruptError("not valid JSON", { cause: error });
    }
    const parsed = EnvelopeSchema.safeParse(json);
    if (!parsed.success) {
      throw new DataCorruptError(`invalid entry: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private isExpired(kind: CacheKind, timestamp: string): boolean {
    return this.ageMs(timestamp) > CACHE_TTL_MS[kind];
  }
}
