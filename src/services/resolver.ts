import type {
  DateRange,
  Instrument,
  RawHistory,
  ResolvedHistory,
} from "../types/index.ts";
import { errorMessage } from "../errors.ts";
import { normalizeQuotes } from "./adjustment.ts";

// A history needs more than this many usable records to be accepted
export const MIN_RECORDS = 10;

export type SourceCapability = "total-return-api" | "market-data" | "web-scrape";

export interface PriceSource {
  readonly name: string;
  readonly capability: SourceCapability;
  fetch(instrument: Instrument, range: DateRange): Promise<RawHistory | null>;
}

/**
 * Tries each source in priority order and returns the first usable history,
 * tagged with the source that produced it. A source failing is logged and
 * skipped; when every source is exhausted the result is null, never an error.
 */
export class SourceResolver {
  constructor(
    private readonly sources: PriceSource[],
    private readonly minRecords: number = MIN_RECORDS
  ) {}

  get sourceNames(): string[] {
    return this.sources.map((s) => s.name);
  }

  async resolve(
    instrument: Instrument,
    range: DateRange
  ): Promise<ResolvedHistory | null> {
    for (const source of this.sources) {
      try {
        const history = await source.fetch(instrument, range);
        if (!history) continue;

        const usable = normalizeQuotes(history.quotes).length;
        if (usable <= this.minRecords) {
          console.log(
            `  ${source.name}: only ${usable} records for ${instrument.identifier}, skipping`
          );
          continue;
        }

        console.log(
          `  ✓ ${instrument.identifier}: ${usable} records from ${source.name} (${history.symbol})`
        );
        return { ...history, sourceName: source.name };
      } catch (error) {
        console.warn(
          `  ${source.name} failed for ${instrument.identifier}: ${errorMessage(error)}`
        );
      }
    }

    console.warn(`No data found for ${instrument.identifier} from any source`);
    return null;
  }
}
