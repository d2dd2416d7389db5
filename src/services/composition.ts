import { z } from "zod";
import type { FundComposition, Holding, Instrument } from "../types/index.ts";
import { VENDORS } from "./sources/vendors.ts";
import type { YahooFinanceClient } from "./sources/yahoo.ts";

const RawValueSchema = z.object({ raw: z.number() });

const TopHoldingsSchema = z.object({
  topHoldings: z
    .object({
      holdings: z
        .array(
          z.object({
            symbol: z.string().optional(),
            holdingName: z.string().optional(),
            holdingPercent: RawValueSchema.optional(),
          })
        )
        .optional(),
      sectorWeightings: z.array(z.record(RawValueSchema)).optional(),
    })
    .optional(),
});

const toPercent = (fraction: number) => Math.round(fraction * 10000) / 100;

export function emptyComposition(): FundComposition {
  return { sectors: {}, topHoldings: [], dataSource: null };
}

/**
 * Turns Yahoo's topHoldings module (fractions) into a composition in percent.
 */
export function parseTopHoldings(summary: unknown): FundComposition {
  const parsed = TopHoldingsSchema.safeParse(summary);
  const holdingsModule = parsed.success ? parsed.data.topHoldings : undefined;
  if (!holdingsModule) return emptyComposition();

  const sectors: Record<string, number> = {};
  for (const weighting of holdingsModule.sectorWeightings ?? []) {
    for (const [sector, value] of Object.entries(weighting)) {
      if (value.raw > 0) sectors[sector] = toPercent(value.raw);
    }
  }

  const topHoldings: Holding[] = (holdingsModule.holdings ?? []).flatMap((holding) => {
    const name = holding.holdingName ?? holding.symbol;
    if (!name || !holding.holdingPercent) return [];
    return [
      {
        symbol: holding.symbol,
        name,
        weight: toPercent(holding.holdingPercent.raw),
      },
    ];
  });

  const hasData = Object.keys(sectors).length > 0 || topHoldings.length > 0;
  return { sectors, topHoldings, dataSource: hasData ? VENDORS.yahoo : null };
}

export async function fetchComposition(
  yahoo: YahooFinanceClient,
  instrument: Instrument
): Promise<FundComposition> {
  if (!instrument.ticker) return emptyComposition();
  const summary = await yahoo.fetchQuoteSummary(instrument.ticker, ["topHoldings"]);
  return parseTopHoldings(summary);
}
