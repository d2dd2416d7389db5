import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { RawQuote } from "../types/index.ts";
import { DataCorruptError } from "../errors.ts";

const DATE_COLUMNS = ["date"];
const ADJUSTED_PRICE_COLUMNS = ["adj close", "adjclose", "adjusted_close"];
const PRICE_COLUMNS = ["close", "price", "nav"];
const DIVIDEND_COLUMNS = ["dividends", "dividend"];
const CAPITAL_GAIN_COLUMNS = ["capital gains", "capital_gains", "capitalgain", "capital gain"];

const RowsSchema = z.array(z.record(z.string()));

function findColumn(headers: string[], candidates: string[]): string | undefined {
  const lower = new Map(headers.map((h) => [h.trim().toLowerCase(), h]));
  for (const candidate of candidates) {
    const match = lower.get(candidate.toLowerCase());
    if (match !== undefined) return match;
  }
  return undefined;
}

function toNumber(value: string | undefined): number {
  if (value === undefined || value.trim() === "") return 0;
  const parsed = Number(value.replace(/,/g, ""));
  return Number.isFinite(parsed) ? parsed : 0;
}

export interface CsvHistory {
  quotes: RawQuote[];
  adjusted: boolean; // read from an adjusted-close column
}

/**
 * Reads a daily history from CSV. Needs a date column and a price column,
 * an adjusted close winning over a raw one; distribution columns are optional.
 */
export function parsePriceCsv(content: string): CsvHistory {
  const parsed = RowsSchema.safeParse(
    parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
    })
  );
  if (!parsed.success) {
    throw new DataCorruptError("CSV rows could not be read");
  }
  const rows = parsed.data;

  const headers = Object.keys(rows[0] ?? {});
  const dateColumn = findColumn(headers, DATE_COLUMNS);
  const adjustedColumn = findColumn(headers, ADJUSTED_PRICE_COLUMNS);
  const priceColumn = adjustedColumn ?? findColumn(headers, PRICE_COLUMNS);
  if (!dateColumn || !priceColumn) {
    throw new DataCorruptError(
      `CSV needs a date and a price column, found: ${headers.join(", ") || "none"}`
    );
  }
  const dividendColumn = findColumn(headers, DIVIDEND_COLUMNS);
  const capitalGainColumn = findColumn(headers, CAPITAL_GAIN_COLUMNS);

  const quotes = rows.flatMap((row) => {
    const date = row[dateColumn]?.slice(0, 10);
    const close = toNumber(row[priceColumn]);
    if (!date || !/^\d{4}-\d{2}-\d{2}$/.test(date) || close <= 0) return [];
    return [
      {
        date,
        close,
        dividend: dividendColumn ? toNumber(row[dividendColumn]) : 0,
        capitalGain: capitalGainColumn ? toNumber(row[capitalGainColumn]) : 0,
      },
    ];
  });

  return { quotes, adjusted: adjustedColumn !== undefined };
}
