import type { Instrument } from "../types/index.ts";

const ISIN_PATTERN = /^[A-Z]{2}[A-Z0-9]{10,}$/;
// Plain tickers, optionally an index caret or an exchange suffix (VFIAX, ^GSPC, VOD.L)
const TICKER_PATTERN = /^\^?[A-Z]{1,5}(\.[A-Z]{1,3})?$/;

export function isIsin(value: string): boolean {
  return ISIN_PATTERN.test(value);
}

export function isTicker(value: string): boolean {
  return TICKER_PATTERN.test(value);
}

/**
 * Turns a caller-supplied identifier into an Instrument. ISINs and tickers are
 * both accepted; anything else is kept as an opaque identifier and only tried
 * verbatim against the sources.
 */
export function parseIdentifier(
  raw: string,
  tickers: Record<string, string> = {}
): Instrument {
  const identifier = raw.trim().toUpperCase();

  if (isIsin(identifier)) {
    return {
      identifier,
      isin: identifier,
      countryCode: identifier.slice(0, 2),
      ticker: tickers[identifier]?.toUpperCase(),
    };
  }

  if (isTicker(identifier)) {
    return { identifier, ticker: identifier };
  }

  return { identifier };
}
