import type { BenchmarkDefinition, Config, Instrument } from "../types/index.ts";

export const EUROPEAN_COUNTRY_CODES: readonly string[] = [
  "LU",
  "IE",
  "FR",
  "DE",
  "IT",
  "ES",
  "NL",
  "GB",
  "BE",
  "AT",
  "CH",
  "SE",
  "NO",
  "DK",
  "FI",
];

/**
 * Domestic benchmark for home-market identifiers, the regional one for
 * European ISINs, and the domestic one whenever the origin is unclear.
 */
export function selectBenchmark(
  instrument: Pick<Instrument, "countryCode">,
  benchmarks: Config["benchmarks"]
): BenchmarkDefinition {
  const country = instrument.countryCode;
  if (country !== undefined && EUROPEAN_COUNTRY_CODES.includes(country)) {
    return benchmarks.regional;
  }
  return benchmarks.domestic;
}
