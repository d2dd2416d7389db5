export const VENDORS = {
  eodhd: "EOD Historical Data",
  fmp: "Financial Modeling Prep",
  alphaVantage: "Alpha Vantage",
  yahoo: "Yahoo Finance",
  morningstar: "Morningstar",
  finanzen: "finanzen.net",
  justEtf: "JustETF",
  csv: "CSV import",
} as const;

// Vendors whose price field is always total-return adjusted
export const ADJUSTED_VENDORS: readonly string[] = [
  VENDORS.eodhd,
  VENDORS.fmp,
  VENDORS.alphaVantage,
];

export function isAdjustedVendor(sourceName: string): boolean {
  return ADJUSTED_VENDORS.some((vendor) => sourceName.includes(vendor));
}
