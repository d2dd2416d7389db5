import type { AxiosInstance } from "axios";
import type { Config } from "../../types/index.ts";
import type { PriceSource } from "../resolver.ts";
import type { RateLimiters } from "../rate-limiter.ts";
import { AlphaVantageSource } from "./alphaVantage.ts";
import { EODHistoricalSource } from "./eodHistorical.ts";
import { FinancialModelingPrepSource } from "./fmp.ts";
import { PortalScraperSource, SCRAPER_PROFILES } from "./scrapers.ts";
import { VENDORS } from "./vendors.ts";
import {
  YahooExchangeSuffixSource,
  YahooFinanceClient,
  YahooIdentifierSource,
  YahooNationalSuffixSource,
  YahooTickerSource,
} from "./yahoo.ts";

export { YahooFinanceClient } from "./yahoo.ts";
export { VENDORS, isAdjustedVendor } from "./vendors.ts";

/**
 * Source chain in priority order: keyed total-return APIs, then the Yahoo
 * lookups, then portal scrapers.
 */
export function buildDefaultSources(
  config: Config,
  yahoo: YahooFinanceClient,
  limiters: RateLimiters,
  http?: AxiosInstance
): PriceSource[] {
  const { sources: settings } = config;
  const options = { http, timeoutMs: config.http.timeoutMs };
  const sources: PriceSource[] = [];

  if (settings.eodhd) {
    sources.push(
      new EODHistoricalSource(
        settings.eodhd.apiKey,
        limiters.for(VENDORS.eodhd),
        options
      )
    );
  }
  if (settings.fmp) {
    sources.push(
      new FinancialModelingPrepSource(
        settings.fmp.apiKey,
        limiters.for(VENDORS.fmp),
        options
      )
    );
  }
  if (settings.alphaVantage) {
    sources.push(
      new AlphaVantageSource(
        settings.alphaVantage.apiKey,
        limiters.for(VENDORS.alphaVantage),
        options
      )
    );
  }

  if (settings.yahoo.enabled) {
    sources.push(
      new YahooTickerSource(yahoo),
      new YahooExchangeSuffixSource(yahoo, settings.exchangeSuffixes),
      new YahooIdentifierSource(yahoo),
      new YahooNationalSuffixSource(yahoo, settings.prefixSuffixes)
    );
  }

  if (settings.scrapers.enabled) {
    for (const profile of SCRAPER_PROFILES) {
      sources.push(
        new PortalScraperSource(profile, limiters.for(profile.name), options)
      );
    }
  }

  return sources;
}
