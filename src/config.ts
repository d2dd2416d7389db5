import { readFileSync, existsSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import yaml from "yaml";
import dotenv from "dotenv";
import { z } from "zod";
import type { Config } from "./types/index.ts";

// Load environment variables
dotenv.config();

export const DEFAULT_CONFIG_PATH = join(homedir(), ".fundlens", "config.yml");
const DEFAULT_CACHE_DIR = join(process.cwd(), "cache");

// Exchange suffixes tried after a direct ticker lookup, in order
export const DEFAULT_EXCHANGE_SUFFIXES = [
  "L",
  "PA",
  "DE",
  "MI",
  "AS",
  "SW",
  "BR",
  "VI",
  "LN",
  "LS",
];

const ApiKeySchema = z.object({ apiKey: z.string().optional() }).partial();

const FileConfigSchema = z
  .object({
    sources: z
      .object({
        eodhd: ApiKeySchema,
        fmp: ApiKeySchema,
        alphaVantage: ApiKeySchema,
        openFigi: ApiKeySchema.extend({ enabled: z.boolean().optional() }),
        yahoo: z.object({ enabled: z.boolean() }).partial(),
        scrapers: z.object({ enabled: z.boolean() }).partial(),
        rateLimitMs: z.number().nonnegative(),
        exchangeSuffixes: z.array(z.string()),
        prefixSuffixes: z.record(z.string()),
      })
      .partial(),
    storage: z.object({ cacheDir: z.string() }).partial(),
    analysis: z
      .object({
        years: z.number().positive(),
        baseValue: z.number().positive(),
        homeMarket: z.string().length(2),
        exDistributionThreshold: z.number().max(0),
      })
      .partial(),
    benchmarks: z
      .object({
        domestic: z.object({ ticker: z.string(), name: z.string() }),
        regional: z.object({ ticker: z.string(), name: z.string() }),
      })
      .partial(),
    tickers: z.record(z.string()),
    http: z.object({ timeoutMs: z.number().positive() }).partial(),
  })
  .partial();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export type ConfigOverrides = {
  [K in Exclude<keyof Config, "tickers">]?: Partial<Config[K]>;
} & { tickers?: Record<string, string> };

function readFileConfig(path: string): FileConfig {
  if (!existsSync(path)) return {};

  try {
    const fileContent = readFileSync(path, "utf-8");
    const parsed = FileConfigSchema.safeParse(yaml.parse(fileContent) ?? {});
    if (!parsed.success) {
      console.warn(
        `Ignoring config at ${path}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} ${issue.message}`)
          .join("; ")}`
      );
      return {};
    }
    return parsed.data;
  } catch (error) {
    console.warn(`Failed to load config from ${path}:`, error);
    return {};
  }
}

function apiKeySection(...candidates: Array<string | undefined>) {
  const apiKey = candidates.find((value) => value !== undefined && value !== "");
  return apiKey ? { apiKey } : undefined;
}

/**
 * Builds the configuration once at start-up. Priority: explicit overrides,
 * environment, YAML file, defaults. The result is passed by reference into
 * the components that need it.
 */
export function loadConfig(
  configPath?: string,
  overrides?: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const path = configPath || DEFAULT_CONFIG_PATH;
  const fileConfig = readFileConfig(path);
  const fileSources = fileConfig.sources ?? {};

  const openFigiKey =
    overrides?.sources?.openFigi?.apiKey ||
    env.OPENFIGI_API_KEY ||
    fileSources.openFigi?.apiKey ||
    "";

  return {
    sources: {
      eodhd:
        overrides?.sources?.eodhd ??
        apiKeySection(env.EODHD_API_KEY, fileSources.eodhd?.apiKey),
      fmp:
        overrides?.sources?.fmp ??
        apiKeySection(env.FMP_API_KEY, fileSources.fmp?.apiKey),
      alphaVantage:
        overrides?.sources?.alphaVantage ??
        apiKeySection(env.ALPHA_VANTAGE_API_KEY, fileSources.alphaVantage?.apiKey),
      openFigi: {
        apiKey: openFigiKey,
        enabled:
          overrides?.sources?.openFigi?.enabled ??
          fileSources.openFigi?.enabled ??
          true,
      },
      yahoo: {
        enabled:
          overrides?.sources?.yahoo?.enabled ??
          fileSources.yahoo?.enabled ??
          true,
      },
      scrapers: {
        enabled:
          overrides?.sources?.scrapers?.enabled ??
          fileSources.scrapers?.enabled ??
          true,
      },
      rateLimitMs:
        overrides?.sources?.rateLimitMs ?? fileSources.rateLimitMs ?? 1000,
      exchangeSuffixes:
        overrides?.sources?.exchangeSuffixes ??
        fileSources.exchangeSuffixes ??
        DEFAULT_EXCHANGE_SUFFIXES,
      prefixSuffixes: overrides?.sources?.prefixSuffixes ??
        fileSources.prefixSuffixes ?? { IE: "IR" },
    },
    storage: {
      cacheDir:
        overrides?.storage?.cacheDir ||
        env.FUNDLENS_CACHE_DIR ||
        fileConfig.storage?.cacheDir ||
        DEFAULT_CACHE_DIR,
    },
    analysis: {
      years: overrides?.analysis?.years ?? fileConfig.analysis?.years ?? 5,
      baseValue:
        overrides?.analysis?.baseValue ?? fileConfig.analysis?.baseValue ?? 100,
      homeMarket:
        overrides?.analysis?.homeMarket ??
        fileConfig.analysis?.homeMarket ??
        "US",
      exDistributionThreshold:
        overrides?.analysis?.exDistributionThreshold ??
        fileConfig.analysis?.exDistributionThreshold ??
        -0.01,
    },
    benchmarks: {
      domestic: overrides?.benchmarks?.domestic ??
        fileConfig.benchmarks?.domestic ?? { ticker: "SPY", name: "S&P 500" },
      regional: overrides?.benchmarks?.regional ??
        fileConfig.benchmarks?.regional ?? {
          ticker: "EZU",
          name: "MSCI EMU",
        },
    },
    tickers: {
      ...(fileConfig.tickers ?? {}),
      ...(overrides?.tickers ?? {}),
    },
    http: {
      timeoutMs:
        overrides?.http?.timeoutMs ?? fileConfig.http?.timeoutMs ?? 15000,
    },
  };
}
