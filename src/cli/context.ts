import { isValid, parseISO } from "date-fns";
import { FundLens } from "../index.ts";
import { loadConfig } from "../config.ts";
import { ConfigError } from "../errors.ts";

export function createFundLens(configPath?: string): FundLens {
  return new FundLens(loadConfig(configPath));
}

export function parseDateOption(
  value: string | undefined,
  flag: string
): string | undefined {
  if (value === undefined) return undefined;
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || !isValid(parseISO(value))) {
    throw new ConfigError(`${flag} must be a date in YYYY-MM-DD format, got "${value}"`);
  }
  return value;
}
