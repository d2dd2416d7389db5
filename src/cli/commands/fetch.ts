import { Command, Option } from 'clipanion';
import * as t from 'typanion';
import { createFundLens } from '../context.ts';
import { formatValidation } from '../format.ts';

export class FetchCommand extends Command {
  static override paths = [['fetch']];

  static override usage = Command.Usage({
    description: 'Fetch price history for one or more instruments',
    details: `
      Resolves each identifier (ISIN or ticker) against the configured sources
      in priority order, classifies the prices as adjusted or raw, validates the
      series and stores it in the cache.

      Fresh cache entries are reused unless --force is given.
    `,
    examples: [
      ['Fetch a fund by ISIN', 'fundlens fetch LU0097089360'],
      ['Fetch several instruments, 10 years', 'fundlens fetch VFIAX IE00BKSBD728 --years 10'],
      ['Ignore the cache', 'fundlens fetch PRHSX --force'],
    ],
  });

  identifiers = Option.Rest({ required: 1 });

  years = Option.String('--years', {
    description: 'Years of history to fetch',
    validator: t.isNumber(),
  });

  force = Option.Boolean('--force', false, {
    description: 'Fetch even if a fresh cache entry exists',
  });

  configPath = Option.String('--config', {
    description: 'Path to a YAML config file',
  });

  async execute(): Promise<number> {
    const lens = createFundLens(this.configPath);
    let failures = 0;

    for (const identifier of this.identifiers) {
      try {
        const result = await lens.getHistory(identifier, {
          years: this.years,
          force: this.force,
        });

        if (!result) {
          console.log(`${identifier}: No data available from any source`);
          failures++;
          continue;
        }

        const { series } = result;
        const first = series.records[0];
        const last = series.records[series.records.length - 1];
        console.log(
          `${result.instrument.identifier}: ${series.records.length} records, ` +
            `${first?.date ?? 'N/A'} to ${last?.date ?? 'N/A'} ` +
            `(${series.sourceName}, ${series.isAdjusted ? 'adjusted' : 'raw'}` +
            `${result.fromCache ? ', cached' : ''})`
        );
        if (result.validation) {
          formatValidation(result.validation).forEach((line) => console.log(line));
        }
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        console.error(`${identifier}: Failed - ${errorMessage}`);
        failures++;
      }
    }

    return failures > 0 ? 1 : 0;
  }
}
