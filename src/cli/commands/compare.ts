import { Command, Option } from 'clipanion';
import * as t from 'typanion';
import { createFundLens, parseDateOption } from '../context.ts';
import { formatComparisonCsv, formatMetricsTable } from '../format.ts';

export class CompareCommand extends Command {
  static override paths = [['compare']];

  static override usage = Command.Usage({
    description: 'Compare instruments on a total-return basis',
    details: `
      Fetches (or reads from the cache) each instrument, computes its total
      return and re-bases all of them to the base value on a common start
      date: the latest first-available date unless --start is given.

      Prints performance metrics and beta against the matching benchmark,
      or the aligned series as CSV, or the whole report as JSON.
    `,
    examples: [
      ['Compare two funds and an ETF', 'fundlens compare PRHSX LU0097089360 SPY'],
      ['From a fixed date, as CSV', 'fundlens compare VFIAX IE00BKSBD728 --start 2021-01-04 --format csv'],
    ],
  });

  identifiers = Option.Rest({ required: 1 });

  start = Option.String('--start', {
    description: 'Common start date (YYYY-MM-DD)',
  });

  years = Option.String('--years', {
    description: 'Years of history',
    validator: t.isNumber(),
  });

  format = Option.String('--format', 'table', {
    description: 'Output format (table/csv/json)',
    validator: t.isEnum(['table', 'csv', 'json']),
  });

  force = Option.Boolean('--force', false, {
    description: 'Ignore cached data',
  });

  configPath = Option.String('--config', {
    description: 'Path to a YAML config file',
  });

  async execute(): Promise<number> {
    try {
      const startDate = parseDateOption(this.start, '--start');
      const lens = createFundLens(this.configPath);
      const report = await lens.compare(this.identifiers, {
        startDate,
        years: this.years,
        force: this.force,
      });

      if (!report.table) {
        console.error('No data for any of the requested instruments');
        return 1;
      }

      switch (this.format) {
        case 'json':
          this.context.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
          break;
        case 'csv':
          this.context.stdout.write(`${formatComparisonCsv(report.table)}\n`);
          break;
        case 'table':
          console.log(`\nCommon start date: ${report.table.commonStartDate} (base ${report.table.baseValue})\n`);
          console.log(formatMetricsTable(report));
          break;
      }

      if (report.missing.length > 0) {
        console.error(`\nNo data for: ${report.missing.join(', ')}`);
      }
      return 0;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`Comparison failed: ${errorMessage}`);
      return 1;
    }
  }
}
