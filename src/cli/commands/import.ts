import { Command, Option } from 'clipanion';
import { readFileSync } from 'fs';
import { createFundLens } from '../context.ts';
import { formatValidation } from '../format.ts';

export class ImportCommand extends Command {
  static override paths = [['import']];

  static override usage = Command.Usage({
    description: 'Import a price history from a CSV file',
    details: `
      Reads a CSV with a Date column and a Close (or Adj Close, Price, NAV)
      column, plus optional Dividends and Capital Gains columns, and stores it
      as the cached history of the identifier.

      An Adj Close column, or --adjusted, marks the prices as already
      including reinvested distributions.
    `,
    examples: [
      ['Import raw closes with dividends', '$0 import LU0097089360 data/lu0097089360.csv'],
      ['Import adjusted prices', '$0 import VFIAX data/vfiax.csv --adjusted'],
    ],
  });

  identifier = Option.String({ required: true });
  csvPath = Option.String({ required: true });

  adjusted = Option.Boolean('--adjusted', false, {
    description: 'Prices already include reinvested distributions',
  });

  configPath = Option.String('--config', {
    description: 'Path to a YAML config file',
  });

  async execute(): Promise<number> {
    try {
      console.log(`Reading CSV from ${this.csvPath}...`);
      const content = readFileSync(this.csvPath, 'utf-8');

      const lens = createFundLens(this.configPath);
      const { series, validation } = await lens.importCsv(this.identifier, content, {
        adjusted: this.adjusted,
      });

      console.log(
        `Imported ${series.records.length} records for ${series.identifier} ` +
          `(${series.isAdjusted ? 'adjusted' : 'raw'})`
      );
      formatValidation(validation).forEach((line) => console.log(line));
      return 0;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`Import failed: ${errorMessage}`);
      return 1;
    }
  }
}
