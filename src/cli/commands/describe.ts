import { Command, Option } from "clipanion";
import { createFundLens } from "../context.ts";

export class DescribeCommand extends Command {
  static override paths = [["describe"]];

  static override usage = Command.Usage({
    description: "Show the description and composition of an instrument",
    details: `
      Looks up a free-text description (Yahoo asset profile, then Alpha
      Vantage or FMP when keyed, then Wikipedia) and, for funds, the top
      holdings and sector weightings. Both are cached.
    `,
    examples: [["Describe a fund", "fundlens describe VFIAX"]],
  });

  identifier = Option.String({ required: true });

  configPath = Option.String("--config", {
    description: "Path to a YAML config file",
  });

  async execute(): Promise<number> {
    const lens = createFundLens(this.configPath);

    try {
      const instrument = await lens.resolveInstrument(this.identifier);
      console.log(`${instrument.identifier}${instrument.name ? ` - ${instrument.name}` : ""}`);
      if (instrument.ticker && instrument.ticker !== instrument.identifier) {
        console.log(`Ticker: ${instrument.ticker}`);
      }

      const description = await lens.getDescription(this.identifier);
      console.log(
        description
          ? `\n${description.description}\n(${description.source})`
          : "\nNo description available"
      );

      const composition = await lens.getComposition(this.identifier);
      const sectors = Object.entries(composition.sectors).sort((a, b) => b[1] - a[1]);
      if (sectors.length > 0) {
        console.log("\nSectors:");
        for (const [sector, weight] of sectors) {
          console.log(`  ${sector.padEnd(24)} ${weight.toFixed(2).padStart(6)}%`);
        }
      }
      if (composition.topHoldings.length > 0) {
        console.log("\nTop holdings:");
        for (const holding of composition.topHoldings) {
          const label = holding.symbol ? `${holding.name} (${holding.symbol})` : holding.name;
          console.log(`  ${label.padEnd(40)} ${holding.weight.toFixed(2).padStart(6)}%`);
        }
      }
      return 0;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      console.error(`Failed to describe ${this.identifier}: ${errorMessage}`);
      return 1;
    }
  }
}
