import { Command, Option } from "clipanion";
import { parseIdentifier } from "../../services/identifier.ts";
import { createFundLens } from "../context.ts";
import { formatAge, formatValidation } from "../format.ts";

export class InfoCommand extends Command {
  static override paths = [["info"]];

  static override usage = Command.Usage({
    description: "Show what is cached for an instrument",
    details: `
      Displays the cached history for an identifier: date range, record count,
      source, whether prices are adjusted, the age of the entry and the result
      of each validation check.

      Nothing is fetched; run \`fundlens fetch\` first.
    `,
    examples: [["Show info for a fund", "fundlens info US87281Y1029"]],
  });

  identifier = Option.String({ required: true });

  configPath = Option.String("--config", {
    description: "Path to a YAML config file",
  });

  async execute(): Promise<number> {
    const lens = createFundLens(this.configPath);
    const { identifier } = parseIdentifier(this.identifier);

    try {
      const entry = await lens.cache.peek(identifier, "historical");
      if (!entry) {
        console.log(`No cached data for ${identifier}`);
        return 1;
      }

      const { records } = entry.data;
      const ageMs = lens.cache.ageMs(entry.timestamp);

      console.log(`Identifier: ${identifier}`);
      if (entry.data.symbol) console.log(`Symbol: ${entry.data.symbol}`);
      console.log(`Source: ${entry.source}`);
      console.log(`Adjusted: ${entry.data.isAdjusted ? "yes" : "no"}`);
      console.log(`Records: ${records.length}`);
      console.log(`First date: ${records[0]?.date ?? "N/A"}`);
      console.log(`Last date: ${records[records.length - 1]?.date ?? "N/A"}`);
      console.log(`Cached: ${entry.timestamp} (${formatAge(ageMs)} ago)`);

      const distributions = records.filter(
        (r) => r.dividend > 0 || r.capitalGain > 0
      ).length;
      if (distributions > 0) {
        console.log(`Distribution days: ${distributions}`);
      }

      if (entry.validation) {
        console.log(`\nValidation: ${entry.validation.valid ? "passed" : "failed"}`);
        formatValidation(entry.validation).forEach((line) => console.log(line));
      }

      const description = await lens.cache.peek(identifier, "description");
      if (description) {
        console.log(`\n${description.data}\n(${description.source})`);
      }
      return 0;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      console.error(`Failed to get info: ${errorMessage}`);
      return 1;
    }
  }
}
