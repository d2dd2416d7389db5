import { Command, Option } from "clipanion";
import { createFundLens } from "../context.ts";
import { formatAge } from "../format.ts";

export class ListCommand extends Command {
  static override paths = [["list"]];

  static override usage = Command.Usage({
    description: "List all cache entries",
    details: `
      Lists every entry in the cache directory with its kind, age and the
      source that produced it. Expired entries are marked; they are refetched
      on next use.
    `,
    examples: [["List cache entries", "fundlens list"]],
  });

  configPath = Option.String("--config", {
    description: "Path to a YAML config file",
  });

  async execute(): Promise<number> {
    const lens = createFundLens(this.configPath);

    try {
      const entries = await lens.cache.list();

      if (entries.length === 0) {
        console.log("No entries found in the cache");
        return 0;
      }

      console.log(`Found ${entries.length} entr${entries.length === 1 ? "y" : "ies"}:\n`);
      for (const entry of entries) {
        console.log(
          `${entry.identifier.padEnd(14)} ${entry.kind.padEnd(12)} ` +
            `${formatAge(entry.ageMs).padStart(5)} ${entry.source}` +
            (entry.expired ? " (expired)" : "")
        );
      }
      return 0;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      console.error(`Failed to list cache: ${errorMessage}`);
      return 1;
    }
  }
}
