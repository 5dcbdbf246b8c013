import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { profile } from "../../profiler/profiler.js";
import { formatProfile } from "../../profiler/format.js";
import { readTable } from "../../table/read.js";
import { readInputFile, writeFailure } from "./shared.js";

export class ProfileCommand extends Command {
  static override paths = [["profile"]];

  static override usage = Command.Usage({
    description: "Print a statistical summary of a data file",
    examples: [["Profile a CSV file", "datawise profile ./sales.csv"]],
  });

  file = Option.String({ name: "file" });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    try {
      const { cleaning } = loadConfig(this.config);
      const input = readInputFile(this.file);
      const table = readTable(input.data, input.filename);
      const summary = profile(table, {
        maxRows: cleaning.maxRows,
        maxColumns: cleaning.maxColumns,
      });
      this.context.stdout.write(`${formatProfile(summary)}\n`);
      return 0;
    } catch (err) {
      writeFailure(this.context.stdout, err);
      return 1;
    }
  }
}
