import { Command, Option } from "clipanion";
import { parseValidationConfig, validateTable } from "../../cleaning/validation.js";
import { readTable } from "../../table/read.js";
import { readInputFile, readJsonFile, writeFailure } from "./shared.js";

export class ValidateCommand extends Command {
  static override paths = [["validate"]];

  static override usage = Command.Usage({
    description: "Check a data file against a column schema",
    examples: [
      ["Validate a CSV file", "datawise validate ./sales.csv --schema ./schema.json"],
    ],
  });

  file = Option.String({ name: "file" });

  schema = Option.String("--schema,-s", {
    description: "JSON validation config",
    required: true,
  });

  async execute(): Promise<number> {
    try {
      const config = parseValidationConfig(readJsonFile(this.schema));
      const input = readInputFile(this.file);
      const errors = validateTable(readTable(input.data, input.filename), config);
      if (errors.length === 0) {
        this.context.stdout.write(`Data is valid: ${input.filename}\n`);
        return 0;
      }
      this.context.stdout.write(`Data is INVALID: ${input.filename}\n`);
      for (const error of errors) {
        this.context.stdout.write(`  - ${error}\n`);
      }
      return 1;
    } catch (err) {
      writeFailure(this.context.stdout, err);
      return 1;
    }
  }
}
