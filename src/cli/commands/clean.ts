import { Command, Option } from "clipanion";
import { writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { loadConfig } from "../../config/loader.js";
import { DatasetPipeline, cleanedFilename } from "../../cleaning/pipeline.js";
import { parseRuleFile } from "../../cleaning/rules.js";
import { createInferenceClient } from "../../inference/client.js";
import {
  commandLogger,
  readInputFile,
  readJsonFile,
  writeFailure,
} from "./shared.js";

export class CleanCommand extends Command {
  static override paths = [["clean"]];

  static override usage = Command.Usage({
    description: "Clean a local data file and write the result as CSV",
    details: `
      Runs the same pipeline as an upload to the bot: profile, AI advisory,
      duplicate removal and missing-value handling. The cleaned file is
      written next to the input unless \`--output\` is given.
    `,
    examples: [
      ["Clean a CSV file", "datawise clean ./sales.csv"],
      ["Clean without the AI advisory", "datawise clean ./sales.csv --no-ai"],
      ["Apply explicit rules first", "datawise clean ./sales.csv --rules ./rules.json"],
    ],
  });

  file = Option.String({ name: "file" });

  output = Option.String("--output,-o", {
    description: "Where to write the cleaned CSV",
    required: false,
  });

  ai = Option.Boolean("--ai", true, {
    description: "Ask the inference host for a cleaning advisory",
  });

  rules = Option.String("--rules", {
    description: "JSON file of cleaning rules applied before automatic cleaning",
    required: false,
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  verbose = Option.Boolean("--verbose,-v", false, {
    description: "Log pipeline progress",
  });

  async execute(): Promise<number> {
    try {
      const config = loadConfig(this.config);
      const logger = commandLogger(config, this.verbose);
      const input = readInputFile(this.file);
      const rules = this.rules ? parseRuleFile(readJsonFile(this.rules)) : undefined;

      const pipeline = new DatasetPipeline({
        config: config.cleaning,
        generator: this.ai
          ? createInferenceClient(config.ollama, config.cleaning.model, logger)
          : undefined,
        logger,
      });
      const output = await pipeline.process({ ...input, rules });

      const target = this.output ?? join(dirname(this.file), cleanedFilename(this.file));
      writeFileSync(target, output.csv);
      this.context.stdout.write(`${output.report}\n\nCleaned file written to ${target}\n`);
      return 0;
    } catch (err) {
      writeFailure(this.context.stdout, err);
      return 1;
    }
  }
}
