import { Command, Option } from "clipanion";
import { loadConfig, parseConfigText, readConfigFile } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { DatawiseConfig } from "../../config/types.js";
import { errorText } from "./shared.js";

export const REDACTED = "***REDACTED***";

export function redactConfig(config: DatawiseConfig): DatawiseConfig {
  if (!config.telegram.token) return config;
  return { ...config, telegram: { ...config.telegram, token: REDACTED } };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show current configuration (tokens redacted)",
    examples: [["Show config", "datawise config show"]],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    let config: DatawiseConfig;
    try {
      config = loadConfig(this.configFile);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorText(err)}\n`);
      return 1;
    }
    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
    return 0;
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "datawise config validate"],
      ["Validate specific file", "datawise config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    const content = readConfigFile(configPath);
    if (content === null) {
      this.context.stdout.write(`Config file not found: ${configPath}\n`);
      return 1;
    }

    try {
      parseConfigText(content);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` + `  ${errorText(err)}\n`,
      );
      return 1;
    }
  }
}
