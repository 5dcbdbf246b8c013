import { Command, Option } from "clipanion";
import { accessSync, constants, mkdirSync } from "node:fs";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import type { DatawiseConfig } from "../../config/types.js";
import { createInferenceClient } from "../../inference/client.js";
import { createSilentLogger } from "../../logging/logger.js";
import { errorText } from "./shared.js";

export class DoctorCommand extends Command {
  static override paths = [["doctor"]];

  static override usage = Command.Usage({
    description:
      "Run diagnostic checks on the Datawise configuration and environment",
    examples: [["Run diagnostics", "datawise doctor"]],
  });

  configFile = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    const out = this.context.stdout;
    out.write("Datawise Doctor\n");
    out.write("===============\n\n");

    let allPassed = true;
    const pass = (line: string): void => {
      out.write(`[PASS] ${line}\n`);
    };
    const fail = (line: string): void => {
      out.write(`[FAIL] ${line}\n`);
      allPassed = false;
    };

    // Check 1: Config valid
    const configPath = this.configFile ?? getConfigPath();
    let config: DatawiseConfig | null = null;
    try {
      config = loadConfig(configPath);
      pass(`Config valid (${configPath})`);
    } catch (err) {
      fail(`Config invalid (${configPath}): ${errorText(err)}`);
    }

    // Check 2: State dir exists and writable
    const stateDir = getStateDir();
    try {
      mkdirSync(stateDir, { recursive: true });
      accessSync(stateDir, constants.W_OK);
      pass(`State dir writable (${stateDir})`);
    } catch (err) {
      fail(`State dir not writable (${stateDir}): ${errorText(err)}`);
    }

    if (config) {
      // Check 3: Telegram token
      if (config.telegram.token) pass("Telegram token configured");
      else fail("Telegram token not configured (telegram.token)");

      // Check 4: Ollama reachable over either transport
      const client = createInferenceClient(config.ollama, config.cleaning.model, createSilentLogger());
      if (await client.isAvailable()) {
        pass(`Ollama reachable (via ${client.getPreferredTransport()})`);
      } else {
        fail(`Ollama not reachable (${config.ollama.baseUrl}, '${config.ollama.binary} list')`);
      }
    }

    out.write("\n");
    out.write(allPassed ? "All checks passed.\n" : "Some checks failed.\n");
    return allPassed ? 0 : 1;
  }
}
