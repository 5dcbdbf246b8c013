import { Command, Option } from "clipanion";
import { startApp } from "../../app/lifecycle.js";
import { printBanner } from "../banner.js";
import { VERSION } from "../version.js";

export class RunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the Datawise Telegram bot",
    examples: [
      ["Start with default config", "datawise run"],
      ["Start with custom config", "datawise run --config ./my-config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    printBanner(VERSION);

    let signal: AbortSignal;
    try {
      signal = (await startApp(this.config)).abortController.signal;
    } catch (err) {
      console.error("Failed to start Datawise:", err);
      return 1;
    }
    // Runs until a shutdown signal aborts the app
    await new Promise<void>((resolve) => {
      signal.addEventListener("abort", () => resolve(), { once: true });
    });
    return 0;
  }
}
