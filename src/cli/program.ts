import { Cli } from "clipanion";
import { RunCommand } from "./commands/run.js";
import { CleanCommand } from "./commands/clean.js";
import { ProfileCommand } from "./commands/profile.js";
import { ValidateCommand } from "./commands/validate.js";
import { DoctorCommand } from "./commands/doctor.js";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";
import { VERSION } from "./version.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Datawise",
    binaryName: "datawise",
    binaryVersion: VERSION,
  });

  cli.register(RunCommand);

  // Data commands
  cli.register(CleanCommand);
  cli.register(ProfileCommand);
  cli.register(ValidateCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Doctor
  cli.register(DoctorCommand);

  return cli;
}
