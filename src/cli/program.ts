import { Builtins, Cli } from "clipanion";
import { AnalyzeCommand } from "./commands/analyze.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { HistoryCommand } from "./commands/history.js";
import { ImportCommand } from "./commands/import.js";
import { PhasesCommand } from "./commands/phases.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Phasewatch",
    binaryName: "phasewatch",
    binaryVersion: "0.1.0",
  });

  // Data
  cli.register(ImportCommand);
  cli.register(AnalyzeCommand);
  cli.register(HistoryCommand);

  // Reference
  cli.register(PhasesCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
