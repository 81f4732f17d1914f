import { Command } from "clipanion";
import { PHASE_DEFINITIONS } from "../../phases/definitions.js";
import { PHASES } from "../../phases/types.js";

export class PhasesCommand extends Command {
  static override paths = [["phases"]];

  static override usage = Command.Usage({
    description: "List the lifecycle phases in canonical order",
    examples: [["List phases", "phasewatch phases"]],
  });

  async execute(): Promise<number> {
    PHASES.forEach((phase, index) => {
      const { name, description } = PHASE_DEFINITIONS[phase];
      this.context.stdout.write(`${index + 1}. ${name} (${phase})\n   ${description}\n`);
    });
    return 0;
  }
}
