import { Command, Option } from "clipanion";
import { phaseName } from "../../phases/definitions.js";
import { STREAM_KINDS, isStreamKind } from "../../streams/index.js";
import { openRuntime } from "../runtime.js";

export class HistoryCommand extends Command {
  static override paths = [["history"]];

  static override usage = Command.Usage({
    description: "List stored verdicts for a technology, newest first",
    examples: [
      ["All streams", "phasewatch history solid-state-batteries"],
      ["Patents only", "phasewatch history solid-state-batteries --stream patent"],
    ],
  });

  technology = Option.String({ required: true });
  stream = Option.String("--stream", { description: "Only this stream" });

  async execute(): Promise<number> {
    const stream = this.stream;
    if (stream !== undefined && !isStreamKind(stream)) {
      this.context.stdout.write(`Unknown stream "${stream}". Expected one of: ${STREAM_KINDS.join(", ")}\n`);
      return 1;
    }

    const runtime = openRuntime();
    try {
      const entries = runtime.analyses.history(this.technology, stream);
      if (entries.length === 0) {
        this.context.stdout.write(`No analyses stored for ${this.technology}\n`);
        return 0;
      }
      for (const entry of entries) {
        this.context.stdout.write(
          `${entry.analyzedAt}  ${entry.stream.padEnd(7)}  ${phaseName(entry.phase)} (${entry.confidence.toFixed(2)})  ${entry.recordsAnalyzed} records\n`,
        );
      }
      return 0;
    } finally {
      runtime.db.close();
    }
  }
}
