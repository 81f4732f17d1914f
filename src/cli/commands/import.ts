import { readFileSync } from "node:fs";
import { Command, Option } from "clipanion";
import { STREAM_KINDS, STREAM_LABELS, isStreamKind } from "../../streams/index.js";
import { errorMessage, openRuntime } from "../runtime.js";

export class ImportCommand extends Command {
  static override paths = [["import"]];

  static override usage = Command.Usage({
    description: "Import a JSON array of records for one technology and stream",
    details: `
      Records are validated against the stream's schema before anything is
      written. Re-importing a record with the same id replaces it.
    `,
    examples: [["Import papers", "phasewatch import solid-state-batteries paper ./papers.json"]],
  });

  technology = Option.String({ required: true });
  stream = Option.String({ required: true });
  file = Option.String({ required: true });

  async execute(): Promise<number> {
    const stream = this.stream;
    if (!isStreamKind(stream)) {
      this.context.stdout.write(`Unknown stream "${stream}". Expected one of: ${STREAM_KINDS.join(", ")}\n`);
      return 1;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.file, "utf-8"));
    } catch (err) {
      this.context.stdout.write(`Failed to read ${this.file}: ${errorMessage(err)}\n`);
      return 1;
    }
    if (!Array.isArray(raw)) {
      this.context.stdout.write(`Expected a JSON array of records in ${this.file}\n`);
      return 1;
    }

    const runtime = openRuntime();
    try {
      const { imported } = runtime.records.insert(this.technology, stream, raw);
      runtime.logger.info({ technology: this.technology, stream, imported }, "Records imported");
      this.context.stdout.write(
        `Imported ${imported} ${STREAM_LABELS[stream].noun} for ${this.technology}\n`,
      );
      return 0;
    } catch (err) {
      this.context.stdout.write(`Import failed: ${errorMessage(err)}\n`);
      return 1;
    } finally {
      runtime.db.close();
    }
  }
}
