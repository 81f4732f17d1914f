import { Command, Option } from "clipanion";
import { AnalysisService } from "../../analysis/service.js";
import type { StreamOutcome } from "../../analysis/types.js";
import { STREAM_KINDS, isStreamKind, toDict, type StreamKind } from "../../streams/index.js";
import { openRuntime } from "../runtime.js";

/** Exit code when no selected stream had enough records. */
export const EXIT_INSUFFICIENT_DATA = 2;

export function parseStreams(values: readonly string[] | undefined): StreamKind[] | string {
  if (!values || values.length === 0) return [...STREAM_KINDS];
  const streams: StreamKind[] = [];
  for (const value of values) {
    if (!isStreamKind(value)) {
      return `Unknown stream "${value}". Expected one of: ${STREAM_KINDS.join(", ")}`;
    }
    if (!streams.includes(value)) streams.push(value);
  }
  return streams;
}

export class AnalyzeCommand extends Command {
  static override paths = [["analyze"]];

  static override usage = Command.Usage({
    description: "Analyze stored records and report a lifecycle phase per stream",
    details: `
      Streams below their configured record minimum are reported with the
      shortfall instead of a verdict. Verdicts are stored for \`history\`.
    `,
    examples: [
      ["Analyze every stream", "phasewatch analyze solid-state-batteries"],
      ["Only papers and patents, as JSON", "phasewatch analyze solid-state-batteries --stream paper --stream patent --json"],
    ],
  });

  technology = Option.String({ required: true });
  streams = Option.Array("--stream", { description: "Restrict to a stream (repeatable)" });
  json = Option.Boolean("--json", false, { description: "Print the report as JSON" });

  async execute(): Promise<number> {
    const streams = parseStreams(this.streams);
    if (typeof streams === "string") {
      this.context.stdout.write(`${streams}\n`);
      return 1;
    }

    const runtime = openRuntime();
    try {
      const service = new AnalysisService({
        config: runtime.config,
        source: runtime.records,
        sink: runtime.analyses,
        logger: runtime.logger,
      });
      const report = await service.analyze(this.technology, streams);

      if (this.json) {
        const payload = {
          technology: report.technology,
          analyzedAt: report.analyzedAt,
          outcomes: report.outcomes.map(serializeOutcome),
        };
        this.context.stdout.write(JSON.stringify(payload, null, 2) + "\n");
      } else {
        this.context.stdout.write(renderReport(report.technology, report.outcomes));
      }

      return report.outcomes.some((o) => o.status === "analyzed") ? 0 : EXIT_INSUFFICIENT_DATA;
    } finally {
      runtime.db.close();
    }
  }
}

function serializeOutcome(outcome: StreamOutcome) {
  if (outcome.status === "insufficient_data") return outcome;
  return {
    stream: outcome.stream,
    status: outcome.status,
    phase: outcome.verdict.phase,
    confidence: outcome.verdict.confidence,
    scores: outcome.verdict.scores,
    rationale: outcome.verdict.rationale,
    recordsAnalyzed: outcome.recordsAnalyzed,
    dateRange: outcome.dateRange,
    snapshot: toDict(outcome.stream, outcome.snapshot),
  };
}

export function renderReport(technology: string, outcomes: readonly StreamOutcome[]): string {
  const lines = [`Technology: ${technology}`, ""];
  for (const outcome of outcomes) {
    lines.push(`== ${outcome.stream} ==`);
    if (outcome.status === "insufficient_data") {
      lines.push(`Skipped: ${outcome.message}`);
    } else {
      const { start, end } = outcome.dateRange;
      lines.push(`Records analyzed: ${outcome.recordsAnalyzed} (${start ?? "?"} to ${end ?? "?"})`);
      lines.push(outcome.verdict.rationale);
    }
    lines.push("");
  }
  return lines.join("\n");
}
