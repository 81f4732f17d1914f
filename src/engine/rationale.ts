import { PHASES, type IndicatorOutcome, type Phase, type PhaseScores } from "../phases/types.js";
import { phaseName } from "../phases/definitions.js";

export interface RationaleSection {
  readonly title: string;
  readonly lines: readonly string[];
}

export interface RationaleInput {
  /** Stream title, e.g. "Patent". */
  readonly title: string;
  readonly phase: Phase;
  readonly scores: PhaseScores;
  readonly keyMetrics: readonly string[];
  readonly satisfied: readonly IndicatorOutcome[];
  readonly highlights: RationaleSection | null;
}

/** Phases by score, highest first; canonical order among equals. */
export function rankPhases(scores: PhaseScores): Phase[] {
  return [...PHASES].sort((a, b) => scores[b] - scores[a] || PHASES.indexOf(a) - PHASES.indexOf(b));
}

export function formatRationale(input: RationaleInput): string {
  const lines: string[] = [
    `${input.title}-based phase: ${phaseName(input.phase)}`,
    `Confidence score: ${input.scores[input.phase].toFixed(2)}`,
    "",
    `Key ${input.title.toLowerCase()} indicators:`,
    ...input.keyMetrics.map((m) => `- ${m}`),
    "",
    "Satisfied indicators:",
  ];

  if (input.satisfied.length === 0) {
    lines.push("  (none)");
  } else {
    for (const indicator of input.satisfied) {
      lines.push(`  + ${indicator.description} (+${indicator.weight.toFixed(2)})`);
    }
  }

  if (input.highlights && input.highlights.lines.length > 0) {
    lines.push("", `${input.highlights.title}:`);
    for (const line of input.highlights.lines) lines.push(`  - ${line}`);
  }

  lines.push("", "Phase scores:");
  for (const phase of rankPhases(input.scores)) {
    lines.push(`  ${phaseName(phase)}: ${input.scores[phase].toFixed(2)}`);
  }

  return lines.join("\n");
}
