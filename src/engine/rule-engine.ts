import type { Logger } from "../logging/logger.js";
import type { StreamKind } from "../streams/kinds.js";
import { STREAM_LABELS } from "../streams/kinds.js";
import {
  PHASES,
  mapPhases,
  type IndicatorOutcome,
  type Phase,
  type PhaseScores,
  type PhaseVerdict,
} from "../phases/types.js";
import { roundTo } from "../toolkit/stats.js";
import { formatRationale, type RationaleSection } from "./rationale.js";

export interface PhaseIndicator<S> {
  readonly id: string;
  readonly description: string;
  readonly weight: number;
  readonly test: (snapshot: S) => boolean;
}

export type PhaseRuleTable<S> = { readonly [P in Phase]: readonly PhaseIndicator<S>[] };

/** Everything stream-specific the engine needs: indicator tables and narration. */
export interface StreamRuleSet<S> {
  readonly stream: StreamKind;
  readonly table: PhaseRuleTable<S>;
  keyMetrics(phase: Phase, snapshot: S): string[];
  highlights?(snapshot: S): RationaleSection | null;
}

export interface PhaseScoring {
  readonly scores: PhaseScores;
  readonly indicators: IndicatorOutcome[];
}

/**
 * Scores a snapshot against the five phases.
 *
 * A phase's score is the sum of the weights of its satisfied indicators,
 * capped at 1. The highest score wins; ties go to the earlier phase.
 * Pure: no I/O beyond a log line, never throws on well-formed snapshots.
 */
export class PhaseRuleEngine<S> {
  constructor(
    private readonly rules: StreamRuleSet<S>,
    private readonly logger: Logger,
  ) {}

  get stream(): StreamKind {
    return this.rules.stream;
  }

  score(snapshot: S): PhaseScoring {
    const indicators: IndicatorOutcome[] = [];
    const scores = mapPhases((phase) => {
      let total = 0;
      for (const indicator of this.rules.table[phase]) {
        const satisfied = indicator.test(snapshot);
        if (satisfied) total += indicator.weight;
        indicators.push({
          phase,
          id: indicator.id,
          description: indicator.description,
          weight: indicator.weight,
          satisfied,
        });
      }
      return Math.min(1, roundTo(total, 4));
    });
    return { scores, indicators };
  }

  determinePhase(snapshot: S): PhaseVerdict {
    const { scores, indicators } = this.score(snapshot);

    let phase: Phase = PHASES[0];
    for (const candidate of PHASES) {
      if (scores[candidate] > scores[phase]) phase = candidate;
    }

    const rationale = formatRationale({
      title: STREAM_LABELS[this.rules.stream].title,
      phase,
      scores,
      keyMetrics: this.rules.keyMetrics(phase, snapshot),
      satisfied: indicators.filter((i) => i.phase === phase && i.satisfied),
      highlights: this.rules.highlights?.(snapshot) ?? null,
    });

    this.logger.info(
      { stream: this.rules.stream, phase, confidence: scores[phase] },
      "Phase determined",
    );

    return { phase, confidence: scores[phase], scores, indicators, rationale };
  }
}
