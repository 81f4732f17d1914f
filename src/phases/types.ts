/** Lifecycle phases in canonical order. Order is significant: ties resolve to the earlier phase. */
export const PHASES = [
  "technology_trigger",
  "peak_inflated_expectations",
  "trough_disillusionment",
  "slope_enlightenment",
  "plateau_productivity",
] as const;

export type Phase = (typeof PHASES)[number];

export type PhaseScores = { readonly [P in Phase]: number };

export interface IndicatorOutcome {
  readonly phase: Phase;
  readonly id: string;
  readonly description: string;
  readonly weight: number;
  readonly satisfied: boolean;
}

export interface PhaseVerdict {
  readonly phase: Phase;
  /** The winning phase's own score; not normalized across phases. */
  readonly confidence: number;
  readonly scores: PhaseScores;
  readonly indicators: readonly IndicatorOutcome[];
  readonly rationale: string;
}

/** Builds a value for every phase, keyed in canonical order. */
export function mapPhases<T>(fn: (phase: Phase) => T): { [P in Phase]: T } {
  return {
    technology_trigger: fn("technology_trigger"),
    peak_inflated_expectations: fn("peak_inflated_expectations"),
    trough_disillusionment: fn("trough_disillusionment"),
    slope_enlightenment: fn("slope_enlightenment"),
    plateau_productivity: fn("plateau_productivity"),
  };
}
