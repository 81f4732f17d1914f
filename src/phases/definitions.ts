import type { Phase } from "./types.js";

export interface PhaseDefinition {
  readonly name: string;
  readonly description: string;
}

export const PHASE_DEFINITIONS: { readonly [P in Phase]: PhaseDefinition } = {
  technology_trigger: {
    name: "Technology Trigger",
    description:
      "A breakthrough draws early attention. Activity is mostly basic research with few players and little commercial evidence.",
  },
  peak_inflated_expectations: {
    name: "Peak of Inflated Expectations",
    description:
      "Publicity and activity peak. Many entrants pile in and expectations run ahead of demonstrated results.",
  },
  trough_disillusionment: {
    name: "Trough of Disillusionment",
    description:
      "Interest wanes as results fall short. Activity declines and weaker players consolidate or exit.",
  },
  slope_enlightenment: {
    name: "Slope of Enlightenment",
    description:
      "Practical applications become understood. Industry-led work grows steadily and second-generation offerings appear.",
  },
  plateau_productivity: {
    name: "Plateau of Productivity",
    description:
      "Mainstream adoption. Activity is stable, applied and dominated by established organizations.",
  },
};

export function phaseName(phase: Phase): string {
  return PHASE_DEFINITIONS[phase].name;
}
