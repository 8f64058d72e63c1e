import type { ConsultingInputs, ProjectInputs, SolarInputs } from "../types/inputs.js";
import type { ConsultingSchedule, Projection, SolarSchedule } from "../types/schedule.js";
import { buildConsultingSchedule } from "../modules/consulting/consulting-model.js";
import { buildSolarSchedule } from "../modules/solar/solar-model.js";

/**
 * Unrolls one input record into its year-by-year schedule and financing
 * structure. Pure: identical inputs give identical output.
 */
export function buildSchedule(inputs: SolarInputs): Projection<SolarSchedule>;
export function buildSchedule(inputs: ConsultingInputs): Projection<ConsultingSchedule>;
export function buildSchedule(inputs: ProjectInputs): Projection;
export function buildSchedule(inputs: ProjectInputs): Projection {
  switch (inputs.sector) {
    case "solar":
      return buildSolarSchedule(inputs);
    case "consulting":
      return buildConsultingSchedule(inputs);
  }
}
