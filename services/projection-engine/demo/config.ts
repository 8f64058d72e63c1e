import { z } from "zod";

import type { Sector } from "../src/types/inputs.js";

export const DEFAULT_SCENARIO_FIELDS: { [S in Sector]: string } = {
  solar: "revenue.ppa_price",
  consulting: "staffing.analysts.utilization",
};

const multiplierList = z
  .string()
  .trim()
  .min(1)
  .transform((value, ctx) => {
    const multipliers = value.split(",").map((part) => Number(part.trim()));
    if (multipliers.some((m) => !Number.isFinite(m))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected comma-separated numbers, got "${value}"`,
      });
      return z.NEVER;
    }
    return multipliers;
  });

const envSchema = z.object({
  PROJECTION_SECTOR: z.enum(["solar", "consulting"]).default("solar"),
  PROJECTION_REQUEST_PATH: z.string().trim().min(1).optional(),
  SCENARIO_FIELD: z.string().trim().min(1).optional(),
  SCENARIO_MULTIPLIERS: multiplierList.default("0.9,1,1.1"),
});

export interface DemoConfig {
  sector: Sector;
  requestPath?: string;
  scenarioField: string;
  multipliers: number[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DemoConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid demo configuration:\n${issues.join("\n")}`);
  }

  const {
    PROJECTION_SECTOR: sector,
    PROJECTION_REQUEST_PATH: requestPath,
    SCENARIO_FIELD: scenarioField,
    SCENARIO_MULTIPLIERS: multipliers,
  } = parsed.data;

  return {
    sector,
    ...(requestPath ? { requestPath } : {}),
    scenarioField: scenarioField ?? DEFAULT_SCENARIO_FIELDS[sector],
    multipliers,
  };
}
