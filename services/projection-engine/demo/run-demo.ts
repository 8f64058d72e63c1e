import { readFile } from "node:fs/promises";

import { isNumericPath } from "../src/core/field-path.js";
import { defaultInputs } from "../src/defaults/default-inputs.js";
import { ProjectionEngine, createSummaryReport } from "../src/engine/projection-engine.js";
import type { ProjectionEngineResult } from "../src/engine/projection-engine.js";
import { formatAnnualCashFlowAsText, generateAnnualCashFlow } from "../src/formatters/annual-cashflow.js";
import { runScenarios } from "../src/modules/scenario/scenario-runner.js";
import type { Sector } from "../src/types/inputs.js";
import { loadConfig } from "./config.js";
import { log } from "./logger.js";
import { renderScenarioTable } from "./scenario-table.js";

async function runProjection(
  engine: ProjectionEngine,
  requestPath: string | undefined,
  sector: Sector,
): Promise<ProjectionEngineResult> {
  if (!requestPath) {
    return engine.run(defaultInputs(sector));
  }
  log.info("Loading request", { requestPath });
  const request: unknown = JSON.parse(await readFile(requestPath, "utf8"));
  return engine.runRequest(request);
}

async function main(): Promise<void> {
  const config = loadConfig();
  log.info("Starting projection demo", {
    sector: config.sector,
    requestPath: config.requestPath ?? null,
    scenarioField: config.scenarioField,
    multipliers: config.multipliers,
  });

  const engine = new ProjectionEngine();
  const result = await runProjection(engine, config.requestPath, config.sector);

  console.log(createSummaryReport(result));
  if (!result.success || !result.inputs || !result.projection) {
    log.error("Projection failed", { errors: result.errors ?? [] });
    process.exitCode = 1;
    return;
  }

  for (const warning of result.warnings) {
    log.warn(warning);
  }

  console.log("");
  console.log(formatAnnualCashFlowAsText(generateAnnualCashFlow(result.projection)));

  const inputs = result.inputs;
  const field = config.scenarioField;
  if (!isNumericPath(inputs, field)) {
    log.error("Unknown scenario field", { field, sector: inputs.sector });
    process.exitCode = 1;
    return;
  }

  const scenarios = runScenarios(inputs, field, config.multipliers);
  console.log("");
  console.log(renderScenarioTable(field, scenarios));
  log.info("Demo complete", {
    scenarios: scenarios.length,
    failed: scenarios.filter((s) => !s.success).length,
  });
}

main().catch((error: unknown) => {
  log.error("Demo failed", { message: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
