import { formatMultiple, formatPercent } from "../src/formatters/annual-cashflow.js";
import type { ScenarioSet } from "../src/modules/scenario/scenario-runner.js";

export function renderScenarioTable(field: string, scenarios: ScenarioSet): string {
  const lines = [`SCENARIOS: ${field}`];
  for (const scenario of scenarios) {
    const label = `  x${scenario.multiplier.toFixed(2)}`;
    if (!scenario.success) {
      lines.push(`${label}  ${scenario.error.code}: ${scenario.error.message}`);
      continue;
    }
    lines.push(
      `${label}  value ${scenario.fieldValue}  IRR ${formatPercent(scenario.equityIrr)}  ` +
        `Min DSCR ${formatMultiple(scenario.minDscr)}`,
    );
  }
  return lines.join("\n");
}
