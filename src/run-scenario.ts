/**
 * Scenario runner — headless entry point.
 *
 * Usage: tsx src/run-scenario.ts [scenarioId] [outFile]
 * Defaults to the graded ramp scenario written to xdata.txt.
 */

import { SCENARIOS } from './scenarios/registry';
import { runScenario } from './scenarios/runner';

const [scenarioId = 'ramp', outFile = 'xdata.txt'] = process.argv.slice(2);

if (scenarioId === '--help' || scenarioId === '-h') {
  console.log('Usage: run-scenario [scenarioId] [outFile]');
  console.log(`Scenarios: ${SCENARIOS.map((s) => s.id).join(', ')}`);
} else {
  try {
    runScenario(scenarioId, outFile);
  } catch (err) {
    console.error(`[scenario] ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}
