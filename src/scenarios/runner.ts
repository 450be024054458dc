import { VehicleModel } from '../engine/VehicleModel';
import { simulate } from '../engine/simulation';
import type { Trajectory } from '../engine/simulation';
import { writeTrajectoryFile } from '../io/trajectory-file';
import { getScenario } from './registry';

/** Run a registered scenario on a fresh model and write its (time, position) file. */
export function runScenario(scenarioId: string, outFile: string): Trajectory {
  const scenario = getScenario(scenarioId);
  console.log(`[scenario] ${scenario.name}: ${scenario.description}`);

  const trajectory = simulate(new VehicleModel(), scenario.inputs);
  const { final } = trajectory;
  console.log(
    `[scenario] ${trajectory.time.length} samples, final x=${final.position.toFixed(3)} m, ` +
      `v=${final.velocity.toFixed(3)} m/s, w_e=${final.engineSpeed.toFixed(3)} rad/s`,
  );

  const written = writeTrajectoryFile(outFile, trajectory);
  console.log(`[scenario] wrote ${written}`);
  return trajectory;
}
