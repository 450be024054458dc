import type { ScenarioInputs } from '../engine/simulation';
import { constant, throttleRamp, inclineByPosition } from '../engine/profiles';

export interface ScenarioInfo {
  id: string;
  name: string;
  description: string;
  inputs: ScenarioInputs;
}

export const SCENARIOS: ScenarioInfo[] = [
  {
    id: 'constant-throttle',
    name: 'Constant throttle',
    description: '20% throttle on flat road for 100 s: velocity settles at the drag limit',
    inputs: {
      duration: 100,
      throttle: constant(0.2),
      incline: constant(0),
      sampling: 'pre-step',
    },
  },
  {
    id: 'ramp',
    name: 'Ramp climb',
    description: 'Trapezoidal throttle over a two-stage slope for 20 s: crosses the crest near 15 s',
    inputs: {
      duration: 20,
      throttle: throttleRamp(),
      incline: inclineByPosition(),
      sampling: 'post-step',
    },
  },
  {
    id: 'coast',
    name: 'Coast',
    description: 'Zero throttle on flat road for 30 s',
    inputs: {
      duration: 30,
      throttle: constant(0),
      incline: constant(0),
      sampling: 'post-step',
    },
  },
];

/** Look up a scenario by id. Throws on unknown ids. */
export function getScenario(id: string): ScenarioInfo {
  const scenario = SCENARIOS.find((s) => s.id === id);
  if (!scenario) {
    throw new Error(`Unknown scenario "${id}". Available: ${SCENARIOS.map((s) => s.id).join(', ')}`);
  }
  return scenario;
}
