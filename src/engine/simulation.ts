/**
 * Simulation Orchestrator
 *
 * Drives a VehicleModel over a fixed time grid. Throttle is evaluated from
 * grid time, incline from the model's position before each step, then the
 * model is stepped exactly once per grid point.
 *
 * Grid times are computed as i·dt rather than accumulated, so every run
 * sees the same time values.
 */

import type { VehicleState } from './types';
import type { ThrottleProfile, InclineProfile } from './profiles';
import { VehicleModel } from './VehicleModel';

/**
 * When a sample is recorded relative to its step.
 * - 'pre-step': state before the step at time t
 * - 'post-step': state after the step at time t
 */
export type Sampling = 'pre-step' | 'post-step';

export interface ScenarioInputs {
  /** Simulated duration [s]; the grid covers [0, duration) */
  duration: number;
  throttle: ThrottleProfile;
  incline: InclineProfile;
  sampling?: Sampling;
}

/** Parallel arrays, one entry per grid point. */
export interface Trajectory {
  time: number[];
  position: number[];
  velocity: number[];
  engineSpeed: number[];
  throttle: number[];
  incline: number[];
  /** State after the last step */
  final: VehicleState;
}

// ──────────────────────────────────────────────────────────
// timeGrid
// ──────────────────────────────────────────────────────────

/** [0, dt, 2·dt, …) with ceil(duration / dt) points. */
export function timeGrid(duration: number, dt: number): number[] {
  if (!(dt > 0)) {
    throw new Error(`time step must be positive, got ${dt}`);
  }
  const count = Math.max(0, Math.ceil(duration / dt));
  const grid = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    grid[i] = i * dt;
  }
  return grid;
}

// ──────────────────────────────────────────────────────────
// simulate
// ──────────────────────────────────────────────────────────

/**
 * Run the model from its current state over the scenario grid.
 *
 * The model is mutated; reset() it first for a run from the initial condition.
 */
export function simulate(model: VehicleModel, scenario: ScenarioInputs): Trajectory {
  const sampling = scenario.sampling ?? 'post-step';
  const grid = timeGrid(scenario.duration, model.params.sampleTime);

  const trajectory: Trajectory = {
    time: [],
    position: [],
    velocity: [],
    engineSpeed: [],
    throttle: [],
    incline: [],
    final: model.state,
  };

  for (const t of grid) {
    const throttle = scenario.throttle(t);
    const incline = scenario.incline(model.position);

    if (sampling === 'pre-step') record(trajectory, model, t, throttle, incline);
    model.step(throttle, incline);
    if (sampling === 'post-step') record(trajectory, model, t, throttle, incline);
  }

  trajectory.final = model.state;
  return trajectory;
}

function record(
  trajectory: Trajectory,
  model: VehicleModel,
  time: number,
  throttle: number,
  incline: number,
): void {
  trajectory.time.push(time);
  trajectory.position.push(model.position);
  trajectory.velocity.push(model.velocity);
  trajectory.engineSpeed.push(model.engineSpeed);
  trajectory.throttle.push(throttle);
  trajectory.incline.push(incline);
}

/** First sample time at which position reaches `x`, or null if it never does. */
export function crossingTime(trajectory: Pick<Trajectory, 'time' | 'position'>, x: number): number | null {
  const i = trajectory.position.findIndex((p) => p >= x);
  return i === -1 ? null : trajectory.time[i];
}
