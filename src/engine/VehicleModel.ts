/**
 * VehicleModel: Stateful Longitudinal Vehicle
 *
 * Owns one parameter set and the current dynamic state. The orchestrator
 * calls step() once per grid point and reads the state back.
 * Every run constructs its own instance; there is no shared model.
 * Not safe for concurrent callers on the same instance.
 */

import type { VehicleParams, VehicleState, ForceBreakdown } from './types';
import { VEHICLE } from './constants';
import { createInitialVehicleState, evaluateForces, advance } from './vehicle';

export class VehicleModel {
  readonly params: Readonly<VehicleParams>;
  private current: VehicleState;
  private forces: ForceBreakdown | null = null;

  constructor(params: VehicleParams = VEHICLE) {
    this.params = Object.freeze({ ...params });
    this.current = createInitialVehicleState();
  }

  /** Restore x, v, a, w_e and w_e_dot to the initial condition. Parameters are untouched. */
  reset(): void {
    this.current = createInitialVehicleState();
    this.forces = null;
  }

  /**
   * Advance one sample time. Throttle and incline are used as given:
   * no clamping, no validation.
   */
  step(throttle: number, incline: number): void {
    const forces = evaluateForces(this.current, { throttle, incline }, this.params);
    this.current = advance(this.current, forces, this.params.sampleTime);
    this.forces = forces;
  }

  /** Overwrite part of the dynamic state, e.g. to start from another operating point. */
  setState(patch: Partial<VehicleState>): void {
    this.current = { ...this.current, ...patch };
    this.forces = null;
  }

  /** Copy of the current state. */
  get state(): VehicleState {
    return { ...this.current };
  }

  /** Breakdown of the most recent step; null before the first step and after reset. */
  get lastForces(): ForceBreakdown | null {
    return this.forces;
  }

  get position(): number {
    return this.current.position;
  }

  get velocity(): number {
    return this.current.velocity;
  }

  get acceleration(): number {
    return this.current.acceleration;
  }

  get engineSpeed(): number {
    return this.current.engineSpeed;
  }

  get engineAccel(): number {
    return this.current.engineAccel;
  }
}
