/**
 * Vehicle Physics Module — Longitudinal Model
 *
 * Pure functions implementing the longitudinal vehicle simulation:
 * - Quadratic engine torque curve
 * - Load forces (quadratic drag, linearized rolling resistance, grade)
 * - Slip ratio and piecewise tire force
 * - Full physics step with explicit Euler integration
 *
 * All functions are pure: they return new objects, never mutate input state.
 * No Math.random, no clock — fully deterministic.
 *
 * Nothing here is guarded: zero velocity in the slip ratio and out-of-range
 * inputs propagate straight into the state.
 */

import type {
  VehicleParams,
  VehicleState,
  ControlInput,
  LoadForces,
  ForceBreakdown,
  SlipRegime,
} from './types';
import { VEHICLE, INITIAL_STATE, SLIP_SATURATION } from './constants';

// ──────────────────────────────────────────────────────────
// createInitialVehicleState
// ──────────────────────────────────────────────────────────

/** Fresh copy of the initial condition: x=0, v=5, a=0, w_e=100, w_e_dot=0. */
export function createInitialVehicleState(): VehicleState {
  return { ...INITIAL_STATE };
}

// ──────────────────────────────────────────────────────────
// engineTorque
// ──────────────────────────────────────────────────────────

/**
 * Engine torque from throttle and engine speed.
 *
 *   T_e = x_θ · (a0 + a1·w_e + a2·w_e²)
 */
export function engineTorque(
  throttle: number,
  engineSpeed: number,
  params: VehicleParams = VEHICLE,
): number {
  return throttle * (params.a0 + params.a1 * engineSpeed + params.a2 * (engineSpeed * engineSpeed));
}

// ──────────────────────────────────────────────────────────
// loadForces
// ──────────────────────────────────────────────────────────

/**
 * Forces opposing forward motion.
 *
 *   F_aero = c_a·v²
 *   R_x    = c_r1·v          (no |v|: reverse motion is out of scope)
 *   F_g    = m·g·sin(α)
 */
export function loadForces(
  velocity: number,
  incline: number,
  params: VehicleParams = VEHICLE,
): LoadForces {
  const aero = params.dragCoefficient * (velocity * velocity);
  const rolling = params.rollingResistance * velocity;
  const grade = params.mass * params.gravity * Math.sin(incline);
  return { aero, rolling, grade, total: aero + rolling + grade };
}

// ──────────────────────────────────────────────────────────
// slipRatio / tireForce
// ──────────────────────────────────────────────────────────

/**
 * Slip ratio between wheel surface speed and vehicle speed.
 *
 *   s = (GR·w_e·r_e − v) / v
 *
 * At v = 0 this is +Infinity, -Infinity or NaN depending on the numerator.
 */
export function slipRatio(
  engineSpeed: number,
  velocity: number,
  params: VehicleParams = VEHICLE,
): number {
  const wheelSpeed = params.gearRatio * engineSpeed;
  return (wheelSpeed * params.effectiveRadius - velocity) / velocity;
}

/** Linear below |s| = 1, saturated otherwise. NaN lands in the saturated branch. */
export function slipRegime(slip: number): SlipRegime {
  return Math.abs(slip) < SLIP_SATURATION ? 'linear' : 'saturated';
}

/**
 * Piecewise tire force.
 *
 *   F_x = c·s     if |s| < 1
 *   F_x = F_max   otherwise (sign is not adjusted for negative slip)
 */
export function tireForce(slip: number, params: VehicleParams = VEHICLE): number {
  return slipRegime(slip) === 'linear' ? params.tireStiffness * slip : params.maxTireForce;
}

// ──────────────────────────────────────────────────────────
// evaluateForces
// ──────────────────────────────────────────────────────────

/**
 * Evaluate every force and derivative for one step.
 *
 * Reads only the pre-step state; nothing is integrated here.
 */
export function evaluateForces(
  state: VehicleState,
  input: ControlInput,
  params: VehicleParams = VEHICLE,
): ForceBreakdown {
  const { velocity, engineSpeed } = state;

  const torque = engineTorque(input.throttle, engineSpeed, params);
  const load = loadForces(velocity, input.incline, params);

  // J_e·w_e_dot = T_e − GR·r_e·F_load
  const engineAccel = (torque - params.gearRatio * params.effectiveRadius * load.total) / params.engineInertia;

  const wheelSpeed = params.gearRatio * engineSpeed;
  const slip = slipRatio(engineSpeed, velocity, params);
  const regime = slipRegime(slip);
  const Fx = tireForce(slip, params);

  // m·a = F_x − F_load
  const acceleration = (Fx - load.total) / params.mass;

  return {
    engineTorque: torque,
    load,
    wheelSpeed,
    slip,
    regime,
    tireForce: Fx,
    engineAccel,
    acceleration,
  };
}

// ──────────────────────────────────────────────────────────
// stepVehicle
// ──────────────────────────────────────────────────────────

/**
 * Advance the state by one sample time.
 *
 * Update order is fixed:
 *   w_e ← w_e + w_e_dot·Δt
 *   v   ← v + a·Δt
 *   x   ← x + (v·Δt − ½·a·Δt²)   (v here is the velocity just updated)
 *
 * The position increment is summed before it is added to x. Reference
 * trajectories depend on this grouping, rounding included.
 */
export function stepVehicle(
  state: VehicleState,
  input: ControlInput,
  params: VehicleParams = VEHICLE,
): VehicleState {
  return advance(state, evaluateForces(state, input, params), params.sampleTime);
}

/** Integrate a state with an already evaluated breakdown. */
export function advance(state: VehicleState, forces: ForceBreakdown, dt: number): VehicleState {
  const { engineAccel, acceleration } = forces;

  const engineSpeed = state.engineSpeed + engineAccel * dt;
  const velocity = state.velocity + acceleration * dt;
  const position = state.position + (velocity * dt - 0.5 * acceleration * (dt * dt));

  return { position, velocity, acceleration, engineSpeed, engineAccel };
}
