/**
 * Physics Constants and Default Parameters
 *
 * The reference vehicle: a 2000 kg car with a quadratic torque curve,
 * single fixed gear and a saturating tire. These values define the
 * reference trajectories, so changing any of them changes graded output.
 */

import type { VehicleParams, VehicleState } from './types';

/** Fixed timestep in seconds. 100Hz integration. */
export const DT = 0.01;

/** Default vehicle parameters. */
export const VEHICLE = {
  // Throttle to engine torque
  a0: 400,
  a1: 0.1,
  a2: -0.0002,

  // Gear ratio, effective radius, mass + inertia
  gearRatio: 0.35,
  effectiveRadius: 0.3,
  engineInertia: 10,
  mass: 2000,
  gravity: 9.81,

  // Aerodynamic and friction coefficients
  dragCoefficient: 1.36,
  rollingResistance: 0.01,

  // Tire force
  tireStiffness: 10000,
  maxTireForce: 10000,

  sampleTime: DT,
} as const satisfies VehicleParams;

/** Initial condition: rolling at 5 m/s with the engine at 100 rad/s. */
export const INITIAL_STATE = {
  position: 0,
  velocity: 5,
  acceleration: 0,
  engineSpeed: 100,
  engineAccel: 0,
} as const satisfies VehicleState;

/** |s| at which the tire leaves the linear regime and saturates at F_max. */
export const SLIP_SATURATION = 1;
