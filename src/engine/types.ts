/**
 * Engine Type Contracts
 *
 * All interfaces used by the longitudinal vehicle model. The step function
 * builds against these; the orchestrator, bridge and file writer read them.
 * Symbols in the doc comments follow the usual longitudinal-dynamics notation.
 */

/** Fixed physical parameters. Set once at construction, never touched by step. */
export interface VehicleParams {
  /** Torque curve constant term a0 [N·m] */
  readonly a0: number;
  /** Torque curve linear term a1 [N·m·s/rad] */
  readonly a1: number;
  /** Torque curve quadratic term a2 [N·m·s²/rad²] */
  readonly a2: number;
  /** Gear ratio GR (engine speed → wheel speed) */
  readonly gearRatio: number;
  /** Effective wheel radius r_e [m] */
  readonly effectiveRadius: number;
  /** Lumped engine + driveline inertia J_e [kg·m²] */
  readonly engineInertia: number;
  /** Vehicle mass m [kg] */
  readonly mass: number;
  /** Gravitational acceleration g [m/s²] */
  readonly gravity: number;
  /** Aerodynamic drag coefficient c_a, F_aero = c_a·v² */
  readonly dragCoefficient: number;
  /** Linearized rolling-resistance coefficient c_r1, R_x = c_r1·v */
  readonly rollingResistance: number;
  /** Tire longitudinal stiffness c, F_x = c·s in the linear regime */
  readonly tireStiffness: number;
  /** Saturated tire force F_max [N] */
  readonly maxTireForce: number;
  /** Integration time step Δt [s] */
  readonly sampleTime: number;
}

/**
 * Mutable dynamic state at a single tick.
 * Snapshots are plain objects; stepVehicle returns a new one each tick.
 */
export interface VehicleState {
  /** Position x [m] */
  position: number;
  /** Velocity v [m/s], assumed ≥ 0 */
  velocity: number;
  /** Vehicle acceleration a [m/s²] from the most recent step */
  acceleration: number;
  /** Engine angular speed w_e [rad/s] */
  engineSpeed: number;
  /** Engine angular acceleration w_e_dot [rad/s²] from the most recent step */
  engineAccel: number;
}

/** Instantaneous driver input. Neither value is validated. */
export interface ControlInput {
  /** Throttle x_θ, intended range [0, 1] */
  throttle: number;
  /** Road grade angle α [rad], positive = uphill */
  incline: number;
}

/** Tire regime selected by the slip magnitude. */
export type SlipRegime = 'linear' | 'saturated';

/** Aerodynamic, rolling and grade forces opposing motion. */
export interface LoadForces {
  aero: number;
  rolling: number;
  grade: number;
  total: number;
}

/** Every intermediate quantity of one step, evaluated on the pre-step state. */
export interface ForceBreakdown {
  /** Engine torque T_e [N·m] */
  engineTorque: number;
  load: LoadForces;
  /** Wheel angular speed w_w = GR·w_e [rad/s] */
  wheelSpeed: number;
  /** Slip ratio s. ±Infinity or NaN when velocity is zero. */
  slip: number;
  regime: SlipRegime;
  /** Tire force F_x [N] */
  tireForce: number;
  /** Engine angular acceleration w_e_dot [rad/s²] */
  engineAccel: number;
  /** Vehicle acceleration a [m/s²] */
  acceleration: number;
}
