/**
 * BridgeSession — per-connection controller wrapping one VehicleModel.
 *
 * Parses JSON requests into typed commands and answers with plain objects
 * ready for JSON.stringify. No sockets here; the server owns those.
 */

import type { VehicleParams, VehicleState, ForceBreakdown } from '../engine/types';
import { VEHICLE } from '../engine/constants';
import { VehicleModel } from '../engine/VehicleModel';
import { simulate } from '../engine/simulation';
import { getScenario } from '../scenarios/registry';

const PARAM_KEYS: readonly (keyof VehicleParams)[] = [
  'a0',
  'a1',
  'a2',
  'gearRatio',
  'effectiveRadius',
  'engineInertia',
  'mass',
  'gravity',
  'dragCoefficient',
  'rollingResistance',
  'tireStiffness',
  'maxTireForce',
  'sampleTime',
];

export type BridgeRequest =
  | { type: 'reset'; params: Partial<VehicleParams> }
  | { type: 'step'; throttle: number; incline: number }
  | { type: 'state' }
  | { type: 'run'; scenarioId: string }
  | { type: 'close' };

export type BridgeResponse =
  | { type: 'reset_result'; state: VehicleState; params: VehicleParams }
  | { type: 'step_result'; state: VehicleState; forces: ForceBreakdown | null }
  | { type: 'state_result'; state: VehicleState }
  | {
      type: 'run_result';
      scenarioId: string;
      samples: { time: number[]; position: number[]; velocity: number[]; engineSpeed: number[] };
      final: VehicleState;
    }
  | { type: 'close_result' }
  | { type: 'error'; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finiteField(msg: Record<string, unknown>, key: string): number {
  const value = msg[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${key} must be a finite number`);
  }
  return value;
}

function parseParams(raw: unknown): Partial<VehicleParams> {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new Error('params must be an object');
  }
  const params: Partial<Record<keyof VehicleParams, number>> = {};
  for (const key of Object.keys(raw)) {
    const known = PARAM_KEYS.find((k) => k === key);
    if (!known) {
      throw new Error(`Unknown parameter "${key}". Available: ${PARAM_KEYS.join(', ')}`);
    }
    params[known] = finiteField(raw, known);
  }
  if (params.sampleTime !== undefined && params.sampleTime <= 0) {
    throw new Error('sampleTime must be positive');
  }
  return params;
}

/**
 * Validate a decoded JSON message.
 *
 * Throttle and incline must be finite, but are not clamped: an out-of-range
 * throttle reaches the model exactly as sent.
 */
export function parseRequest(raw: unknown): BridgeRequest {
  if (!isRecord(raw)) {
    throw new Error('message must be a JSON object');
  }
  switch (raw.type) {
    case 'reset':
      return { type: 'reset', params: parseParams(raw.params) };
    case 'step':
      return { type: 'step', throttle: finiteField(raw, 'throttle'), incline: finiteField(raw, 'incline') };
    case 'state':
      return { type: 'state' };
    case 'run': {
      const scenarioId = raw.scenarioId ?? 'ramp';
      if (typeof scenarioId !== 'string') {
        throw new Error('scenarioId must be a string');
      }
      return { type: 'run', scenarioId };
    }
    case 'close':
      return { type: 'close' };
    default:
      throw new Error(`Unknown message type: ${String(raw.type)}`);
  }
}

export class BridgeSession {
  private model: VehicleModel | null = null;

  /** Parse and dispatch. Errors propagate to the caller. */
  handle(raw: unknown): BridgeResponse {
    return this.dispatch(parseRequest(raw));
  }

  dispatch(request: BridgeRequest): BridgeResponse {
    switch (request.type) {
      case 'reset': {
        this.model = new VehicleModel({ ...VEHICLE, ...request.params });
        return { type: 'reset_result', state: this.model.state, params: { ...this.model.params } };
      }
      case 'step': {
        const model = this.requireModel('step');
        model.step(request.throttle, request.incline);
        return { type: 'step_result', state: model.state, forces: model.lastForces };
      }
      case 'state': {
        return { type: 'state_result', state: this.requireModel('state').state };
      }
      case 'run': {
        // Runs on its own model so the session's state is left alone
        const scenario = getScenario(request.scenarioId);
        const params = this.model ? this.model.params : VEHICLE;
        const trajectory = simulate(new VehicleModel(params), scenario.inputs);
        return {
          type: 'run_result',
          scenarioId: scenario.id,
          samples: {
            time: trajectory.time,
            position: trajectory.position,
            velocity: trajectory.velocity,
            engineSpeed: trajectory.engineSpeed,
          },
          final: trajectory.final,
        };
      }
      case 'close': {
        this.model = null;
        return { type: 'close_result' };
      }
    }
  }

  /** Drop the model, e.g. when the socket goes away. */
  close(): void {
    this.model = null;
  }

  private requireModel(op: string): VehicleModel {
    if (!this.model) {
      throw new Error(`${op} called before reset`);
    }
    return this.model;
  }
}
