/**
 * BridgeSession Tests
 *
 * Exercises request parsing and dispatch directly. No WebSocket server
 * needed — the socket layer only decodes frames and forwards them here.
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { BridgeSession, parseRequest } from '../../src/bridge/bridge-session';
import { respond } from '../../src/bridge/bridge-server';
import { parsePort, DEFAULT_BRIDGE_CONFIG } from '../../src/bridge/bridge-config';

describe('parseRequest', () => {
  it('parses a step with finite throttle and incline', () => {
    expect(parseRequest({ type: 'step', throttle: 0.2, incline: 0 })).toEqual({
      type: 'step',
      throttle: 0.2,
      incline: 0,
    });
  });

  it('keeps out-of-range throttle as sent', () => {
    expect(parseRequest({ type: 'step', throttle: 3, incline: -1 })).toEqual({
      type: 'step',
      throttle: 3,
      incline: -1,
    });
  });

  it('rejects missing or non-numeric inputs', () => {
    expect(() => parseRequest({ type: 'step', incline: 0 })).toThrow('throttle must be a finite number');
    expect(() => parseRequest({ type: 'step', throttle: 0.1, incline: 'up' })).toThrow(
      'incline must be a finite number',
    );
  });

  it('rejects non-object messages and unknown types', () => {
    expect(() => parseRequest([1, 2])).toThrow('message must be a JSON object');
    expect(() => parseRequest({ type: 'fly' })).toThrow('Unknown message type: fly');
  });

  it('defaults run to the ramp scenario', () => {
    expect(parseRequest({ type: 'run' })).toEqual({ type: 'run', scenarioId: 'ramp' });
  });

  it('parses parameter overrides on reset', () => {
    expect(parseRequest({ type: 'reset', params: { mass: 1500 } })).toEqual({
      type: 'reset',
      params: { mass: 1500 },
    });
  });

  it('rejects unknown or invalid parameters', () => {
    expect(() => parseRequest({ type: 'reset', params: { wings: 2 } })).toThrow('Unknown parameter "wings"');
    expect(() => parseRequest({ type: 'reset', params: { sampleTime: 0 } })).toThrow(
      'sampleTime must be positive',
    );
  });
});

describe('BridgeSession', () => {
  let session: BridgeSession;

  beforeEach(() => {
    session = new BridgeSession();
  });

  // --- reset ---

  it('reset returns the initial condition and parameters', () => {
    const res = session.handle({ type: 'reset' });
    expect(res).toMatchObject({
      type: 'reset_result',
      state: { position: 0, velocity: 5, acceleration: 0, engineSpeed: 100, engineAccel: 0 },
    });
    if (res.type !== 'reset_result') throw new Error('unexpected response');
    expect(res.params.mass).toBe(2000);
  });

  it('reset applies parameter overrides', () => {
    const res = session.handle({ type: 'reset', params: { mass: 1000 } });
    if (res.type !== 'reset_result') throw new Error('unexpected response');
    expect(res.params.mass).toBe(1000);
    expect(res.params.gearRatio).toBe(0.35);
  });

  // --- step ---

  it('step before reset is an error', () => {
    expect(() => session.handle({ type: 'step', throttle: 0.2, incline: 0 })).toThrow('step called before reset');
  });

  it('step advances the model and reports the force breakdown', () => {
    session.handle({ type: 'reset' });
    const res = session.handle({ type: 'step', throttle: 0.2, incline: 0 });
    if (res.type !== 'step_result') throw new Error('unexpected response');
    expect(res.state.position).toBeCloseTo(0.05024914875, 12);
    expect(res.state.velocity).toBeCloseTo(5.04982975, 12);
    expect(res.forces?.regime).toBe('saturated');
  });

  it('state reports without stepping', () => {
    session.handle({ type: 'reset' });
    session.handle({ type: 'step', throttle: 0.2, incline: 0 });
    const a = session.handle({ type: 'state' });
    const b = session.handle({ type: 'state' });
    expect(a).toEqual(b);
  });

  // --- run ---

  it('run returns a full trajectory without touching the session model', () => {
    session.handle({ type: 'reset' });
    session.handle({ type: 'step', throttle: 0.2, incline: 0 });
    const before = session.handle({ type: 'state' });

    const res = session.handle({ type: 'run', scenarioId: 'ramp' });
    if (res.type !== 'run_result') throw new Error('unexpected response');
    expect(res.scenarioId).toBe('ramp');
    expect(res.samples.time).toHaveLength(2000);
    expect(res.samples.position[0]).toBeCloseTo(0.050224654, 8);

    expect(session.handle({ type: 'state' })).toEqual(before);
  });

  it('run rejects unknown scenarios', () => {
    expect(() => session.handle({ type: 'run', scenarioId: 'moon' })).toThrow('Unknown scenario "moon"');
  });

  // --- close ---

  it('close drops the model', () => {
    session.handle({ type: 'reset' });
    expect(session.handle({ type: 'close' })).toEqual({ type: 'close_result' });
    expect(() => session.handle({ type: 'state' })).toThrow('state called before reset');
  });

  it('sessions are independent', () => {
    const other = new BridgeSession();
    session.handle({ type: 'reset' });
    other.handle({ type: 'reset' });
    session.handle({ type: 'step', throttle: 1, incline: 0 });
    const res = other.handle({ type: 'state' });
    if (res.type !== 'state_result') throw new Error('unexpected response');
    expect(res.state.velocity).toBe(5);
  });
});

describe('respond', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('decodes a JSON frame and dispatches it', () => {
    const session = new BridgeSession();
    const res = respond(session, Buffer.from(JSON.stringify({ type: 'reset' })));
    expect(res.type).toBe('reset_result');
  });

  it('turns thrown errors into error replies and logs them', () => {
    const session = new BridgeSession();
    const res = respond(session, Buffer.from(JSON.stringify({ type: 'state' })));
    expect(res).toEqual({ type: 'error', message: 'state called before reset' });
    expect(console.error).toHaveBeenCalledWith('[bridge] error:', 'state called before reset');
  });

  it('reports malformed JSON as an error reply', () => {
    const res = respond(new BridgeSession(), Buffer.from('{not json'));
    expect(res.type).toBe('error');
  });

  it('accepts fragmented frames', () => {
    const res = respond(new BridgeSession(), [Buffer.from('{"type":'), Buffer.from('"reset"}')]);
    expect(res.type).toBe('reset_result');
  });
});

describe('parsePort', () => {
  it('defaults when unset', () => {
    expect(parsePort(undefined)).toBe(DEFAULT_BRIDGE_CONFIG.port);
    expect(parsePort('')).toBe(9876);
  });

  it('parses a valid port', () => {
    expect(parsePort('8080')).toBe(8080);
  });

  it('rejects out-of-range or non-integer ports', () => {
    expect(() => parsePort('0')).toThrow('Invalid port: 0. Must be 1-65535.');
    expect(() => parsePort('70000')).toThrow('Invalid port');
    expect(() => parsePort('abc')).toThrow('Invalid port');
  });
});
