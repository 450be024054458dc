/**
 * WebSocket Bridge Server — RPC interface for external drivers.
 *
 * Accepts JSON messages over WebSocket: reset, step, state, run, close.
 * Each connection gets its own BridgeSession (and so its own VehicleModel).
 * Binds to localhost only (no LAN exposure).
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { BridgeSession } from './bridge-session';
import type { BridgeResponse } from './bridge-session';
import type { BridgeConfig } from './bridge-config';
import { DEFAULT_BRIDGE_CONFIG } from './bridge-config';

function decode(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

/** Decode, parse and dispatch one frame. Never throws; failures become error replies. */
export function respond(session: BridgeSession, data: RawData): BridgeResponse {
  try {
    const msg: unknown = JSON.parse(decode(data));
    return session.handle(msg);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error('[bridge] error:', message);
    return { type: 'error', message };
  }
}

export function startBridgeServer(config: Partial<BridgeConfig> = {}) {
  const { host, port, maxPayload, shutdownTimeoutMs } = { ...DEFAULT_BRIDGE_CONFIG, ...config };

  const wss = new WebSocketServer({
    port,
    host,
    perMessageDeflate: false,
    maxPayload,
    clientTracking: true,
  });

  wss.on('connection', (ws, req) => {
    req.socket.setNoDelay(true);

    const session = new BridgeSession();

    ws.on('message', (data: RawData) => {
      ws.send(JSON.stringify(respond(session, data)));
    });

    ws.on('close', () => session.close());
    ws.on('error', (err) => {
      console.error('[bridge] connection error:', err.message);
      session.close();
    });
  });

  function shutdown() {
    console.log('[bridge] shutting down...');
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.close(1001, 'Server shutting down');
      }
    });
    wss.close(() => {
      console.log('[bridge] closed');
      process.exit(0);
    });
    setTimeout(() => process.exit(1), shutdownTimeoutMs).unref();
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  wss.on('listening', () => {
    console.log(`[bridge] listening on ws://${host}:${port}`);
  });

  return { wss, shutdown };
}
