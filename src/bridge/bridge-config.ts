/**
 * Bridge Configuration — types, defaults and environment parsing.
 *
 * All limits for the WebSocket bridge live here. Localhost only.
 */

export interface BridgeConfig {
  host: string;
  port: number;
  /** Largest inbound message in bytes */
  maxPayload: number;
  /** Hard exit if connections have not closed by then */
  shutdownTimeoutMs: number;
}

export const DEFAULT_BRIDGE_CONFIG = {
  host: '127.0.0.1',
  port: 9876,
  maxPayload: 65_536,
  shutdownTimeoutMs: 5000,
} as const satisfies BridgeConfig;

/** Parse a TCP port from an environment value. Unset → default port. */
export function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_BRIDGE_CONFIG.port;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${raw}. Must be 1-65535.`);
  }
  return port;
}
