import { startBridgeServer } from './bridge-server';
import { parsePort } from './bridge-config';

let port: number;
try {
  port = parsePort(process.env.BRIDGE_PORT);
} catch (err) {
  console.error(`[bridge] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
startBridgeServer({ port });
