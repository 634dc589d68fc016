import { startBridgeServer } from './bridge-server';
import { loadBridgeConfig } from './bridge-config';
import type { BridgeConfig } from './bridge-config';

function readConfig(): BridgeConfig {
  try {
    return loadBridgeConfig();
  } catch (err) {
    console.error(`[bridge] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

startBridgeServer(readConfig());
