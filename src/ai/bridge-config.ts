/**
 * Bridge runtime configuration, read from the environment.
 *
 *   BRIDGE_PORT  TCP port, 1-65535 (default 9876)
 *   BRIDGE_HOST  Loopback address to bind (default 127.0.0.1)
 */

export interface BridgeConfig {
  port: number;
  host: string;
}

export const DEFAULT_BRIDGE_CONFIG = {
  port: 9876,
  host: '127.0.0.1',
} as const satisfies BridgeConfig;

const LOOPBACK_HOSTS = ['127.0.0.1', '::1', 'localhost'];

export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const rawPort = env.BRIDGE_PORT;
  const port = rawPort === undefined ? DEFAULT_BRIDGE_CONFIG.port : Number(rawPort);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${rawPort}. Must be 1-65535.`);
  }

  const host = env.BRIDGE_HOST ?? DEFAULT_BRIDGE_CONFIG.host;
  if (!LOOPBACK_HOSTS.includes(host)) {
    throw new Error(`Invalid host: ${host}. The bridge binds to loopback only (${LOOPBACK_HOSTS.join(', ')}).`);
  }

  return { port, host };
}
