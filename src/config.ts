import 'dotenv/config';

function getEnv(key: string, def: string): string {
  const v = process.env[key];
  return v !== undefined && v !== '' ? v : def;
}

function getEnvInt(key: string, def: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return def;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? def : n;
}

export interface Config {
  appEnv: string;
  /** TCP listener for key-value traffic. */
  kvHost: string;
  kvPort: number;
  /** HTTP listener for /health, /ready and /stats. */
  appHost: string;
  port: number;
  logLevel: string;
  /** Max open connections per client address (0 = unlimited). */
  maxConnectionsPerIp: number;
  /** Max open connections across all addresses (0 = unlimited). */
  maxConnectionsTotal: number;
  /** Largest frame body accepted from a client, in bytes. */
  maxFrameBytes: number;
}

export function loadConfig(): Config {
  return {
    appEnv: getEnv('APP_ENV', 'development'),
    kvHost: getEnv('KV_HOST', '::1'),
    kvPort: getEnvInt('KV_PORT', 8899),
    appHost: getEnv('APP_HOST', '0.0.0.0'),
    port: getEnvInt('APP_PORT', 8898),
    logLevel: getEnv('LOG_LEVEL', 'info'),
    maxConnectionsPerIp: Math.max(0, getEnvInt('KV_MAX_CONNECTIONS_PER_IP', 1)),
    maxConnectionsTotal: Math.max(0, getEnvInt('KV_MAX_CONNECTIONS_TOTAL', 10)),
    maxFrameBytes: getEnvInt('KV_MAX_FRAME_BYTES', 8 * 1024 * 1024) || 8 * 1024 * 1024,
  };
}
