import path from 'path';
import { DEFAULT_OPEN_TIMEOUT_MS, DEFAULT_SCAN_INTERVAL_SEC } from './core/constants';
import { clampScanInterval } from './services/PollScheduler';

export interface ServerConfig {
  port: number;
  dataDir: string;
  defaultScanIntervalSec: number;
  openTimeoutMs: number;
  setupRetryMs: number;
  fakeRadio: boolean;
}

export type Env = Record<string, string | undefined>;

function positiveInt(value: string | undefined, fallback: number): number {
  const n = Number(String(value ?? '').trim());
  if (Number.isFinite(n) && n > 0) return Math.floor(n);
  return fallback;
}

function flag(value: string | undefined): boolean {
  const v = String(value ?? '').trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes';
}

export function loadServerConfig(env: Env = process.env, defaultDataDir = path.resolve(__dirname, '..', 'data')): ServerConfig {
  const scan = env.MESH_SCAN_INTERVAL?.trim();
  return {
    port: positiveInt(env.PORT, 9001),
    dataDir: env.DATA_DIR?.trim() || defaultDataDir,
    defaultScanIntervalSec: scan ? clampScanInterval(scan) : DEFAULT_SCAN_INTERVAL_SEC,
    openTimeoutMs: positiveInt(env.MESH_OPEN_TIMEOUT_MS, DEFAULT_OPEN_TIMEOUT_MS),
    setupRetryMs: positiveInt(env.MESH_SETUP_RETRY_MS, 30_000),
    fakeRadio: flag(env.MESH_FAKE_RADIO),
  };
}
