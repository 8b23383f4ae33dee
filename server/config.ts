/**
 * サーバー設定（環境変数から読み込み）
 * 未設定・不正な値はデフォルトにフォールバック
 */

import type { CapacityMode } from '../src/types/activity';
import type { LogLevel } from './utils/log';

export interface ServerConfig {
  port: number;
  host: string;
  capacityMode: CapacityMode;
  logLevel: LogLevel;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '0.0.0.0';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

type Env = Record<string, string | undefined>;

/** 1-65535 の整数のみ。それ以外は null */
export function normalizePort(raw: string | undefined): number | null {
  if (raw == null) return null;
  const s = raw.trim();
  if (!/^\d+$/.test(s)) return null;
  const port = Number.parseInt(s, 10);
  return port >= 1 && port <= 65535 ? port : null;
}

export function normalizeCapacityMode(raw: string | undefined): CapacityMode | null {
  const s = (raw ?? '').trim().toLowerCase();
  if (s === 'enforce' || s === 'track') return s;
  return null;
}

export function normalizeLogLevel(raw: string | undefined): LogLevel | null {
  const s = (raw ?? '').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === s) ?? null;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const host = (env.HOST ?? '').trim();
  const defaultLogLevel: LogLevel = env.NODE_ENV === 'test' ? 'silent' : 'info';
  return {
    port: normalizePort(env.PORT) ?? DEFAULT_PORT,
    host: host || DEFAULT_HOST,
    capacityMode: normalizeCapacityMode(env.ACTIVITY_CAPACITY_MODE) ?? 'enforce',
    logLevel: normalizeLogLevel(env.LOG_LEVEL) ?? defaultLogLevel,
  };
}
