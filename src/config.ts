/**
 * Configuration for the torrent daemon client
 */

import 'dotenv/config';
import path from 'path';
import type { LogLevel } from './domain/interfaces/ILogger';

export interface Config {
  PORT: number;
  // Daemon RPC endpoint, e.g. http://localhost:9091/transmission/rpc
  RPC_URL: string;
  RPC_USERNAME?: string;
  RPC_PASSWORD?: string;
  // Per-call timeout for RPC requests (ms); a timed out call fails like any other transport error
  RPC_TIMEOUT: number;
  LOG_LEVEL: LogLevel;
  LOG_TO_FILE: boolean;
  // Runtime directory for log files
  RUNTIME_DIR: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function readNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && value !== '' && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value?.toLowerCase());
  return level ?? 'info';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    PORT: readNumber(env.PORT, 3000),

    RPC_URL: env.RPC_URL || 'http://localhost:9091/transmission/rpc',
    RPC_USERNAME: env.RPC_USERNAME || undefined,
    RPC_PASSWORD: env.RPC_PASSWORD || undefined,
    RPC_TIMEOUT: readNumber(env.RPC_TIMEOUT, 10000), // 10 seconds

    LOG_LEVEL: readLogLevel(env.LOG_LEVEL),
    LOG_TO_FILE: env.LOG_TO_FILE !== 'false',
    RUNTIME_DIR: env.RUNTIME_DIR || path.join(process.cwd(), '.runtime')
  };
}

const config: Config = loadConfig();

export default config;
