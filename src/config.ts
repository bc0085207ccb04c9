import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import dotenv from 'dotenv';
import { createLogger } from './logger.js';
import { isRecord } from './sonos/json.js';
import type { GatewayConfig, PlayMode } from './sonos/types.js';

export const DEFAULT_SONOS_API_URL = 'http://192.168.0.5:5005';
export const DEFAULT_FILE_SERVER = '192.168.0.6/mp3';
export const DEFAULT_PLAY_MODE: PlayMode = 'share';

const PLAY_MODES: readonly PlayMode[] = ['share', 'clip'];

const log = createLogger('Config');

/**
 * Layered settings before validation. The play mode and timeout are only
 * checked by resolveGatewayConfig, once command-line flags are merged in.
 */
export interface Config {
  apiUrl: string;
  fileServer: string;
  playMode: string;
  requestTimeoutMs?: string | number;
  defaultRoom?: string;
}

interface FileConfig {
  sonosApiUrl?: string;
  fileServer?: string;
  playMode?: string;
  defaultRoom?: string;
  requestTimeoutMs?: number;
}

export function defaultConfigPath(): string {
  return join(homedir(), '.config', 'sonos-gateway', 'config.json');
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function loadFileConfig(configPath = defaultConfigPath()): FileConfig {
  if (!existsSync(configPath)) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    if (!isRecord(parsed)) {
      log.warn(`Ignoring ${configPath}: expected a JSON object`);
      return {};
    }
    return {
      sonosApiUrl: optionalString(parsed.sonosApiUrl),
      fileServer: optionalString(parsed.fileServer),
      playMode: optionalString(parsed.playMode),
      defaultRoom: optionalString(parsed.defaultRoom),
      requestTimeoutMs:
        typeof parsed.requestTimeoutMs === 'number' ? parsed.requestTimeoutMs : undefined,
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    log.warn(`Ignoring ${configPath}: ${reason}`);
    return {};
  }
}

export function parsePlayMode(value: string): PlayMode {
  const mode = PLAY_MODES.find((candidate) => candidate === value.toLowerCase());
  if (!mode) {
    throw new Error(`Unknown play mode "${value}" (expected one of: ${PLAY_MODES.join(', ')})`);
  }
  return mode;
}

function parseTimeout(value: string | number): number {
  const timeout = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new Error(`Request timeout must be a positive number of milliseconds, got "${value}"`);
  }
  return timeout;
}

/** Fill unset fields with the defaults. */
export function resolveGatewayConfig(partial: {
  apiUrl?: string;
  fileServer?: string;
  playMode?: string;
  requestTimeoutMs?: string | number;
}): GatewayConfig {
  const config: GatewayConfig = {
    apiUrl: (partial.apiUrl || DEFAULT_SONOS_API_URL).replace(/\/+$/, ''),
    fileServer: partial.fileServer || DEFAULT_FILE_SERVER,
    playMode: partial.playMode ? parsePlayMode(partial.playMode) : DEFAULT_PLAY_MODE,
  };
  if (partial.requestTimeoutMs !== undefined && partial.requestTimeoutMs !== '') {
    config.requestTimeoutMs = parseTimeout(partial.requestTimeoutMs);
  }
  return config;
}

/**
 * Environment (including .env) first, then the JSON config file, then
 * the defaults.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  configPath = defaultConfigPath()
): Config {
  if (env === process.env) {
    dotenv.config();
  }
  const fileConfig = loadFileConfig(configPath);

  return {
    apiUrl: env.SONOS_API_URL || fileConfig.sonosApiUrl || DEFAULT_SONOS_API_URL,
    fileServer: env.SONOS_FILE_SERVER || fileConfig.fileServer || DEFAULT_FILE_SERVER,
    playMode: env.SONOS_PLAY_MODE || fileConfig.playMode || DEFAULT_PLAY_MODE,
    requestTimeoutMs: env.SONOS_REQUEST_TIMEOUT_MS || fileConfig.requestTimeoutMs,
    defaultRoom: env.SONOS_DEFAULT_ROOM || fileConfig.defaultRoom,
  };
}
