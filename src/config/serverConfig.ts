import path from 'node:path';
import { fileURLToPath } from 'node:url';

export const APP_NAME = 'BardBox';

export type AudioOutputKind = 'mpv' | 'silent';
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface ServerConfig {
  host: string;
  port: number;
  dataDir: string;
  staticDir: string;
  musicDir: string;
  iconDir: string;
  mappingFile: string;
  logLevel: LogLevel;
  audioOutput: AudioOutputKind;
  mpvPath: string;
  maxUploadBytes: number;
}

type Env = Record<string, string | undefined>;

const PROJECT_ROOT = fileURLToPath(new URL('../..', import.meta.url));
const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parsePort(rawValue: string | undefined, fallback: number): number {
  if (!rawValue || !/^[0-9]{1,5}$/.test(rawValue)) {
    return fallback;
  }
  const port = Number(rawValue);
  return port >= 1 && port <= 65_535 ? port : fallback;
}

function parsePositiveNumber(rawValue: string | undefined, fallback: number): number {
  const value = rawValue === undefined ? Number.NaN : Number(rawValue);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseLogLevel(rawValue: string | undefined): LogLevel {
  const value = rawValue?.toLowerCase();
  return value && isLogLevel(value) ? value : 'info';
}

function parseAudioOutput(rawValue: string | undefined): AudioOutputKind {
  return rawValue?.toLowerCase() === 'silent' ? 'silent' : 'mpv';
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const dataDir = path.resolve(readString(env, 'BARDBOX_DATA_DIR') ?? path.join(PROJECT_ROOT, 'data'));
  const staticDir = path.resolve(readString(env, 'BARDBOX_STATIC_DIR') ?? path.join(PROJECT_ROOT, 'static'));
  const maxUploadMb = parsePositiveNumber(readString(env, 'BARDBOX_MAX_UPLOAD_MB'), 50);

  return {
    host: readString(env, 'BARDBOX_HOST') ?? '0.0.0.0',
    port: parsePort(readString(env, 'BARDBOX_PORT'), 8000),
    dataDir,
    staticDir,
    musicDir: path.join(staticDir, 'music'),
    iconDir: path.join(staticDir, 'icons'),
    mappingFile: path.join(dataDir, 'mappings.json'),
    logLevel: parseLogLevel(readString(env, 'BARDBOX_LOG_LEVEL')),
    audioOutput: parseAudioOutput(readString(env, 'BARDBOX_AUDIO_OUTPUT')),
    mpvPath: readString(env, 'BARDBOX_MPV_PATH') ?? 'mpv',
    maxUploadBytes: Math.round(maxUploadMb * 1024 * 1024),
  };
}
