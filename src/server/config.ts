import { z } from 'zod';
import type { HeartbeatConfig, HeartbeatUnit } from './types.js';
import type { LogLevel } from './logger.js';

export const DEFAULT_PORT = 8855;
export const DEFAULT_MAX_CONCURRENT_MESSAGES = 500;
export const DEFAULT_STOP_GRACE_MS = 1_000;

const unitMs: Record<HeartbeatUnit, number> = { milliseconds: 1, seconds: 1_000, minutes: 60_000 };

export function toMilliseconds(value: number, unit: HeartbeatUnit): number {
  return Math.round(value * unitMs[unit]);
}

export function convertDuration(value: number, from: HeartbeatUnit, to: HeartbeatUnit): number {
  return Math.floor((value * unitMs[from]) / unitMs[to]);
}

/** Interval used by the heartbeat scheduler and announced to clients. */
export function heartbeatIntervalMs(hb: HeartbeatConfig): number {
  return toMilliseconds(hb.heartbeatIntervalValue, hb.heartbeatIntervalUnit);
}

const heartbeatUnitSchema = z.enum(['milliseconds', 'seconds', 'minutes']);

export const heartbeatConfigSchema = z.object({
  connectionLostTimeoutSeconds: z.number().int().min(0),
  heartbeatEnabled: z.boolean(),
  heartbeatIntervalUnit: heartbeatUnitSchema,
  heartbeatIntervalValue: z.number().int().positive(),
  heartbeatToleranceFactor: z.number().positive()
});

export type HeartbeatOverrides = Partial<HeartbeatConfig>;

function withHeartbeatDefaults(overrides: HeartbeatOverrides): HeartbeatOverrides {
  const connectionLostTimeoutSeconds = overrides.connectionLostTimeoutSeconds ?? 6;
  const heartbeatIntervalUnit = overrides.heartbeatIntervalUnit ?? 'seconds';
  const derived = convertDuration(connectionLostTimeoutSeconds, 'seconds', heartbeatIntervalUnit);
  return {
    connectionLostTimeoutSeconds,
    heartbeatEnabled: overrides.heartbeatEnabled ?? true,
    heartbeatIntervalUnit,
    heartbeatIntervalValue: overrides.heartbeatIntervalValue ?? Math.max(derived, 1),
    heartbeatToleranceFactor: overrides.heartbeatToleranceFactor ?? 0.5
  };
}

/** Like `resolveHeartbeatConfig`, but reports invalid settings instead of throwing. */
export function parseHeartbeatConfig(overrides: HeartbeatOverrides = {}) {
  return heartbeatConfigSchema.safeParse(withHeartbeatDefaults(overrides));
}

/**
 * Fills the gaps in a partial heartbeat configuration. Without an explicit
 * interval the heartbeat runs at the connection-lost timeout expressed in
 * the configured unit.
 */
export function resolveHeartbeatConfig(overrides: HeartbeatOverrides = {}): HeartbeatConfig {
  return heartbeatConfigSchema.parse(withHeartbeatDefaults(overrides));
}

const boolFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  RELAY_PORT: z.coerce.number().int().min(0).max(65_535).optional(),
  PORT: z.coerce.number().int().min(0).max(65_535).optional(),
  RELAY_HOST: z.string().min(1).optional(),
  RELAY_CONNECTION_LOST_TIMEOUT_S: z.coerce.number().int().min(0).optional(),
  RELAY_HEARTBEAT_ENABLED: boolFromEnv.optional(),
  RELAY_HEARTBEAT_UNIT: heartbeatUnitSchema.optional(),
  RELAY_HEARTBEAT_INTERVAL: z.coerce.number().int().positive().optional(),
  RELAY_HEARTBEAT_TOLERANCE: z.coerce.number().positive().optional(),
  RELAY_MAX_CONCURRENT_MESSAGES: z.coerce.number().int().positive().optional(),
  RELAY_STOP_GRACE_MS: z.coerce.number().int().min(0).optional(),
  RELAY_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()
});

export interface RelayConfig {
  port: number;
  host?: string;
  heartbeat: HeartbeatConfig;
  maxConcurrentMessages: number;
  stopGraceMs: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const e = envSchema.parse(env);
  return {
    port: e.RELAY_PORT ?? e.PORT ?? DEFAULT_PORT,
    host: e.RELAY_HOST,
    heartbeat: resolveHeartbeatConfig({
      connectionLostTimeoutSeconds: e.RELAY_CONNECTION_LOST_TIMEOUT_S,
      heartbeatEnabled: e.RELAY_HEARTBEAT_ENABLED,
      heartbeatIntervalUnit: e.RELAY_HEARTBEAT_UNIT,
      heartbeatIntervalValue: e.RELAY_HEARTBEAT_INTERVAL,
      heartbeatToleranceFactor: e.RELAY_HEARTBEAT_TOLERANCE
    }),
    maxConcurrentMessages: e.RELAY_MAX_CONCURRENT_MESSAGES ?? DEFAULT_MAX_CONCURRENT_MESSAGES,
    stopGraceMs: e.RELAY_STOP_GRACE_MS ?? DEFAULT_STOP_GRACE_MS,
    logLevel: e.RELAY_LOG_LEVEL ?? 'info'
  };
}

/** Port from a command-line argument; anything that is not a valid port falls back. */
export function parsePortArg(arg: string | undefined, fallback: number): number {
  if (arg === undefined || arg.trim() === '') return fallback;
  const port = Number(arg);
  return Number.isInteger(port) && port >= 0 && port <= 65_535 ? port : fallback;
}
