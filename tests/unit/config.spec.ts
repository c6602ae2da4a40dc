import { describe, expect, it } from 'vitest';
import { convertDuration, heartbeatIntervalMs, loadConfig, parsePortArg, resolveHeartbeatConfig } from '../../src/server/config.js';

describe('config', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 8855,
      host: undefined,
      heartbeat: {
        connectionLostTimeoutSeconds: 6,
        heartbeatEnabled: true,
        heartbeatIntervalUnit: 'seconds',
        heartbeatIntervalValue: 6,
        heartbeatToleranceFactor: 0.5
      },
      maxConcurrentMessages: 500,
      stopGraceMs: 1000,
      logLevel: 'info'
    });
  });

  it('reads overrides from the environment', () => {
    const cfg = loadConfig({
      RELAY_PORT: '9999',
      RELAY_HEARTBEAT_ENABLED: 'false',
      RELAY_HEARTBEAT_UNIT: 'milliseconds',
      RELAY_CONNECTION_LOST_TIMEOUT_S: '4',
      RELAY_MAX_CONCURRENT_MESSAGES: '1',
      RELAY_LOG_LEVEL: 'debug'
    });
    expect(cfg.port).toBe(9999);
    expect(cfg.heartbeat.heartbeatEnabled).toBe(false);
    expect(cfg.heartbeat.heartbeatIntervalValue).toBe(4000);
    expect(heartbeatIntervalMs(cfg.heartbeat)).toBe(4000);
    expect(cfg.maxConcurrentMessages).toBe(1);
    expect(cfg.logLevel).toBe('debug');
  });

  it('falls back to PORT', () => {
    expect(loadConfig({ PORT: '7000' }).port).toBe(7000);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ RELAY_PORT: 'abc' })).toThrow();
    expect(() => loadConfig({ RELAY_HEARTBEAT_UNIT: 'hours' })).toThrow();
  });

  it('derives the interval from the timeout in the configured unit', () => {
    expect(resolveHeartbeatConfig({ connectionLostTimeoutSeconds: 120, heartbeatIntervalUnit: 'minutes' }).heartbeatIntervalValue).toBe(2);
    expect(resolveHeartbeatConfig({ connectionLostTimeoutSeconds: 0 }).heartbeatIntervalValue).toBe(1);
    expect(convertDuration(6, 'seconds', 'milliseconds')).toBe(6000);
  });

  it('keeps an explicit interval', () => {
    const hb = resolveHeartbeatConfig({ heartbeatIntervalValue: 250, heartbeatIntervalUnit: 'milliseconds' });
    expect(heartbeatIntervalMs(hb)).toBe(250);
  });

  it('parses the port argument', () => {
    expect(parsePortArg('9999', 8855)).toBe(9999);
    expect(parsePortArg(undefined, 8855)).toBe(8855);
    expect(parsePortArg('http', 8855)).toBe(8855);
    expect(parsePortArg('70000', 8855)).toBe(8855);
  });
});
