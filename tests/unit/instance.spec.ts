import { afterEach, describe, expect, it } from 'vitest';
import { getInstance, hasInstance, resetInstance } from '../../src/server/instance.js';
import { recordingLogger } from '../helpers/recording-logger.js';

describe('getInstance', () => {
  afterEach(() => {
    resetInstance();
  });

  it('builds the server on first use with the given port', () => {
    expect(hasInstance()).toBe(false);
    const server = getInstance(9999, { shutdownSignals: [] });
    expect(server.port).toBe(9999);
    expect(hasInstance()).toBe(true);
  });

  it('defaults to port 8855', () => {
    expect(getInstance(undefined, { shutdownSignals: [] }).port).toBe(8855);
  });

  it('returns the same server and ignores a later port', () => {
    const logger = recordingLogger();
    const first = getInstance(9999, { logger, shutdownSignals: [] });
    const second = getInstance(7000, { logger });
    expect(second).toBe(first);
    expect(second.port).toBe(9999);
    expect(logger.messages('warn')).toEqual(['server already created on port 9999, ignoring port 7000']);
  });
});
