import { Readable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { runConsoleRelay } from '../../src/server/console-relay.js';
import { RelayServer } from '../../src/server/relay-server.js';
import { MemoryTransport } from '../helpers/memory-transport.js';
import { recordingLogger } from '../helpers/recording-logger.js';

function setup() {
  const transport = new MemoryTransport();
  const server = new RelayServer({
    port: 9999,
    transport,
    logger: recordingLogger(),
    shutdownSignals: [],
    heartbeat: { heartbeatEnabled: false }
  });
  return { transport, server };
}

const lines = (text: string) => Readable.from([Buffer.from(text)]);

describe('console relay', () => {
  it('broadcasts each line until quit, then stops the server', async () => {
    const { server, transport } = setup();
    await server.start();
    const a = transport.connect('a');
    const b = transport.connect('b');

    await expect(runConsoleRelay(server, lines('hello\nsecond line\nquit\nafter quit\n'))).resolves.toBe(true);

    const expected = [
      { action: 'INFO_MESSAGE', payload: { messageType: 'info', message: 'hello' } },
      { action: 'INFO_MESSAGE', payload: { messageType: 'info', message: 'second line' } }
    ];
    expect(a.envelopes().slice(2)).toEqual(expected);
    expect(b.envelopes().slice(2)).toEqual(expected);
    expect(server.state).toBe('stopped');
  });

  it('starts a server that is not running yet', async () => {
    const { server, transport } = setup();
    await expect(runConsoleRelay(server, lines('quit\n'))).resolves.toBe(true);
    expect(transport.listenOptions?.port).toBe(9999);
    expect(transport.closedWithGraceMs).toBe(1_000);
    expect(server.state).toBe('stopped');
  });

  it('stops at the end of input without quit', async () => {
    const { server, transport } = setup();
    await server.start();
    const a = transport.connect('a');

    await expect(runConsoleRelay(server, lines('only\n'))).resolves.toBe(true);
    expect(a.envelopes().slice(2)).toEqual([{ action: 'INFO_MESSAGE', payload: { messageType: 'info', message: 'only' } }]);
    expect(server.state).toBe('stopped');
  });

  it('gives up when the server cannot start', async () => {
    const { server, transport } = setup();
    transport.failListen = new Error('EADDRINUSE');
    await expect(runConsoleRelay(server, lines('hello\nquit\n'))).resolves.toBe(false);
    expect(server.state).toBe('stopped');
  });
});
