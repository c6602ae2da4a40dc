import { describe, expect, it } from 'vitest';
import { Counters } from '../../src/server/metrics/counters.js';
import { ClientDirectory } from '../../src/server/relay/client-directory.js';
import { Messenger } from '../../src/server/relay/messenger.js';
import { WsAction } from '../../src/server/transport/ws-protocol.js';
import { MemoryConnection } from '../helpers/memory-transport.js';
import { recordingLogger } from '../helpers/recording-logger.js';

function setup(started = true) {
  const a = new MemoryConnection('a');
  const b = new MemoryConnection('b');
  const conns = [a, b];
  const directory = new ClientDirectory(() => conns);
  directory.attach(a, 1);
  directory.attach(b, 1);
  const counters = new Counters();
  const logger = recordingLogger();
  const messenger = new Messenger({ directory, connections: () => conns, isStarted: () => started, counters, logger });
  return { a, b, directory, counters, logger, messenger };
}

describe('messenger', () => {
  it('sends to a connection while started', () => {
    const { a, messenger } = setup();
    expect(messenger.sendToConnection(a, WsAction.InfoMessage, { message: 'hi' })).toBe(true);
    expect(a.sent).toEqual(['{"action":"INFO_MESSAGE","payload":{"message":"hi"}}']);
  });

  it('refuses to send when the server is not started', () => {
    const { a, messenger } = setup(false);
    expect(messenger.sendToConnection(a, WsAction.InfoMessage, {})).toBe(false);
    expect(messenger.broadcast(WsAction.Heartbeat)).toBe(0);
    expect(a.sent).toEqual([]);
  });

  it('refuses to send to a closed connection', () => {
    const { a, messenger } = setup();
    a.open = false;
    expect(messenger.sendToConnection(a, WsAction.InfoMessage, {})).toBe(false);
    expect(a.sent).toEqual([]);
  });

  it('addresses by client type and uid only to the registered connection', () => {
    const { a, b, directory, messenger } = setup();
    directory.register(a, 'X', 'u1', 2);

    expect(messenger.sendTo({ clientType: 'X' }, WsAction.InfoMessage, { n: 1 })).toBe(true);
    expect(messenger.sendTo({ clientUid: 'u1' }, WsAction.InfoMessage, { n: 2 })).toBe(true);
    expect(a.actions()).toEqual(['INFO_MESSAGE', 'INFO_MESSAGE']);
    expect(b.sent).toEqual([]);
  });

  it('returns false when no client matches', () => {
    const { messenger, a, b } = setup();
    expect(messenger.sendToClientType('Y', WsAction.InfoMessage, {})).toBe(false);
    expect(messenger.sendToClientUid('u9', WsAction.InfoMessage, {})).toBe(false);
    expect(messenger.sendTo({ connection: a }, WsAction.Heartbeat)).toBe(true);
    expect(b.sent).toEqual([]);
  });

  it('keeps broadcasting when one connection fails', () => {
    const { a, b, counters, logger, messenger } = setup();
    a.failSend = true;
    expect(messenger.broadcast(WsAction.Heartbeat, {})).toBe(1);
    expect(b.sent).toEqual(['{"action":"HEARTBEAT","payload":{}}']);
    expect(counters.sendFailureTotal).toBe(1);
    expect(logger.messages('warn')).toEqual(['send to a failed']);
  });
});
