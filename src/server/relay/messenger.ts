import { encodeEnvelope, type Payload, type WsAction } from '../transport/ws-protocol.js';
import type { TransportConnection } from '../transport/transport.js';
import type { Counters } from '../metrics/counters.js';
import type { Logger } from '../logger.js';
import type { ClientDirectory } from './client-directory.js';

export type Recipient =
  | { connection: TransportConnection }
  | { clientType: string }
  | { clientUid: string };

export interface MessengerDeps {
  directory: ClientDirectory;
  connections: () => Iterable<TransportConnection>;
  isStarted: () => boolean;
  counters: Counters;
  logger: Logger;
}

/** Addressed and broadcast delivery of envelopes. Sends never throw. */
export class Messenger {
  constructor(private readonly deps: MessengerDeps) {}

  sendTo(recipient: Recipient, action: WsAction, payload: Payload = {}): boolean {
    if ('connection' in recipient) return this.sendToConnection(recipient.connection, action, payload);
    if ('clientType' in recipient) return this.sendToClientType(recipient.clientType, action, payload);
    return this.sendToClientUid(recipient.clientUid, action, payload);
  }

  sendToConnection(connection: TransportConnection, action: WsAction, payload: Payload = {}): boolean {
    return this.deliver(connection, encodeEnvelope(action, payload));
  }

  sendToClientType(clientType: string, action: WsAction, payload: Payload = {}): boolean {
    const connection = this.deps.directory.findByType(clientType);
    if (!connection) {
      this.deps.logger.debug('send', `no open client of type ${clientType} for ${action}`);
      return false;
    }
    return this.sendToConnection(connection, action, payload);
  }

  sendToClientUid(clientUid: string, action: WsAction, payload: Payload = {}): boolean {
    const connection = this.deps.directory.findByUid(clientUid);
    if (!connection) {
      this.deps.logger.debug('send', `no open client with uid ${clientUid} for ${action}`);
      return false;
    }
    return this.sendToConnection(connection, action, payload);
  }

  /** Returns how many connections the frame was handed to. */
  broadcast(action: WsAction, payload: Payload = {}): number {
    const text = encodeEnvelope(action, payload);
    let delivered = 0;
    for (const connection of this.deps.connections()) {
      if (this.deliver(connection, text)) delivered += 1;
    }
    return delivered;
  }

  private deliver(connection: TransportConnection, text: string): boolean {
    if (!this.deps.isStarted() || !connection.isOpen()) return false;
    try {
      connection.send(text);
      return true;
    } catch (error) {
      this.deps.counters.sendFailureTotal += 1;
      this.deps.logger.warn('send', `send to ${connection.id} failed`, error);
      return false;
    }
  }
}
