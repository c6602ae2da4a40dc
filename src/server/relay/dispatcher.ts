import { inboundActions, isInboundAction, type InboundAction, type MessageEnvelope, type Payload } from '../transport/ws-protocol.js';
import type { TransportConnection } from '../transport/transport.js';
import type { Counters } from '../metrics/counters.js';
import type { Logger } from '../logger.js';
import type { ClientDirectory } from './client-directory.js';
import type { Messenger } from './messenger.js';

export interface HandlerContext {
  connection: TransportConnection;
  payload: Payload;
  directory: ClientDirectory;
  messenger: Messenger;
  counters: Counters;
  logger: Logger;
}

export type ActionHandler = (ctx: HandlerContext) => void | Promise<void>;

export type HandlerMap = Record<InboundAction, ActionHandler>;

export interface DispatcherDeps {
  directory: ClientDirectory;
  messenger: Messenger;
  counters: Counters;
  logger: Logger;
}

/** Routes decoded envelopes to the handler registered for their action. */
export class ActionDispatcher {
  private readonly handlers: ReadonlyMap<InboundAction, ActionHandler>;

  constructor(handlers: HandlerMap, private readonly deps: DispatcherDeps) {
    this.handlers = new Map(inboundActions.map((action): [InboundAction, ActionHandler] => [action, handlers[action]]));
  }

  /** Resolves true when a handler ran to completion. Never rejects. */
  async dispatch(connection: TransportConnection, envelope: MessageEnvelope): Promise<boolean> {
    const { action, payload } = envelope;
    const handler = isInboundAction(action) ? this.handlers.get(action) : undefined;
    if (!handler) {
      this.deps.logger.warn('dispatch', `no handler for ${action} from ${connection.id}, dropped`);
      return false;
    }

    try {
      await handler({ connection, payload, ...this.deps });
      return true;
    } catch (error) {
      this.deps.counters.handlerErrorTotal += 1;
      this.deps.logger.error('dispatch', `${action} handler failed for ${connection.id}`, error);
      return false;
    }
  }
}
