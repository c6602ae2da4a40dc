export { RelayServer, type RelayServerOptions } from './relay-server.js';
export { getInstance, hasInstance, resetInstance } from './instance.js';
export { runConsoleRelay } from './console-relay.js';
export { loadConfig, parsePortArg, parseHeartbeatConfig, resolveHeartbeatConfig, heartbeatIntervalMs, DEFAULT_PORT, type RelayConfig } from './config.js';
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './logger.js';
export { ClientDirectory } from './relay/client-directory.js';
export { ActionDispatcher, type ActionHandler, type HandlerContext, type HandlerMap } from './relay/dispatcher.js';
export { defaultHandlers } from './relay/handlers.js';
export { HeartbeatScheduler } from './relay/heartbeat.js';
export { Messenger, type Recipient } from './relay/messenger.js';
export { Throttle, ThrottleInterruptedError, type Permit } from './relay/throttle.js';
export { WsTransport } from './transport/ws-server.js';
export type { Transport, TransportConnection, TransportHandlers, ListenOptions } from './transport/transport.js';
export {
  WsAction,
  wsActions,
  inboundActions,
  decodeEnvelope,
  encodeEnvelope,
  type InboundAction,
  type MessageEnvelope,
  type Payload,
  type ConfigurationPayload
} from './transport/ws-protocol.js';
export { ClientType, type ClientMetadata, type HeartbeatConfig, type ServerState } from './types.js';
