import { createStatusApp } from './api/app.js';
import type { RelayContext } from './api/types.js';
import {
  DEFAULT_MAX_CONCURRENT_MESSAGES,
  DEFAULT_PORT,
  DEFAULT_STOP_GRACE_MS,
  heartbeatIntervalMs,
  parseHeartbeatConfig,
  resolveHeartbeatConfig,
  type HeartbeatOverrides
} from './config.js';
import { createConsoleLogger, type Logger } from './logger.js';
import { Counters } from './metrics/counters.js';
import { ClientDirectory } from './relay/client-directory.js';
import { ActionDispatcher, type HandlerMap } from './relay/dispatcher.js';
import { defaultHandlers } from './relay/handlers.js';
import { HeartbeatScheduler } from './relay/heartbeat.js';
import { Messenger } from './relay/messenger.js';
import { Throttle, ThrottleInterruptedError } from './relay/throttle.js';
import { settleWithin } from './timing.js';
import type { Transport, TransportConnection, TransportHandlers } from './transport/transport.js';
import { WsAction, decodeEnvelope, type ConfigurationPayload } from './transport/ws-protocol.js';
import { WsTransport } from './transport/ws-server.js';
import type { HeartbeatConfig, RelayMetrics, ServerState } from './types.js';

export interface RelayServerOptions {
  port?: number;
  host?: string;
  heartbeat?: HeartbeatOverrides;
  /** 1 processes inbound messages strictly one at a time. */
  maxConcurrentMessages?: number;
  stopGraceMs?: number;
  /** Signals that stop the server and exit the process. Pass [] to leave signals alone. */
  shutdownSignals?: NodeJS.Signals[];
  handlers?: Partial<HandlerMap>;
  logger?: Logger;
  transport?: Transport;
  welcomeMessage?: string;
}

export class RelayServer {
  readonly port: number;
  readonly host?: string;
  readonly directory: ClientDirectory;
  readonly messenger: Messenger;
  readonly counters = new Counters();
  readonly throttle: Throttle;

  private currentState: ServerState = 'uninitialized';
  private heartbeatConfig: HeartbeatConfig;
  private heartbeat?: HeartbeatScheduler;
  private readonly transport: Transport;
  private readonly dispatcher: ActionDispatcher;
  private readonly logger: Logger;
  private readonly stopGraceMs: number;
  private readonly shutdownSignals: NodeJS.Signals[];
  private readonly welcomeMessage: string;
  private interrupt = new AbortController();
  private shutdownHook?: () => void;

  constructor(options: RelayServerOptions = {}) {
    this.port = options.port ?? DEFAULT_PORT;
    this.host = options.host;
    this.logger = options.logger ?? createConsoleLogger();
    this.transport = options.transport ?? new WsTransport();
    this.heartbeatConfig = resolveHeartbeatConfig(options.heartbeat);
    this.throttle = new Throttle(options.maxConcurrentMessages ?? DEFAULT_MAX_CONCURRENT_MESSAGES);
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    this.shutdownSignals = options.shutdownSignals ?? ['SIGINT', 'SIGTERM'];
    this.welcomeMessage = options.welcomeMessage ?? 'welcome!';

    const connections = () => this.transport.connections();
    this.directory = new ClientDirectory(connections);
    this.messenger = new Messenger({
      directory: this.directory,
      connections,
      isStarted: () => this.currentState === 'started',
      counters: this.counters,
      logger: this.logger
    });
    this.dispatcher = new ActionDispatcher(defaultHandlers(options.handlers), {
      directory: this.directory,
      messenger: this.messenger,
      counters: this.counters,
      logger: this.logger
    });
  }

  get state(): ServerState {
    return this.currentState;
  }

  get heartbeatSettings(): Readonly<HeartbeatConfig> {
    return this.heartbeatConfig;
  }

  /** Port actually bound (differs from `port` when 0 was requested). */
  boundPort(): number | undefined {
    return this.transport.port();
  }

  /** Only allowed while the server is not running. */
  configureHeartbeat(overrides: HeartbeatOverrides): boolean {
    if (this.currentState !== 'uninitialized' && this.currentState !== 'stopped') {
      this.logger.warn('lifecycle', `heartbeat settings cannot change while ${this.currentState}`);
      return false;
    }
    const parsed = parseHeartbeatConfig({ ...this.heartbeatConfig, ...overrides });
    if (!parsed.success) {
      const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ');
      this.logger.warn('lifecycle', `invalid heartbeat settings: ${problems}`);
      return false;
    }
    this.heartbeatConfig = parsed.data;
    return true;
  }

  async start(): Promise<boolean> {
    if (this.currentState === 'starting' || this.currentState === 'started' || this.currentState === 'stopping') {
      this.logger.warn('lifecycle', `start ignored, server is ${this.currentState}`);
      return false;
    }

    this.logger.info('lifecycle', 'starting...');
    this.currentState = 'starting';
    this.interrupt = new AbortController();
    this.installShutdownHook();
    this.transport.setConnectionLostTimeout(this.heartbeatConfig.connectionLostTimeoutSeconds);

    try {
      await this.transport.listen(
        { port: this.port, host: this.host, requestListener: createStatusApp(this.apiContext()) },
        this.transportHandlers()
      );
    } catch (error) {
      this.logger.error('lifecycle', `could not listen on ${this.port}`, error);
      this.removeShutdownHook();
      this.currentState = 'stopped';
      return false;
    }

    this.currentState = 'started';
    this.logger.info('lifecycle', `listening on ${this.boundPort() ?? this.port}`);

    if (this.heartbeatConfig.heartbeatEnabled) {
      this.heartbeat = new HeartbeatScheduler(heartbeatIntervalMs(this.heartbeatConfig), () => this.sendHeartbeat(), this.logger);
      this.heartbeat.start();
    } else {
      this.logger.info('heartbeat', 'disabled');
    }
    return true;
  }

  async stop(): Promise<boolean> {
    if (this.currentState !== 'started') {
      const why = this.currentState === 'starting' ? 'cannot stop while starting' : `server is ${this.currentState}`;
      this.logger.warn('lifecycle', `stop ignored, ${why}`);
      return false;
    }

    this.logger.info('lifecycle', 'stopping...');
    this.currentState = 'stopping';
    this.heartbeat?.stop();
    this.heartbeat = undefined;
    this.interrupt.abort();

    const giveUp = new AbortController();
    const drained = await settleWithin(this.throttle.idle(giveUp.signal), this.stopGraceMs);
    giveUp.abort();
    if (!drained) {
      this.logger.warn('lifecycle', `${this.throttle.inUse} message handler(s) still running after ${this.stopGraceMs}ms`);
    }
    try {
      await this.transport.close(this.stopGraceMs);
    } catch (error) {
      this.logger.error('lifecycle', 'transport close failed', error);
    }

    this.removeShutdownHook();
    this.currentState = 'stopped';
    this.logger.info('lifecycle', 'stopped');
    return true;
  }

  getMetrics(): RelayMetrics {
    return {
      state: this.currentState,
      wsConnections: this.transport.connections().length,
      clientsRegistered: this.directory.countRegistered(),
      permitsInUse: this.throttle.inUse,
      permitsPending: this.throttle.pending
    };
  }

  configurationPayload(): ConfigurationPayload {
    const hb = this.heartbeatConfig;
    return {
      connectionLostTimeout: hb.connectionLostTimeoutSeconds * 1_000,
      heartbeatEnabled: hb.heartbeatEnabled,
      heartbeatInterval: heartbeatIntervalMs(hb),
      heartbeatToleranceFactor: hb.heartbeatToleranceFactor
    };
  }

  /** Gate, decode and dispatch one inbound text frame. */
  async handleText(connection: TransportConnection, text: string): Promise<void> {
    this.counters.messagesReceivedTotal += 1;
    try {
      await this.throttle.run(async () => {
        this.logger.debug('ws', `message from ${connection.id}: ${text}`);
        const decoded = decodeEnvelope(text);
        if (!decoded.ok) {
          this.counters.protocolErrorTotal += 1;
          this.logger.warn('ws', `dropped message from ${connection.id}: ${decoded.reason}`);
          return;
        }
        await this.dispatcher.dispatch(connection, decoded.envelope);
      }, this.interrupt.signal);
    } catch (error) {
      if (!(error instanceof ThrottleInterruptedError)) throw error;
      this.counters.throttleInterruptTotal += 1;
      this.logger.warn('ws', `message from ${connection.id} abandoned: ${error.message}`);
    }
  }

  async handleBinary(connection: TransportConnection, data: Buffer): Promise<void> {
    this.counters.binaryFramesTotal += 1;
    try {
      await this.throttle.run(() => {
        this.logger.debug('ws', `binary frame (${data.length} bytes) from ${connection.id} ignored`);
      }, this.interrupt.signal);
    } catch (error) {
      if (!(error instanceof ThrottleInterruptedError)) throw error;
      this.counters.throttleInterruptTotal += 1;
    }
  }

  private sendHeartbeat(): void {
    this.counters.heartbeatTotal += 1;
    const delivered = this.messenger.broadcast(WsAction.Heartbeat, {});
    this.logger.debug('heartbeat', `sent to ${delivered} client(s)`);
  }

  private transportHandlers(): TransportHandlers {
    return {
      onOpen: (connection) => {
        this.directory.attach(connection, Date.now());
        this.logger.info('ws', `${connection.remoteAddress} connected as ${connection.id}`);
        this.messenger.sendToConnection(connection, WsAction.InfoMessage, { messageType: 'info', message: this.welcomeMessage });
        this.messenger.sendToConnection(connection, WsAction.InfoConfiguration, this.configurationPayload());
      },
      onClose: (connection, code, reason) => {
        this.counters.markWsClose(code);
        this.directory.detach(connection);
        this.logger.info('ws', `${connection.id} disconnected (${code}${reason ? ` ${reason}` : ''})`);
      },
      onText: (connection, text) => {
        this.handleText(connection, text).catch((error: unknown) => this.logger.error('ws', `message handling failed for ${connection.id}`, error));
      },
      onBinary: (connection, data) => {
        this.handleBinary(connection, data).catch((error: unknown) => this.logger.error('ws', `binary handling failed for ${connection.id}`, error));
      },
      onError: (connection, error) => {
        this.logger.error('ws', connection ? `error on ${connection.id}` : 'server error', error);
      }
    };
  }

  private apiContext(): RelayContext {
    return {
      port: () => this.boundPort(),
      state: () => this.currentState,
      directory: this.directory,
      counters: this.counters,
      getMetrics: () => this.getMetrics()
    };
  }

  private installShutdownHook(): void {
    if (this.shutdownSignals.length === 0 || this.shutdownHook) return;
    const hook = () => {
      this.logger.info('lifecycle', 'shutdown signal received');
      void this.stop().then(
        () => process.exit(0),
        () => process.exit(1)
      );
    };
    for (const signal of this.shutdownSignals) process.once(signal, hook);
    this.shutdownHook = hook;
  }

  private removeShutdownHook(): void {
    const hook = this.shutdownHook;
    if (!hook) return;
    for (const signal of this.shutdownSignals) process.off(signal, hook);
    this.shutdownHook = undefined;
  }
}
