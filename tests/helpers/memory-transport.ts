import { decodeEnvelope, type MessageEnvelope } from '../../src/server/transport/ws-protocol.js';
import type { ListenOptions, Transport, TransportConnection, TransportHandlers } from '../../src/server/transport/transport.js';

export class MemoryConnection implements TransportConnection {
  readonly sent: string[] = [];
  open = true;
  failSend = false;

  constructor(readonly id: string, readonly remoteAddress = '127.0.0.1') {}

  isOpen(): boolean {
    return this.open;
  }

  send(text: string): void {
    if (this.failSend) throw new Error('socket hang up');
    this.sent.push(text);
  }

  close(): void {
    this.open = false;
  }

  envelopes(): MessageEnvelope[] {
    return this.sent.flatMap((text) => {
      const decoded = decodeEnvelope(text);
      return decoded.ok ? [decoded.envelope] : [];
    });
  }

  actions(): string[] {
    return this.envelopes().map((e) => e.action);
  }
}

/** In-process stand-in for the ws transport. */
export class MemoryTransport implements Transport {
  connectionLostTimeoutS?: number;
  closedWithGraceMs?: number;
  listenOptions?: ListenOptions;
  failListen?: Error;
  /** When set, listen waits for it before binding. */
  listenGate?: Promise<void>;

  private handlers?: TransportHandlers;
  private live: MemoryConnection[] = [];
  private nextId = 1;

  async listen(options: ListenOptions, handlers: TransportHandlers): Promise<void> {
    if (this.listenGate) await this.listenGate;
    if (this.failListen) throw this.failListen;
    this.listenOptions = options;
    this.handlers = handlers;
  }

  setConnectionLostTimeout(seconds: number): void {
    this.connectionLostTimeoutS = seconds;
  }

  connections(): TransportConnection[] {
    return [...this.live];
  }

  port(): number | undefined {
    return this.handlers ? this.listenOptions?.port : undefined;
  }

  async close(graceMs: number): Promise<void> {
    this.closedWithGraceMs = graceMs;
    for (const conn of [...this.live]) this.disconnect(conn, 1001);
    this.handlers = undefined;
  }

  connect(id = `conn-${this.nextId++}`): MemoryConnection {
    const conn = new MemoryConnection(id);
    this.live.push(conn);
    this.requireHandlers().onOpen(conn);
    return conn;
  }

  disconnect(conn: MemoryConnection, code = 1000): void {
    conn.open = false;
    this.live = this.live.filter((c) => c !== conn);
    this.requireHandlers().onClose(conn, code, '');
  }

  receive(conn: MemoryConnection, text: string): void {
    this.requireHandlers().onText(conn, text);
  }

  private requireHandlers(): TransportHandlers {
    if (!this.handlers) throw new Error('transport is not listening');
    return this.handlers;
  }
}
