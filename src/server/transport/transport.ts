import type { RequestListener } from 'node:http';

/** A live client connection. Owned by the transport; the relay only sends and closes through it. */
export interface TransportConnection {
  readonly id: string;
  readonly remoteAddress: string;
  isOpen(): boolean;
  send(text: string): void;
  close(code?: number, reason?: string): void;
}

export interface TransportHandlers {
  onOpen(connection: TransportConnection): void;
  onClose(connection: TransportConnection, code: number, reason: string): void;
  onText(connection: TransportConnection, text: string): void;
  onBinary(connection: TransportConnection, data: Buffer): void;
  onError(connection: TransportConnection | undefined, error: Error): void;
}

export interface ListenOptions {
  port: number;
  host?: string;
  /** Serves plain HTTP requests arriving on the same port. */
  requestListener?: RequestListener;
}

export interface Transport {
  /** Resolves once bound; rejects when the port cannot be bound. */
  listen(options: ListenOptions, handlers: TransportHandlers): Promise<void>;
  /** Seconds without a pong before a connection is dropped; 0 disables the check. */
  setConnectionLostTimeout(seconds: number): void;
  connections(): TransportConnection[];
  /** Bound port, or undefined before listen resolves. */
  port(): number | undefined;
  close(graceMs: number): Promise<void>;
}
