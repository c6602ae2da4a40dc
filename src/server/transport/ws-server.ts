import http from 'node:http';
import { randomUUID } from 'node:crypto';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { settleWithin } from '../timing.js';
import type { ListenOptions, Transport, TransportConnection, TransportHandlers } from './transport.js';

const CLOSE_GOING_AWAY = 1001;

class WsConnection implements TransportConnection {
  alive = true;

  constructor(readonly id: string, readonly remoteAddress: string, readonly ws: WebSocket) {}

  isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(text: string): void {
    this.ws.send(text);
  }

  close(code = 1000, reason = ''): void {
    this.ws.close(code, reason);
  }
}

function toBuffer(raw: RawData): Buffer {
  if (Buffer.isBuffer(raw)) return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw);
  return Buffer.from(raw);
}

/**
 * Transport over `ws`, mounted on a plain HTTP server so the status API can
 * share the port. Upgrades are accepted on every path.
 */
export class WsTransport implements Transport {
  private server?: http.Server;
  private wss?: WebSocketServer;
  private readonly live = new Map<WebSocket, WsConnection>();
  private connectionLostTimeoutS = 0;
  private sweepTimer?: NodeJS.Timeout;

  listen(options: ListenOptions, handlers: TransportHandlers): Promise<void> {
    if (this.server) return Promise.reject(new Error('transport is already listening'));

    const server = http.createServer(options.requestListener);
    const wss = new WebSocketServer({ noServer: true });

    wss.on('connection', (ws, req) => {
      const conn = new WsConnection(randomUUID(), req.socket.remoteAddress ?? 'unknown', ws);
      this.live.set(ws, conn);

      ws.on('pong', () => {
        conn.alive = true;
      });
      ws.on('message', (raw: RawData, isBinary: boolean) => {
        const data = toBuffer(raw);
        if (isBinary) handlers.onBinary(conn, data);
        else handlers.onText(conn, data.toString('utf8'));
      });
      ws.on('close', (code, reason) => {
        this.live.delete(ws);
        handlers.onClose(conn, code, reason.toString());
      });
      ws.on('error', (err) => handlers.onError(conn, err));

      handlers.onOpen(conn);
    });

    server.on('upgrade', (req, socket, head) => {
      wss.handleUpgrade(req, socket, head, (ws) => {
        wss.emit('connection', ws, req);
      });
    });

    return new Promise((resolve, reject) => {
      const onListening = () => {
        server.off('error', onBindError);
        server.on('error', (err) => handlers.onError(undefined, err));
        this.server = server;
        this.wss = wss;
        this.restartSweep();
        resolve();
      };
      const onBindError = (err: Error) => {
        server.off('listening', onListening);
        wss.close();
        reject(err);
      };
      server.once('error', onBindError);
      server.once('listening', onListening);
      server.listen(options.port, options.host);
    });
  }

  setConnectionLostTimeout(seconds: number): void {
    this.connectionLostTimeoutS = seconds;
    if (this.server) this.restartSweep();
  }

  connections(): TransportConnection[] {
    return [...this.live.values()];
  }

  port(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : undefined;
  }

  async close(graceMs: number): Promise<void> {
    const server = this.server;
    const wss = this.wss;
    if (!server || !wss) return;
    this.stopSweep();
    this.server = undefined;
    this.wss = undefined;

    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    for (const ws of this.live.keys()) ws.close(CLOSE_GOING_AWAY, 'server shutting down');
    server.closeIdleConnections();

    await settleWithin(closed, graceMs);
    for (const ws of this.live.keys()) ws.terminate();
    server.closeAllConnections();
    wss.close();
    await closed;
  }

  // A connection that has not answered the previous ping when the sweep comes round is dropped.
  private restartSweep(): void {
    this.stopSweep();
    if (this.connectionLostTimeoutS <= 0) return;
    this.sweepTimer = setInterval(() => {
      for (const [ws, conn] of this.live) {
        if (!conn.alive) {
          ws.terminate();
          continue;
        }
        conn.alive = false;
        ws.ping();
      }
    }, this.connectionLostTimeoutS * 1_000);
    this.sweepTimer.unref();
  }

  private stopSweep(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
  }
}
