import readline from 'node:readline';
import type { Readable } from 'node:stream';
import type { RelayServer } from './relay-server.js';
import { WsAction } from './transport/ws-protocol.js';

/**
 * Starts `server` unless it is already up, broadcasts every input line as an
 * info message until `quit` or end of input, then stops the server.
 * Resolves false when the server could not be started or stopped.
 */
export async function runConsoleRelay(server: RelayServer, input: Readable): Promise<boolean> {
  if (server.state !== 'starting' && server.state !== 'started') {
    if (!(await server.start())) return false;
  }

  const rl = readline.createInterface({ input, terminal: false });
  for await (const line of rl) {
    if (line === 'quit') break;
    server.messenger.broadcast(WsAction.InfoMessage, { messageType: 'info', message: line });
  }
  rl.close();

  return server.stop();
}
