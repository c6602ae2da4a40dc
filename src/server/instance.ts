import { createConsoleLogger, type Logger } from './logger.js';
import { RelayServer, type RelayServerOptions } from './relay-server.js';

let instance: RelayServer | undefined;

/**
 * Process-wide server used by the command-line entry point. The first call
 * constructs it; later calls return the same server and ignore `port`.
 */
export function getInstance(port?: number, options: Omit<RelayServerOptions, 'port'> = {}): RelayServer {
  if (!instance) {
    instance = new RelayServer({ ...options, port });
    return instance;
  }
  if (port !== undefined && port !== instance.port) {
    warn(options.logger, `server already created on port ${instance.port}, ignoring port ${port}`);
  }
  return instance;
}

export function hasInstance(): boolean {
  return instance !== undefined;
}

/** Drops the held server so the next getInstance call builds a new one. */
export function resetInstance(): void {
  instance = undefined;
}

function warn(logger: Logger | undefined, message: string): void {
  (logger ?? createConsoleLogger()).warn('lifecycle', message);
}
