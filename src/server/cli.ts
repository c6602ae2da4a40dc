#!/usr/bin/env node
import { loadConfig, parsePortArg } from './config.js';
import { runConsoleRelay } from './console-relay.js';
import { getInstance, hasInstance } from './instance.js';
import { createConsoleLogger } from './logger.js';

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger(config.logLevel);
  const server = hasInstance()
    ? getInstance()
    : getInstance(parsePortArg(argv[0], config.port), {
        host: config.host,
        heartbeat: config.heartbeat,
        maxConcurrentMessages: config.maxConcurrentMessages,
        stopGraceMs: config.stopGraceMs,
        logger
      });

  const ok = await runConsoleRelay(server, process.stdin);
  process.exit(ok ? 0 : 1);
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('[relay] fatal', error);
  process.exit(1);
});
