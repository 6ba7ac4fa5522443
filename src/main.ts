#!/usr/bin/env node
/**
 * Service entry point: load configuration, start the runtime, stop on signal.
 */

import { loadConfig } from './core/config.js';
import { errorMessage } from './core/errors.js';
import { createLogger } from './core/logger.js';
import { createRuntime } from './runtime.js';

const log = createLogger('main');

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  if (!config.ok) {
    log.error('Configuration rejected', { error: config.error });
    process.exitCode = 1;
    return;
  }

  const runtime = await createRuntime(config.value);
  await runtime.start();
  log.info('Data fabric listening', { host: config.value.transport.host, port: runtime.server.port });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info('Shutting down', { signal });
    runtime.stop().catch((err: unknown) => {
      log.error('Shutdown failed', { error: errorMessage(err) });
      process.exitCode = 1;
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  log.error('Startup failed', { error: errorMessage(err) });
  process.exitCode = 1;
});
