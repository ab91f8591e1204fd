/**
 * War Server
 *
 * Pairs two-player games of War over TCP (and optionally WebSocket).
 *
 * Usage: war-server [host] [port]
 */
import { ConfigError, loadConfig, validateProductionConfigOrThrow } from './config/index.js';
import { WarServer } from './server.js';
import { metrics } from './metrics/index.js';
import { startTelemetry } from './telemetry.js';
import { logError, logInfo } from './logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  validateProductionConfigOrThrow(config);

  const stopTelemetry = startTelemetry();
  const server = new WarServer(config);
  await server.start();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logInfo(`[Server] ${signal} received, waiting for running games`);
    server
      .stop()
      .then(stopTelemetry)
      .then(() => {
        logInfo('[Server] Metrics at shutdown', metrics.getAll());
        process.exit(0);
      })
      .catch((err: unknown) => {
        logError('[Server] Shutdown failed', err);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logError(err.message);
  } else {
    logError('[Server] Fatal error', err);
  }
  process.exit(1);
});
