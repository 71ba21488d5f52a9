#!/usr/bin/env node
import { resolve } from 'node:path';
import { DEFAULT_CONFIG_PATH, loadConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { createStreamServer } from './stream/registry.js';

// Replaced once the configured level is known.
let logger: Logger = createLogger();

async function main() {
  const configPath = process.argv[2] ? resolve(process.argv[2]) : DEFAULT_CONFIG_PATH;
  const config = loadConfig(configPath);
  logger = createLogger({ level: config.logLevel });

  if (config.streamServers.length === 0) {
    logger.warn(`No stream servers configured in ${configPath}`);
    return;
  }

  // ─── Shutdown ───
  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, aborting stats requests`);
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // ─── Probe ───
  const servers = config.streamServers.map((serverConfig) =>
    createStreamServer(serverConfig, { logger, requestTimeoutMs: config.requestTimeoutMs }),
  );

  await Promise.all(
    servers.map(async (server) => {
      const { statsUrl, application, key } = server.toConfig();
      const { bitrate, decision } = await server.sample(config.triggers, controller.signal);
      logger.info(`${statsUrl} ${application}/${key}: ${bitrate ?? 'no data'} kbps → ${decision}`);
    }),
  );

  process.off('SIGINT', shutdown);
  process.off('SIGTERM', shutdown);
}

main().catch((err) => {
  logger.error('Fatal error', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
