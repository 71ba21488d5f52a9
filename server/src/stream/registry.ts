import { z } from 'zod';
import { NginxServer } from './NginxServer.js';
import type { Logger } from '../logger.js';
import type { StreamServer } from './StreamServer.js';
import type { StreamServerConfig } from './types.js';

// Each backend persists with a `type` tag so a mixed list restores to the right class.
const nginxConfigSchema = z.object({
  type: z.literal('nginx'),
  statsUrl: z.string().url(),
  application: z.string().min(1),
  key: z.string().min(1),
});

export const streamServerConfigSchema = z.discriminatedUnion('type', [nginxConfigSchema]);

export function parseStreamServerConfig(raw: unknown): StreamServerConfig {
  return streamServerConfigSchema.parse(raw);
}

export interface StreamServerDeps {
  logger: Logger;
  requestTimeoutMs?: number;
}

export function createStreamServer(config: StreamServerConfig, deps: StreamServerDeps): StreamServer {
  switch (config.type) {
    case 'nginx':
      return new NginxServer(config, deps);
    default: {
      const unknownType: never = config.type;
      throw new Error(`Unknown stream server config: ${JSON.stringify(config)}`);
    }
  }
}
