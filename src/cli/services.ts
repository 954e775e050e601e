/**
 * Wires the gateway, loader, cache and orchestrator for one CLI invocation.
 */

import { existsSync } from 'fs';
import { z } from 'zod';
import { config } from '../config/index.js';
import { logger } from '../config/logger.js';
import {
  defaultServerConfig,
  loadServerConfig,
  type ServerConfig,
} from '../config/server-config.js';
import { OgcProcessesClient } from '../gateway/ogc-client.js';
import { FileArtifactCache } from '../patterns/artifact-cache.js';
import { FileDefinitionLoader } from '../patterns/definition-loader.js';
import { PatternOrchestrator } from '../orchestrator/pattern-orchestrator.js';
import { RunContext } from '../orchestrator/run-context.js';

export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  serverUrl: z.string().url().optional(),
  authToken: z.string().optional(),
  patternsDir: z.string().default(config.patterns.dir),
  downloadDir: z.string().default(config.patterns.downloadDir),
  forceDownload: z.boolean().default(false),
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface Services {
  serverConfig: ServerConfig;
  gateway: OgcProcessesClient;
  loader: FileDefinitionLoader;
  cache: FileArtifactCache;
  orchestrator: PatternOrchestrator;
}

/**
 * A config file wins over flags and environment. A missing file falls
 * back to the defaults with a warning; an invalid one throws.
 */
export function resolveServerConfig(options: GlobalOptions): ServerConfig {
  if (options.config) {
    if (existsSync(options.config)) {
      return loadServerConfig(options.config);
    }
    logger.warn(`Config file not found: ${options.config}, using defaults`);
  }
  return defaultServerConfig({ serverUrl: options.serverUrl, authToken: options.authToken });
}

export function createServices(options: GlobalOptions, context: RunContext = new RunContext()): Services {
  const serverConfig = resolveServerConfig(options);
  const gateway = new OgcProcessesClient(serverConfig);
  const loader = new FileDefinitionLoader(options.patternsDir, config.patterns.workflowBaseUrl);
  const cache = new FileArtifactCache(options.downloadDir);
  const orchestrator = new PatternOrchestrator(
    { gateway, loader, cache, context },
    { forceRefresh: options.forceDownload },
  );
  return { serverConfig, gateway, loader, cache, orchestrator };
}
