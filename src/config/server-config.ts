/**
 * Server Configuration
 *
 * Resolves the OGC API - Processes server settings from, in order of
 * precedence: a JSON config file (--config), CLI flags, then env defaults.
 *
 * The JSON file uses snake_case keys:
 *   { "base_url": "...", "auth_token": "...", "username": "...",
 *     "password": "...", "api_key": "...", "timeout": 300 }
 *
 * `auth_token` is a legacy alias for `api_key`.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { config } from './index.js';
import { logger } from './logger.js';

export interface ServerConfig {
  baseUrl: string;
  username?: string;
  password?: string;
  /** Bearer access token */
  accessToken?: string;
  /** API key, sent as a bearer credential */
  apiKey?: string;
  /** Per-request timeout in seconds */
  timeoutSeconds: number;
}

const ServerConfigFileSchema = z.object({
  base_url: z.string().url(),
  auth_token: z.string().nullish(),
  username: z.string().nullish(),
  password: z.string().nullish(),
  api_key: z.string().nullish(),
  timeout: z.number().int().positive().optional(),
});

export interface ServerConfigOverrides {
  serverUrl?: string;
  authToken?: string;
}

/**
 * Build a ServerConfig from env defaults and CLI overrides.
 */
export function defaultServerConfig(overrides: ServerConfigOverrides = {}): ServerConfig {
  return {
    baseUrl: overrides.serverUrl || config.server.baseUrl,
    username: config.server.username || undefined,
    password: config.server.password || undefined,
    accessToken: overrides.authToken || config.server.authToken || undefined,
    timeoutSeconds: config.server.requestTimeoutSeconds,
  };
}

/**
 * Parse the content of a JSON server config file.
 *
 * @throws Error when the JSON is malformed or fails validation
 */
export function parseServerConfig(content: string): ServerConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid server config JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = ServerConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Invalid server config: ${issues.join('; ')}`);
  }

  const data = parsed.data;
  return {
    baseUrl: data.base_url,
    username: data.username ?? undefined,
    password: data.password ?? undefined,
    apiKey: data.api_key ?? data.auth_token ?? undefined,
    timeoutSeconds: data.timeout ?? 300,
  };
}

/**
 * Load a server config file from disk.
 */
export function loadServerConfig(path: string): ServerConfig {
  const serverConfig = parseServerConfig(readFileSync(path, 'utf-8'));
  logger.debug('Loaded server config', { path, baseUrl: serverConfig.baseUrl });
  return serverConfig;
}

export function isAuthConfigured(serverConfig: ServerConfig): boolean {
  return Boolean(
    (serverConfig.username && serverConfig.password) ||
    serverConfig.accessToken ||
    serverConfig.apiKey,
  );
}
