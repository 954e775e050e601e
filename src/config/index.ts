/**
 * Configuration management for the patterns tester
 */

import { config as dotenvConfig } from 'dotenv';

// Load .env file
dotenvConfig();

function optionalEnv(key: string, defaultValue: string = ''): string {
  return process.env[key] || defaultValue;
}

function numEnv(key: string, defaultValue: number = 0): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

const PATTERNS_REPO_RAW = 'https://raw.githubusercontent.com/eoap/application-package-patterns/main';

export const config = {
  server: {
    baseUrl: optionalEnv('OGC_SERVER_URL', 'http://localhost:5000'),
    authToken: optionalEnv('OGC_AUTH_TOKEN'),
    username: optionalEnv('OGC_USERNAME'),
    password: optionalEnv('OGC_PASSWORD'),
    /** Per-request timeout in seconds */
    requestTimeoutSeconds: numEnv('OGC_REQUEST_TIMEOUT', 600),
  },

  patterns: {
    dir: optionalEnv('PATTERNS_DIR', 'data/patterns'),
    downloadDir: optionalEnv('CWL_DOWNLOAD_DIR', 'temp/cwl'),
    workflowBaseUrl: optionalEnv('PATTERNS_WORKFLOW_BASE_URL', `${PATTERNS_REPO_RAW}/cwl-workflow`),
    notebookBaseUrl: optionalEnv('PATTERNS_NOTEBOOK_BASE_URL', `${PATTERNS_REPO_RAW}/docs`),
  },

  run: {
    /** Monitoring timeout per pattern in seconds, 0 = unlimited */
    defaultTimeoutSeconds: 1800,
    pollIntervalMs: 10_000,
    statusLogIntervalMs: 60_000,
    deployRetries: 3,
    deployRetryBaseDelayMs: 1000,
    /** Per-request timeout for cleanup calls */
    cleanupRequestTimeoutMs: 5000,
  },
};

export type Config = typeof config;
