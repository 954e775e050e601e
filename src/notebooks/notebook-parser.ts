/**
 * Notebook Parameter Scraper
 *
 * Each pattern's documentation notebook assigns its execution inputs to a
 * `params = {...}` dict in a code cell. This module downloads the
 * notebook, extracts that literal and writes it out as the pattern's
 * parameter JSON file.
 */

import { mkdirSync, renameSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { z } from 'zod';
import { config } from '../config/index.js';
import { logger } from '../config/logger.js';
import { cancelledFrom, errorMessage, isCancellation } from '../errors.js';
import type { JsonObject, JsonValue, PatternId } from '../types/index.js';
import { parsePythonLiteral } from './python-literal.js';

const NotebookSchema = z.object({
  cells: z.array(
    z.object({
      cell_type: z.string(),
      source: z.union([z.string(), z.array(z.string())]).optional(),
    }).passthrough(),
  ),
}).passthrough();

export type Notebook = z.infer<typeof NotebookSchema>;

const PARAMS_ASSIGNMENT_RE = /\bparams\s*=\s*\{/;

export interface NotebookParserOptions {
  /** Base URL notebooks are fetched from (default from config) */
  notebookBaseUrl?: string;
  /** Download timeout in ms (default 30000) */
  timeoutMs?: number;
}

export interface SyncOptions {
  /** Keep going after a pattern fails (default true) */
  continueOnError?: boolean;
  signal?: AbortSignal;
}

/**
 * Slice the `{...}` literal that starts at `start`, matching braces outside
 * string literals. Returns null when the braces never balance.
 */
export function matchBraces(code: string, start: number): string | null {
  let depth = 0;
  let quote: string | null = null;

  for (let i = start; i < code.length; i++) {
    const char = code[i];

    if (quote) {
      if (char === '\\') i++;
      else if (char === quote) quote = null;
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '#') {
      while (i + 1 < code.length && code[i + 1] !== '\n') i++;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) return code.slice(start, i + 1);
    }
  }

  return null;
}

export class NotebookParser {
  readonly notebookBaseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: NotebookParserOptions = {}) {
    this.notebookBaseUrl = (options.notebookBaseUrl ?? config.patterns.notebookBaseUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  notebookUrl(patternId: PatternId): string {
    return `${this.notebookBaseUrl}/${encodeURIComponent(patternId)}.ipynb`;
  }

  /**
   * Download and validate a pattern's notebook. Null when it is missing or
   * not a notebook.
   */
  async download(patternId: PatternId, signal?: AbortSignal): Promise<Notebook | null> {
    const url = this.notebookUrl(patternId);
    logger.info(`Downloading notebook from ${url}`);

    const timeout = AbortSignal.timeout(this.timeoutMs);
    let raw: unknown;
    try {
      const response = await fetch(url, { signal: signal ? AbortSignal.any([signal, timeout]) : timeout });
      if (response.status === 404) {
        logger.warn(`Notebook not found for ${patternId} (404)`);
        return null;
      }
      if (!response.ok) {
        logger.error(`HTTP error downloading notebook for ${patternId}: ${response.status}`);
        return null;
      }
      raw = await response.json();
    } catch (error) {
      if (signal?.aborted) throw cancelledFrom(signal);
      logger.error(`Error downloading notebook for ${patternId}`, { error: errorMessage(error) });
      return null;
    }

    const parsed = NotebookSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error(`Invalid notebook format for ${patternId}: no 'cells' list`);
      return null;
    }

    logger.info(`Downloaded notebook for ${patternId}`);
    return parsed.data;
  }

  /**
   * Extract the `params` dict assigned in a piece of Python code.
   */
  extractParamsFromCode(code: string): JsonObject | null {
    const match = PARAMS_ASSIGNMENT_RE.exec(code);
    if (!match) return null;

    const literal = matchBraces(code, match.index + match[0].length - 1);
    if (literal === null) {
      logger.error('Unmatched braces in params definition');
      return null;
    }

    let value: JsonValue;
    try {
      value = parsePythonLiteral(literal);
    } catch (error) {
      logger.error('Failed to parse params', { error: errorMessage(error) });
      return null;
    }

    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return null;
    }
    return value;
  }

  /**
   * Parameters from the first code cell that defines a non-empty `params`.
   */
  extractParams(notebook: Notebook): JsonObject | null {
    for (const cell of notebook.cells) {
      if (cell.cell_type !== 'code') continue;

      const source = cell.source ?? '';
      const code = Array.isArray(source) ? source.join('') : source;
      const params = this.extractParamsFromCode(code);
      if (params && Object.keys(params).length > 0) {
        logger.info('Found params in notebook');
        return params;
      }
    }

    logger.warn("No 'params' variable found in notebook");
    return null;
  }

  saveParams(params: JsonObject, outputFile: string): boolean {
    try {
      mkdirSync(dirname(outputFile), { recursive: true });
      const tempPath = `${outputFile}.tmp`;
      writeFileSync(tempPath, `${JSON.stringify(params, null, 2)}\n`);
      renameSync(tempPath, outputFile);
    } catch (error) {
      logger.error(`Error saving parameters to ${outputFile}`, { error: errorMessage(error) });
      return false;
    }

    logger.info(`Saved parameters to ${outputFile}`);
    return true;
  }

  async syncPattern(patternId: PatternId, outputDir: string, signal?: AbortSignal): Promise<boolean> {
    logger.info(`Syncing parameters for ${patternId}`);

    const notebook = await this.download(patternId, signal);
    if (!notebook) return false;

    const params = this.extractParams(notebook);
    if (!params) return false;

    return this.saveParams(params, join(outputDir, `${patternId}.json`));
  }

  /**
   * Sync several patterns in order. Returns the outcome per attempted
   * pattern; without continueOnError the first failure ends the run.
   */
  async syncAll(
    patternIds: readonly PatternId[],
    outputDir: string,
    options: SyncOptions = {},
  ): Promise<Record<PatternId, boolean>> {
    const { continueOnError = true, signal } = options;
    const results: Record<PatternId, boolean> = {};

    for (const patternId of patternIds) {
      let ok: boolean;
      try {
        ok = await this.syncPattern(patternId, outputDir, signal);
      } catch (error) {
        if (isCancellation(error)) throw error;
        logger.error(`Error syncing ${patternId}`, { error: errorMessage(error) });
        ok = false;
      }
      results[patternId] = ok;

      if (!ok && !continueOnError) {
        logger.error(`Stopping due to error with ${patternId}`);
        break;
      }
    }

    const updated = Object.values(results).filter(Boolean).length;
    logger.info(`Sync complete: ${updated}/${Object.keys(results).length} patterns updated`);
    return results;
  }
}
