/**
 * Workflow Artifact Cache
 *
 * Cache-or-fetch for CWL files: a cached file is reused unless a refresh
 * is forced. Downloads are written atomically (temp file + rename).
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { logger } from '../config/logger.js';
import { cancelledFrom, errorMessage, throwIfCancelled } from '../errors.js';
import type { PatternId } from '../types/index.js';

export interface ArtifactCache {
  /**
   * Make sure the workflow for `patternId` is available locally.
   * Returns false when it could not be fetched. Throws CancelledError when
   * the signal aborts.
   */
  ensure(patternId: PatternId, sourceUrl: string, forceRefresh: boolean, signal?: AbortSignal): Promise<boolean>;
  /** Cached workflow content, or null when absent */
  read(patternId: PatternId): string | null;
}

export interface FileArtifactCacheOptions {
  /** Download timeout in ms (default 30000) */
  timeoutMs?: number;
}

export class FileArtifactCache implements ArtifactCache {
  private readonly timeoutMs: number;

  constructor(readonly downloadDir: string, options: FileArtifactCacheOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  pathFor(patternId: PatternId): string {
    return join(this.downloadDir, `${patternId}.cwl`);
  }

  async ensure(patternId: PatternId, sourceUrl: string, forceRefresh: boolean, signal?: AbortSignal): Promise<boolean> {
    const file = this.pathFor(patternId);

    if (!forceRefresh && existsSync(file)) {
      logger.debug(`CWL file already exists for ${patternId}`);
      return true;
    }

    throwIfCancelled(signal);
    logger.info(`Downloading CWL workflow for ${patternId} from ${sourceUrl}`);

    const timeout = AbortSignal.timeout(this.timeoutMs);
    let content: string;
    try {
      const response = await fetch(sourceUrl, {
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
      if (!response.ok) {
        logger.error(`Failed to download CWL for ${patternId}: HTTP ${response.status}`);
        return false;
      }
      content = await response.text();
    } catch (error) {
      if (signal?.aborted) throw cancelledFrom(signal);
      logger.error(`Failed to download CWL for ${patternId}`, { error: errorMessage(error) });
      return false;
    }

    try {
      this.write(file, content);
    } catch (error) {
      logger.error(`Failed to save CWL for ${patternId}`, { file, error: errorMessage(error) });
      return false;
    }

    logger.info(`Successfully downloaded CWL for ${patternId}`);
    return true;
  }

  read(patternId: PatternId): string | null {
    const file = this.pathFor(patternId);
    if (!existsSync(file)) return null;
    try {
      return readFileSync(file, 'utf-8');
    } catch (error) {
      logger.error(`Failed to read CWL for ${patternId}`, { file, error: errorMessage(error) });
      return null;
    }
  }

  private write(file: string, content: string): void {
    mkdirSync(dirname(file), { recursive: true });
    const tempPath = `${file}.tmp`;
    writeFileSync(tempPath, content);
    renameSync(tempPath, file);
  }
}
