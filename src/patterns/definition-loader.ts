/**
 * Pattern Definition Loader
 *
 * Pattern parameters live in <patternsDir>/<patternId>.json; the workflow
 * itself is fetched from <workflowBaseUrl>/<patternId>.cwl.
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import {
  JsonObjectSchema,
  patternTypeOf,
  type PatternDefinition,
  type PatternId,
} from '../types/index.js';

export interface DefinitionLoader {
  /** null when the pattern is unknown or its parameters are unreadable */
  load(patternId: PatternId): PatternDefinition | null;
  exists(patternId: PatternId): boolean;
  /** Pattern IDs available locally, in numeric order */
  listPatternIds(): PatternId[];
}

const PATTERN_ID_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const PATTERN_FILE_RE = /^pattern-.+\.json$/;

/** Pattern IDs are used as file names and URL segments */
export function isValidPatternId(patternId: string): boolean {
  return PATTERN_ID_RE.test(patternId) && !patternId.includes('..');
}

function patternNumber(patternId: PatternId): number {
  const suffix = patternId.split('-')[1];
  return suffix && /^\d+$/.test(suffix) ? parseInt(suffix, 10) : 0;
}

/**
 * Order pattern-2 before pattern-10. IDs without a numeric suffix sort as 0.
 */
export function comparePatternIds(a: PatternId, b: PatternId): number {
  return patternNumber(a) - patternNumber(b) || a.localeCompare(b);
}

export class FileDefinitionLoader implements DefinitionLoader {
  constructor(
    readonly patternsDir: string,
    readonly workflowBaseUrl: string,
  ) {}

  paramsPath(patternId: PatternId): string {
    return join(this.patternsDir, `${patternId}.json`);
  }

  workflowUrl(patternId: PatternId): string {
    return `${this.workflowBaseUrl.replace(/\/+$/, '')}/${encodeURIComponent(patternId)}.cwl`;
  }

  exists(patternId: PatternId): boolean {
    return isValidPatternId(patternId) && existsSync(this.paramsPath(patternId));
  }

  load(patternId: PatternId): PatternDefinition | null {
    if (!isValidPatternId(patternId)) {
      logger.error('Invalid pattern ID', { patternId });
      return null;
    }

    const file = this.paramsPath(patternId);
    if (!existsSync(file)) {
      logger.error(`Configuration file not found: ${file}`);
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      logger.error(`Error loading config for ${patternId}`, { error: errorMessage(error) });
      return null;
    }

    const parameters = JsonObjectSchema.safeParse(raw);
    if (!parameters.success) {
      logger.error(`Parameters for ${patternId} must be a JSON object`, { file });
      return null;
    }

    return {
      patternId,
      workflowUrl: this.workflowUrl(patternId),
      parameters: parameters.data,
      patternType: patternTypeOf(patternId),
    };
  }

  listPatternIds(): PatternId[] {
    if (!existsSync(this.patternsDir)) return [];

    return readdirSync(this.patternsDir)
      .filter(f => PATTERN_FILE_RE.test(f))
      .map(f => f.slice(0, -'.json'.length))
      .sort(comparePatternIds);
  }
}
