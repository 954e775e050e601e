/**
 * Batch Runner
 *
 * Runs a list of patterns one after another through a PatternRunner and
 * aggregates the results. A failing pattern never stops the batch; what
 * to do with failures is the caller's decision.
 */

import { logger } from '../config/logger.js';
import type { ExecutionResult, PatternId, TestSummary } from '../types/index.js';
import type { DefinitionLoader } from '../patterns/definition-loader.js';
import type { PatternRunner, RunOptions } from './pattern-orchestrator.js';

export interface BatchOptions extends RunOptions {
  /** Accepted for compatibility; patterns always run sequentially */
  parallel?: boolean;
  /** Called after each pattern finishes */
  onResult?: (result: ExecutionResult, index: number, total: number) => void;
  /** Injectable clock for testing */
  _now?: () => number;
}

export async function runMultiple(
  runner: PatternRunner,
  patternIds: readonly PatternId[],
  options: BatchOptions = {},
): Promise<TestSummary> {
  const { parallel, onResult, _now = Date.now, ...runOptions } = options;

  if (parallel) {
    logger.warn('Parallel execution not supported, running sequentially');
  }

  logger.info(`Starting tests for ${patternIds.length} pattern(s)`);
  const start = _now();
  const results: ExecutionResult[] = [];

  for (const [index, patternId] of patternIds.entries()) {
    logger.info(`Running pattern ${index + 1}/${patternIds.length}: ${patternId}`);
    const result = await runner.runSingle(patternId, runOptions);
    results.push(result);
    onResult?.(result, index, patternIds.length);
  }

  const summary = summarize(results, (_now() - start) / 1000);
  logger.info(`Tests completed: ${summary.successfulPatterns}/${summary.totalPatterns} successful`);
  return summary;
}

/**
 * Run every pattern the loader knows about, in numeric order.
 */
export async function runAll(
  runner: PatternRunner,
  loader: DefinitionLoader,
  options: BatchOptions = {},
): Promise<TestSummary> {
  const patternIds = loader.listPatternIds();
  if (patternIds.length === 0) {
    logger.warn('No pattern configurations found');
  }
  return runMultiple(runner, patternIds, options);
}

export function summarize(results: readonly ExecutionResult[], totalExecutionTimeSeconds: number): TestSummary {
  const successfulPatterns = results.reduce((count, r) => count + (r.success ? 1 : 0), 0);
  return {
    totalPatterns: results.length,
    successfulPatterns,
    failedPatterns: results.length - successfulPatterns,
    totalExecutionTimeSeconds,
    results: [...results],
  };
}
