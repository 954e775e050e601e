/**
 * Terminal output for the CLI. Every formatter returns lines; printing is
 * left to the command.
 */

import chalk from 'chalk';
import { describeCleanup, type CleanupReport } from '../orchestrator/cleanup-report.js';
import {
  patternTypeOf,
  successRate,
  type ExecutionResult,
  type JobSnapshot,
  type JobStatus,
  type JsonValue,
  type OrchestratorStatus,
  type PatternId,
  type TestSummary,
} from '../types/index.js';

const RULE = '='.repeat(50);

export function colorStatus(status: JobStatus): string {
  switch (status) {
    case 'successful':
      return chalk.green.bold(status);
    case 'running':
    case 'accepted':
      return chalk.yellow.bold(status);
    default:
      return chalk.red.bold(status);
  }
}

export function formatResult(result: ExecutionResult, verbose: boolean): string[] {
  if (!result.success) {
    return [chalk.red.bold('✗ Failed'), `Error: ${result.message ?? 'unknown error'}`];
  }

  const lines = [chalk.green.bold('✓ Success')];
  if (result.message && result.message !== 'Job completed: successful') {
    lines.push(chalk.yellow(result.message));
  }
  if (verbose && result.executionTimeSeconds !== undefined) {
    lines.push(`Execution time: ${result.executionTimeSeconds.toFixed(1)}s`);
  }
  if (verbose && result.outputs) {
    lines.push(`Outputs: ${Object.keys(result.outputs).length} files`);
  }
  return lines;
}

export function formatSummary(summary: TestSummary, verbose: boolean): string[] {
  const lines = [
    '',
    RULE,
    'TEST SUMMARY',
    RULE,
    `Patterns tested: ${summary.totalPatterns}`,
  ];

  if (summary.successfulPatterns > 0) {
    lines.push(chalk.green.bold(`✓ Success: ${summary.successfulPatterns}`));
  }
  if (summary.failedPatterns > 0) {
    lines.push(chalk.red.bold(`✗ Failed: ${summary.failedPatterns}`));
  }
  lines.push(`Success rate: ${successRate(summary).toFixed(1)}%`);
  lines.push(`Total time: ${summary.totalExecutionTimeSeconds.toFixed(1)}s`);

  if (verbose && summary.results.length > 0) {
    lines.push('', 'Details by pattern:');
    for (const result of summary.results) {
      const icon = result.success ? chalk.green(`  ✓ ${result.patternId}`) : chalk.red(`  ✗ ${result.patternId}`);
      const time = result.executionTimeSeconds !== undefined ? ` (${result.executionTimeSeconds.toFixed(1)}s)` : '';
      const message = !result.success && result.message ? ` - ${result.message}` : '';
      lines.push(`${icon}${time}${message}`);
    }
  }

  return lines;
}

export function formatJob(snapshot: JobSnapshot, jobUrl: string): string[] {
  const lines = [
    `Job ID: ${snapshot.jobId}`,
    `Process: ${snapshot.processId ?? 'unknown'}`,
    `Status: ${colorStatus(snapshot.status)}`,
  ];
  if (snapshot.progress !== undefined) lines.push(`Progress: ${snapshot.progress}%`);
  if (snapshot.message) lines.push(`Message: ${snapshot.message}`);
  if (snapshot.created) lines.push(`Created: ${snapshot.created}`);
  if (snapshot.started) lines.push(`Started: ${snapshot.started}`);
  if (snapshot.finished) lines.push(`Finished: ${snapshot.finished}`);
  lines.push(`Job URL: ${jobUrl}`);
  return lines;
}

export function formatStatus(status: OrchestratorStatus, server: { baseUrl: string; authenticated: boolean }): string[] {
  const lines = [
    'Orchestrator status:',
    `  Server: ${server.baseUrl}`,
    `  Authentication: ${server.authenticated ? 'Yes' : 'No'}`,
    `  Deployed processes: ${status.deployedProcesses.length}`,
    ...status.deployedProcesses.map(id => `    - ${id}`),
  ];

  const running = Object.entries(status.runningJobs);
  lines.push(`  Running jobs: ${running.length}`);
  lines.push(...running.map(([patternId, jobId]) => `    - ${patternId}: ${jobId}`));
  lines.push(`  Completed results: ${status.completedResults}`);
  return lines;
}

function formatValue(value: JsonValue | undefined): string {
  return Array.isArray(value) ? value.map(v => String(v)).join(', ') : String(value);
}

/**
 * One line per pattern; verbose adds the pattern type and key parameters.
 */
export function formatPatternList(
  patterns: ReadonlyArray<{ patternId: PatternId; parameters: Record<string, JsonValue> | null }>,
  verbose: boolean,
): string[] {
  if (patterns.length === 0) return ['No patterns found in patterns directory'];

  const lines = [`Available patterns (${patterns.length}):`];
  for (const { patternId, parameters } of patterns) {
    lines.push(`  - ${patternId}`);
    if (!verbose) continue;

    lines.push(`    Type: ${patternTypeOf(patternId)}`);
    if (!parameters) {
      lines.push(chalk.red('    Read error'));
      continue;
    }
    if ('aoi' in parameters) lines.push(`    AOI: ${formatValue(parameters.aoi)}`);
    if ('bands' in parameters) lines.push(`    Bands: ${formatValue(parameters.bands)}`);
  }
  return lines;
}

export function formatCleanup(report: CleanupReport): string[] {
  if (report.ok) {
    return [chalk.green.bold(`✓ Pattern cleaned up (${describeCleanup(report)})`)];
  }
  return [chalk.red.bold(`✗ Cleanup failed (${describeCleanup(report)})`)];
}

/**
 * Per-pattern tick list followed by e.g. "Summary: 2/3 patterns synced successfully".
 */
export function formatOutcomes(title: string, outcomes: Record<string, boolean>, summaryText: string): string[] {
  const entries = Object.entries(outcomes);
  const succeeded = entries.filter(([, ok]) => ok).length;
  return [
    '',
    RULE,
    title,
    RULE,
    ...entries.map(([id, ok]) => (ok ? chalk.green(`✓ ${id}`) : chalk.red(`✗ ${id}`))),
    RULE,
    `Summary: ${succeeded}/${entries.length} patterns ${summaryText}`,
  ];
}
