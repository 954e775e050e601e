/**
 * Cleanup Report
 *
 * Cleanup is a sequence of best-effort sub-steps. Each one yields a step
 * value; whether the cleanup as a whole succeeded is decided by
 * FATAL_STEP_KINDS, not by which call happened to throw.
 */

import type { PatternId } from '../types/index.js';

export type CleanupStepKind = 'list-jobs' | 'delete-job' | 'delete-process';

export interface CleanupStep {
  kind: CleanupStepKind;
  /** Process or job ID the step acted on */
  target: string;
  ok: boolean;
  error?: string;
}

export interface CleanupReport {
  patternId: PatternId;
  /** Pattern was not deployed: nothing to do */
  skipped: boolean;
  steps: CleanupStep[];
  /** Cancelled part-way; the process may still exist on the server */
  interrupted: boolean;
  ok: boolean;
}

/**
 * Job listing and job deletion failures are tolerated: jobs orphaned under
 * a deleted process are acceptable residue. The process must go.
 */
const FATAL_STEP_KINDS: ReadonlySet<CleanupStepKind> = new Set(['delete-process']);

export function isCleanupSuccessful(steps: readonly CleanupStep[], interrupted: boolean): boolean {
  if (interrupted) return false;
  if (!steps.some(s => s.kind === 'delete-process')) return false;
  return steps.filter(s => FATAL_STEP_KINDS.has(s.kind)).every(s => s.ok);
}

export function skippedCleanup(patternId: PatternId): CleanupReport {
  return { patternId, skipped: true, steps: [], interrupted: false, ok: true };
}

/**
 * One-line summary, e.g. "process deleted, 2/3 job(s) deleted".
 */
export function describeCleanup(report: CleanupReport): string {
  if (report.skipped) return 'not deployed, nothing to clean up';

  const jobSteps = report.steps.filter(s => s.kind === 'delete-job');
  const deletedJobs = jobSteps.filter(s => s.ok).length;
  const processStep = report.steps.find(s => s.kind === 'delete-process');

  const parts = [
    processStep?.ok ? 'process deleted' : 'process not deleted',
    `${deletedJobs}/${jobSteps.length} job(s) deleted`,
  ];
  if (report.steps.some(s => s.kind === 'list-jobs' && !s.ok)) parts.push('job listing failed');
  if (report.interrupted) parts.push('interrupted');
  return parts.join(', ');
}
