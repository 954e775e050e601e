/**
 * Pattern Lifecycle Orchestrator
 *
 * Sequences deploy -> execute -> monitor -> cleanup for one pattern and
 * owns the in-memory state of a run:
 * - deployed: between a successful deploy and a successful cleanup
 * - runningJobs: while a job is unresolved; every monitor exit clears it
 * - results: last ExecutionResult per pattern
 *
 * Public operations never throw except with CancelledError, which is let
 * through so the caller can react to an interrupt immediately. The one
 * place cancellation is absorbed is the best-effort cleanup sequence.
 */

import { config } from '../config/index.js';
import { logger } from '../config/logger.js';
import { errorMessage, isCancellation } from '../errors.js';
import type { ProcessApiGateway, RequestOptions } from '../gateway/types.js';
import type { ArtifactCache } from '../patterns/artifact-cache.js';
import type { DefinitionLoader } from '../patterns/definition-loader.js';
import { parseWorkflow } from '../patterns/workflow.js';
import {
  isOutcomeUnknown,
  isTerminalStatus,
  withNote,
  type ExecutionOutcome,
  type ExecutionResult,
  type JobHandle,
  type JobSnapshot,
  type JobStatus,
  type OrchestratorStatus,
  type PatternId,
} from '../types/index.js';
import { withRetry } from '../utils/retry.js';
import { sleep, type SleepFn } from '../utils/sleep.js';
import {
  isCleanupSuccessful,
  skippedCleanup,
  type CleanupReport,
  type CleanupStep,
} from './cleanup-report.js';
import { RunContext } from './run-context.js';

export const CLEANUP_SKIPPED_NOTE = ' (Cleanup skipped - job may still be running)';
export const CLEANUP_FAILED_NOTE = ' (Warning: cleanup failed)';

export interface OrchestratorDeps {
  gateway: ProcessApiGateway;
  loader: DefinitionLoader;
  cache: ArtifactCache;
  /** Defaults to a fresh context that is never cancelled */
  context?: RunContext;
}

export interface OrchestratorOptions {
  /** Re-download workflows even when cached */
  forceRefresh?: boolean;
  /** Status polling interval in ms (default 10000) */
  pollIntervalMs?: number;
  /** Re-log an unchanged status after this many ms (default 60000) */
  statusLogIntervalMs?: number;
  /** Retry policy for the deploy call (default 3 retries, 1s base delay) */
  deployRetry?: { maxRetries: number; baseDelayMs: number };
  /** Request timeout for cleanup calls in ms (default 5000) */
  cleanupRequestTimeoutMs?: number;
  /** Injectable sleep function for testing */
  _sleep?: SleepFn;
  /** Injectable clock for testing */
  _now?: () => number;
}

export interface RunOptions {
  /** Clean up after the run (default true) */
  cleanup?: boolean;
  /** Monitoring timeout in seconds, 0 = unlimited (default 1800) */
  timeoutSeconds?: number;
}

/** Anything that can run one pattern end to end */
export interface PatternRunner {
  runSingle(patternId: PatternId, options?: RunOptions): Promise<ExecutionResult>;
}

export class PatternOrchestrator implements PatternRunner {
  readonly context: RunContext;

  private readonly gateway: ProcessApiGateway;
  private readonly loader: DefinitionLoader;
  private readonly cache: ArtifactCache;

  private readonly forceRefresh: boolean;
  private readonly pollIntervalMs: number;
  private readonly statusLogIntervalMs: number;
  private readonly deployRetry: { maxRetries: number; baseDelayMs: number };
  private readonly cleanupRequestTimeoutMs: number;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  private readonly deployed = new Set<PatternId>();
  private readonly runningJobs = new Map<PatternId, JobHandle>();
  private readonly results = new Map<PatternId, ExecutionResult>();

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions = {}) {
    this.gateway = deps.gateway;
    this.loader = deps.loader;
    this.cache = deps.cache;
    this.context = deps.context ?? new RunContext();

    this.forceRefresh = options.forceRefresh ?? false;
    this.pollIntervalMs = options.pollIntervalMs ?? config.run.pollIntervalMs;
    this.statusLogIntervalMs = options.statusLogIntervalMs ?? config.run.statusLogIntervalMs;
    this.deployRetry = options.deployRetry ?? {
      maxRetries: config.run.deployRetries,
      baseDelayMs: config.run.deployRetryBaseDelayMs,
    };
    this.cleanupRequestTimeoutMs = options.cleanupRequestTimeoutMs ?? config.run.cleanupRequestTimeoutMs;
    this.sleep = options._sleep ?? sleep;
    this.now = options._now ?? Date.now;
  }

  // ============================================
  // Lifecycle phases
  // ============================================

  /**
   * Deploy a pattern's workflow. The gateway call is retried with
   * exponential backoff; nothing is recorded unless it succeeds.
   */
  async deploy(patternId: PatternId): Promise<boolean> {
    const definition = this.loader.load(patternId);
    if (!definition) return false;

    const signal = this.context.signal;
    const available = await this.cache.ensure(patternId, definition.workflowUrl, this.forceRefresh, signal);
    if (!available) {
      logger.error(`Failed to prepare workflow for ${patternId}`);
      return false;
    }

    const content = this.cache.read(patternId);
    const workflow = content === null ? null : parseWorkflow(content);
    if (!workflow) {
      logger.error(`No usable workflow for ${patternId}`);
      return false;
    }

    logger.info(`Deploying pattern ${patternId}`);
    try {
      await withRetry(() => this.gateway.deploy(patternId, workflow, { signal }), {
        ...this.deployRetry,
        signal,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(`Deploy of ${patternId} failed, retrying`, {
            attempt,
            delayMs,
            error: errorMessage(error),
          });
        },
        _sleep: this.sleep,
      });
    } catch (error) {
      if (isCancellation(error)) throw error;
      logger.error(`Deployment failed for ${patternId}`, { error: errorMessage(error) });
      return false;
    }

    this.deployed.add(patternId);
    logger.info(`Pattern ${patternId} deployed successfully`);
    return true;
  }

  /**
   * Start a job for a deployed pattern. Not retried, so a slow server
   * never ends up with duplicate jobs.
   */
  async execute(patternId: PatternId): Promise<string | null> {
    if (!this.deployed.has(patternId)) {
      logger.error(`Pattern ${patternId} not deployed`);
      return null;
    }

    const definition = this.loader.load(patternId);
    if (!definition) return null;

    try {
      const job = await this.gateway.execute(patternId, definition.parameters, {
        signal: this.context.signal,
      });
      this.runningJobs.set(patternId, job);
      return job.jobId;
    } catch (error) {
      if (isCancellation(error)) throw error;
      logger.error(`Execution failed for ${patternId}`, { error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Poll the pattern's job until it is successful or failed, or until
   * `timeoutSeconds` elapse (0 = no limit). A timeout does not mean the
   * job failed: its remote outcome is unknown.
   */
  async monitor(patternId: PatternId, timeoutSeconds: number = config.run.defaultTimeoutSeconds): Promise<ExecutionResult> {
    const job = this.runningJobs.get(patternId);
    if (!job) {
      return Object.freeze({
        patternId,
        success: false,
        outcome: 'no-job' as const,
        message: 'No running job for this pattern',
      });
    }

    const { jobId } = job;
    const signal = this.context.signal;
    const timeoutMs = timeoutSeconds * 1000;
    const start = this.now();
    const elapsedSeconds = (): number => (this.now() - start) / 1000;

    let lastStatus: JobStatus | undefined;
    let lastLoggedAt = start;

    logger.info(`Monitoring job '${jobId}' (${timeoutSeconds === 0 ? 'no timeout' : `${timeoutSeconds}s timeout`})`);

    try {
      while (timeoutSeconds === 0 || this.now() - start < timeoutMs) {
        let snapshot: JobSnapshot;
        try {
          snapshot = await this.gateway.pollStatus(jobId, { signal });
        } catch (error) {
          if (isCancellation(error)) throw error;
          logger.error(`Error checking status of job '${jobId}'`, { error: errorMessage(error) });
          return this.record({
            patternId,
            jobId,
            success: false,
            outcome: 'monitor-error',
            executionTimeSeconds: elapsedSeconds(),
            message: `Lost track of job: ${errorMessage(error)}. Job may still be running on server. Check ${this.gateway.jobUrl(jobId)}`,
          });
        }

        this.runningJobs.set(patternId, { ...job, status: snapshot.status });

        if (isTerminalStatus(snapshot.status)) {
          const elapsed = elapsedSeconds();
          const success = snapshot.status === 'successful';
          logger.info(`Job '${jobId}' completed with status: ${snapshot.status} after ${elapsed.toFixed(1)}s`);
          return this.record({
            patternId,
            jobId,
            success,
            outcome: success ? 'successful' : 'failed',
            executionTimeSeconds: elapsed,
            message: `Job completed: ${snapshot.status}`,
            ...(success && snapshot.outputs ? { outputs: snapshot.outputs } : {}),
          });
        }

        const now = this.now();
        if (snapshot.status !== lastStatus || now - lastLoggedAt >= this.statusLogIntervalMs) {
          logger.info(`Job '${jobId}' status: ${snapshot.status} (elapsed: ${elapsedSeconds().toFixed(1)}s)`, {
            ...(snapshot.progress !== undefined ? { progress: snapshot.progress } : {}),
            ...(snapshot.message ? { message: snapshot.message } : {}),
          });
          lastStatus = snapshot.status;
          lastLoggedAt = now;
        }

        await this.sleep(this.pollIntervalMs, signal);
      }

      logger.warn(`Timeout reached for job '${jobId}'. The job may still be running on the server.`);
      logger.info(`You can check the job status later at: ${this.gateway.jobUrl(jobId)}`);
      return this.record({
        patternId,
        jobId,
        success: false,
        outcome: 'timeout',
        executionTimeSeconds: elapsedSeconds(),
        message: `Monitoring timeout after ${timeoutSeconds}s. Job may still be running on server. Check ${this.gateway.jobUrl(jobId)}`,
      });
    } finally {
      this.runningJobs.delete(patternId);
    }
  }

  async cleanup(patternId: PatternId): Promise<boolean> {
    const report = await this.cleanupWithReport(patternId);
    return report.ok;
  }

  /**
   * Best-effort teardown: delete the pattern's jobs, then its process.
   * Only a successful process deletion removes it from the deployed set,
   * so a failed cleanup can be retried. Cancellation is absorbed and
   * reported as an interrupted cleanup.
   */
  async cleanupWithReport(patternId: PatternId): Promise<CleanupReport> {
    if (!this.deployed.has(patternId)) return skippedCleanup(patternId);

    logger.info(`Cleaning up pattern ${patternId}`);
    const options: RequestOptions = {
      signal: this.context.signal,
      timeoutMs: this.cleanupRequestTimeoutMs,
    };
    const steps: CleanupStep[] = [];
    let interrupted = false;

    try {
      const jobIds = await this.runStep(steps, 'list-jobs', patternId, async () => {
        return this.gateway.listJobs(patternId, options);
      });

      for (const jobId of jobIds ?? []) {
        await this.runStep(steps, 'delete-job', jobId, () => this.gateway.deleteJob(jobId, options));
      }

      if (jobIds && jobIds.length > 0) {
        const deleted = steps.filter(s => s.kind === 'delete-job' && s.ok).length;
        logger.info(`Deleted ${deleted}/${jobIds.length} job(s) of ${patternId}`);
      }

      await this.runStep(steps, 'delete-process', patternId, () => this.gateway.deleteProcess(patternId, options));
    } catch (error) {
      if (!isCancellation(error)) throw error;
      interrupted = true;
      logger.warn(`Cleanup interrupted. Process '${patternId}' may still exist on server.`);
      logger.warn(`To clean up manually: ${this.context.manualCleanupCommand(patternId)}`);
    }

    const ok = isCleanupSuccessful(steps, interrupted);
    if (ok) {
      this.deployed.delete(patternId);
      logger.info(`Pattern ${patternId} cleaned up`);
    } else if (!interrupted) {
      logger.error(`Cleanup of ${patternId} incomplete, pattern stays deployed`);
    }

    return { patternId, skipped: false, steps, interrupted, ok };
  }

  /**
   * Run one cleanup sub-step and record its outcome. A boolean result is
   * the step's success; any other value counts as success and is returned.
   * Returns undefined when the step threw.
   */
  private async runStep<T>(
    steps: CleanupStep[],
    kind: CleanupStep['kind'],
    target: string,
    fn: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      const value = await fn();
      steps.push({ kind, target, ok: typeof value === 'boolean' ? value : true });
      return value;
    } catch (error) {
      if (isCancellation(error)) throw error;
      logger.warn(`Cleanup step ${kind} failed for '${target}'`, { error: errorMessage(error) });
      steps.push({ kind, target, ok: false, error: errorMessage(error) });
      return undefined;
    }
  }

  // ============================================
  // Composite operations
  // ============================================

  /**
   * Run a complete pattern: deploy -> execute -> monitor -> cleanup.
   *
   * Cleanup is skipped when the job's outcome is unknown (monitoring
   * timeout or lost contact): deleting the process under a running job
   * would orphan it. The skip is noted on the result message.
   */
  async runSingle(patternId: PatternId, options: RunOptions = {}): Promise<ExecutionResult> {
    const cleanup = options.cleanup ?? true;
    const timeoutSeconds = options.timeoutSeconds ?? config.run.defaultTimeoutSeconds;

    logger.info(`Starting complete execution of pattern ${patternId}`);
    this.context.beginPattern(patternId);

    try {
      if (!(await this.deploy(patternId))) {
        return this.record(failure(patternId, 'deploy-failed', 'Deployment failed'));
      }

      const jobId = await this.execute(patternId);
      if (!jobId) {
        if (cleanup) await this.cleanup(patternId);
        return this.record(failure(patternId, 'execute-failed', 'Execution failed'));
      }

      this.context.setActiveJob(jobId);
      let result = await this.monitor(patternId, timeoutSeconds);
      this.context.setActiveJob(null);

      if (cleanup) {
        if (isOutcomeUnknown(result)) {
          logger.info(`Skipping cleanup for ${patternId} - job may still be running`);
          result = withNote(result, CLEANUP_SKIPPED_NOTE);
        } else if (!(await this.cleanup(patternId))) {
          result = withNote(result, CLEANUP_FAILED_NOTE);
        }
      }

      return this.record(result);
    } finally {
      this.context.endPattern();
    }
  }

  /**
   * Clean up every deployed pattern. True only if all succeed.
   */
  async cleanupAll(): Promise<boolean> {
    let success = true;
    for (const patternId of [...this.deployed]) {
      if (!(await this.cleanup(patternId))) {
        success = false;
      }
    }
    return success;
  }

  /**
   * Take ownership of a process deployed by an earlier invocation, so that
   * cleanup removes it. No remote call is made.
   */
  adopt(patternId: PatternId): void {
    this.deployed.add(patternId);
  }

  // ============================================
  // Status
  // ============================================

  isDeployed(patternId: PatternId): boolean {
    return this.deployed.has(patternId);
  }

  lastResult(patternId: PatternId): ExecutionResult | undefined {
    return this.results.get(patternId);
  }

  getStatus(): OrchestratorStatus {
    return {
      deployedProcesses: [...this.deployed],
      runningJobs: Object.fromEntries(
        [...this.runningJobs].map(([patternId, job]) => [patternId, job.jobId]),
      ),
      completedResults: this.results.size,
      lastResults: Object.fromEntries(this.results),
    };
  }

  private record(result: ExecutionResult): ExecutionResult {
    const frozen = Object.freeze({ ...result });
    this.results.set(frozen.patternId, frozen);
    return frozen;
  }
}

function failure(patternId: PatternId, outcome: ExecutionOutcome, message: string): ExecutionResult {
  return { patternId, success: false, outcome, message };
}
