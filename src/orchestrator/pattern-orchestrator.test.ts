/**
 * Pattern Orchestrator Tests
 *
 * Drives the orchestrator against an in-memory gateway with an injected
 * clock and sleep, so polling and backoff run instantly.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';

vi.mock('../config/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { logger } from '../config/logger.js';
import { CancelledError, GatewayError } from '../errors.js';
import type { ProcessApiGateway } from '../gateway/types.js';
import type { ArtifactCache } from '../patterns/artifact-cache.js';
import type { DefinitionLoader } from '../patterns/definition-loader.js';
import type { PatternDefinition } from '../types/index.js';
import type { SleepFn } from '../utils/sleep.js';
import { describeCleanup } from './cleanup-report.js';
import {
  CLEANUP_FAILED_NOTE,
  CLEANUP_SKIPPED_NOTE,
  PatternOrchestrator,
} from './pattern-orchestrator.js';
import { RunContext } from './run-context.js';

const CWL = 'cwlVersion: v1.2\nclass: Workflow\nlabel: Water bodies\n';
const JOB_URL = 'http://ogc.test/jobs/job-1';

function makeGateway() {
  return {
    baseUrl: 'http://ogc.test',
    deploy: vi.fn<ProcessApiGateway['deploy']>(async processId => ({ processId, deployed: true })),
    execute: vi.fn<ProcessApiGateway['execute']>(async processId => ({
      jobId: 'job-1',
      processId,
      status: 'accepted',
    })),
    pollStatus: vi.fn<ProcessApiGateway['pollStatus']>(async jobId => ({
      jobId,
      status: 'successful',
      outputs: { stac: 'catalog.json' },
    })),
    listJobs: vi.fn<ProcessApiGateway['listJobs']>(async () => []),
    deleteJob: vi.fn<ProcessApiGateway['deleteJob']>(async () => true),
    deleteProcess: vi.fn<ProcessApiGateway['deleteProcess']>(async () => true),
    jobUrl: (jobId: string): string => `http://ogc.test/jobs/${jobId}`,
  };
}

function definitionFor(patternId: string): PatternDefinition {
  return {
    patternId,
    workflowUrl: `http://cwl.test/${patternId}.cwl`,
    parameters: { aoi: '-118.98,33.97,-118.70,34.10', bands: ['green', 'nir'] },
    patternType: 'basic_processing',
  };
}

describe('PatternOrchestrator', () => {
  let gateway: ReturnType<typeof makeGateway>;
  let load: Mock<DefinitionLoader['load']>;
  let loader: DefinitionLoader;
  let ensure: Mock<ArtifactCache['ensure']>;
  let read: Mock<ArtifactCache['read']>;
  let cache: ArtifactCache;
  let context: RunContext;
  let clock: number;
  let mockSleep: Mock<SleepFn>;

  function makeOrchestrator(): PatternOrchestrator {
    return new PatternOrchestrator(
      { gateway, loader, cache, context },
      {
        pollIntervalMs: 10_000,
        statusLogIntervalMs: 60_000,
        _sleep: mockSleep,
        _now: () => clock,
      },
    );
  }

  beforeEach(() => {
    vi.clearAllMocks();
    gateway = makeGateway();
    load = vi.fn<DefinitionLoader['load']>(patternId => definitionFor(patternId));
    loader = { load, exists: () => true, listPatternIds: () => [] };
    ensure = vi.fn<ArtifactCache['ensure']>(async () => true);
    read = vi.fn<ArtifactCache['read']>(() => CWL);
    cache = { ensure, read };
    context = new RunContext();
    clock = 0;
    mockSleep = vi.fn<SleepFn>(async ms => {
      clock += ms;
    });
  });

  describe('deploy', () => {
    it('deploys the cached workflow and records the pattern', async () => {
      const orchestrator = makeOrchestrator();

      expect(await orchestrator.deploy('pattern-1')).toBe(true);
      expect(ensure).toHaveBeenCalledWith('pattern-1', 'http://cwl.test/pattern-1.cwl', false, context.signal);
      expect(gateway.deploy).toHaveBeenCalledWith(
        'pattern-1',
        { content: CWL, label: 'Water bodies' },
        { signal: context.signal },
      );
      expect(orchestrator.isDeployed('pattern-1')).toBe(true);
    });

    it('retries with exponential backoff before succeeding', async () => {
      gateway.deploy
        .mockRejectedValueOnce(new GatewayError('HTTP 503', { status: 503 }))
        .mockRejectedValueOnce(new GatewayError('HTTP 503', { status: 503 }));
      const orchestrator = makeOrchestrator();

      expect(await orchestrator.deploy('pattern-1')).toBe(true);
      expect(gateway.deploy).toHaveBeenCalledTimes(3);
      expect(mockSleep.mock.calls.map(call => call[0])).toEqual([1000, 2000]);
    });

    it('gives up after 3 retries without recording the pattern', async () => {
      gateway.deploy.mockRejectedValue(new GatewayError('HTTP 500', { status: 500 }));
      const orchestrator = makeOrchestrator();

      expect(await orchestrator.deploy('pattern-1')).toBe(false);
      expect(gateway.deploy).toHaveBeenCalledTimes(4);
      expect(mockSleep.mock.calls.map(call => call[0])).toEqual([1000, 2000, 4000]);
      expect(orchestrator.isDeployed('pattern-1')).toBe(false);
    });

    it('returns false when the definition is missing', async () => {
      load.mockReturnValue(null);
      const orchestrator = makeOrchestrator();

      expect(await orchestrator.deploy('pattern-99')).toBe(false);
      expect(ensure).not.toHaveBeenCalled();
      expect(gateway.deploy).not.toHaveBeenCalled();
    });

    it('returns false when the workflow cannot be fetched', async () => {
      ensure.mockResolvedValue(false);
      const orchestrator = makeOrchestrator();

      expect(await orchestrator.deploy('pattern-1')).toBe(false);
      expect(gateway.deploy).not.toHaveBeenCalled();
    });

    it('returns false when the cached workflow is not a YAML mapping', async () => {
      read.mockReturnValue('just a string');
      const orchestrator = makeOrchestrator();

      expect(await orchestrator.deploy('pattern-1')).toBe(false);
      expect(gateway.deploy).not.toHaveBeenCalled();
    });

    it('propagates cancellation without retrying', async () => {
      gateway.deploy.mockRejectedValue(new CancelledError());
      const orchestrator = makeOrchestrator();

      await expect(orchestrator.deploy('pattern-1')).rejects.toBeInstanceOf(CancelledError);
      expect(gateway.deploy).toHaveBeenCalledTimes(1);
      expect(orchestrator.isDeployed('pattern-1')).toBe(false);
    });
  });

  describe('execute', () => {
    it('returns null without a remote call when not deployed', async () => {
      const orchestrator = makeOrchestrator();

      expect(await orchestrator.execute('pattern-1')).toBeNull();
      expect(gateway.execute).not.toHaveBeenCalled();
    });

    it('sends the pattern parameters and tracks the job', async () => {
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');

      expect(await orchestrator.execute('pattern-1')).toBe('job-1');
      expect(gateway.execute).toHaveBeenCalledWith(
        'pattern-1',
        definitionFor('pattern-1').parameters,
        { signal: context.signal },
      );
      expect(orchestrator.getStatus().runningJobs).toEqual({ 'pattern-1': 'job-1' });
    });

    it('returns null and leaves state untouched on failure', async () => {
      gateway.execute.mockRejectedValue(new GatewayError('HTTP 400', { status: 400 }));
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');

      expect(await orchestrator.execute('pattern-1')).toBeNull();
      expect(gateway.execute).toHaveBeenCalledTimes(1);
      expect(orchestrator.getStatus().runningJobs).toEqual({});
    });
  });

  describe('monitor', () => {
    it('returns a no-job result when nothing is running', async () => {
      const orchestrator = makeOrchestrator();

      const result = await orchestrator.monitor('pattern-1', 60);

      expect(result).toEqual({
        patternId: 'pattern-1',
        success: false,
        outcome: 'no-job',
        message: 'No running job for this pattern',
      });
      expect(gateway.pollStatus).not.toHaveBeenCalled();
    });

    it('polls until the job succeeds', async () => {
      gateway.pollStatus
        .mockResolvedValueOnce({ jobId: 'job-1', status: 'running' })
        .mockResolvedValueOnce({ jobId: 'job-1', status: 'running' });
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');
      await orchestrator.execute('pattern-1');

      const result = await orchestrator.monitor('pattern-1', 600);

      expect(result).toEqual({
        patternId: 'pattern-1',
        jobId: 'job-1',
        success: true,
        outcome: 'successful',
        executionTimeSeconds: 20,
        message: 'Job completed: successful',
        outputs: { stac: 'catalog.json' },
      });
      expect(gateway.pollStatus).toHaveBeenCalledTimes(3);
      expect(mockSleep).toHaveBeenCalledWith(10_000, context.signal);
      expect(orchestrator.getStatus().runningJobs).toEqual({});
      expect(orchestrator.lastResult('pattern-1')).toBe(result);
    });

    it('drops outputs of a failed job', async () => {
      gateway.pollStatus.mockResolvedValue({ jobId: 'job-1', status: 'failed', outputs: { partial: true } });
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');
      await orchestrator.execute('pattern-1');

      const result = await orchestrator.monitor('pattern-1', 600);

      expect(result.success).toBe(false);
      expect(result.outcome).toBe('failed');
      expect(result.message).toBe('Job completed: failed');
      expect(result.outputs).toBeUndefined();
    });

    it('treats an unknown status as non-terminal', async () => {
      gateway.pollStatus
        .mockResolvedValueOnce({ jobId: 'job-1', status: 'unknown' })
        .mockResolvedValueOnce({ jobId: 'job-1', status: 'dismissed' });
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');
      await orchestrator.execute('pattern-1');

      const result = await orchestrator.monitor('pattern-1', 600);

      expect(result.outcome).toBe('successful');
      expect(gateway.pollStatus).toHaveBeenCalledTimes(3);
    });

    it('times out without calling the job failed', async () => {
      gateway.pollStatus.mockResolvedValue({ jobId: 'job-1', status: 'running' });
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');
      await orchestrator.execute('pattern-1');

      const result = await orchestrator.monitor('pattern-1', 30);

      expect(result.outcome).toBe('timeout');
      expect(result.success).toBe(false);
      expect(result.executionTimeSeconds).toBe(30);
      expect(result.message).toBe(
        `Monitoring timeout after 30s. Job may still be running on server. Check ${JOB_URL}`,
      );
      expect(gateway.pollStatus).toHaveBeenCalledTimes(3);
      expect(orchestrator.getStatus().runningJobs).toEqual({});
    });

    it('never times out with a timeout of 0', async () => {
      for (let i = 0; i < 201; i++) {
        gateway.pollStatus.mockResolvedValueOnce({ jobId: 'job-1', status: 'running' });
      }
      gateway.pollStatus.mockResolvedValueOnce({ jobId: 'job-1', status: 'successful' });
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');
      await orchestrator.execute('pattern-1');

      const result = await orchestrator.monitor('pattern-1', 0);

      expect(result.outcome).toBe('successful');
      expect(result.executionTimeSeconds).toBe(2010);
      expect(gateway.pollStatus).toHaveBeenCalledTimes(202);
    });

    it('logs a status only when it changes or after the log interval', async () => {
      gateway.pollStatus
        .mockResolvedValueOnce({ jobId: 'job-1', status: 'accepted' })
        .mockResolvedValueOnce({ jobId: 'job-1', status: 'running' })
        .mockResolvedValueOnce({ jobId: 'job-1', status: 'running' })
        .mockResolvedValueOnce({ jobId: 'job-1', status: 'running' });
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');
      await orchestrator.execute('pattern-1');

      await orchestrator.monitor('pattern-1', 600);

      const statusLines = vi.mocked(logger.info).mock.calls
        .map(call => call[0])
        .filter(message => message.startsWith("Job 'job-1' status:"));
      expect(statusLines).toEqual([
        "Job 'job-1' status: accepted (elapsed: 0.0s)",
        "Job 'job-1' status: running (elapsed: 10.0s)",
      ]);
    });

    it('ends with monitor-error when polling fails', async () => {
      gateway.pollStatus.mockRejectedValue(new GatewayError('HTTP 502', { status: 502 }));
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');
      await orchestrator.execute('pattern-1');

      const result = await orchestrator.monitor('pattern-1', 600);

      expect(result.outcome).toBe('monitor-error');
      expect(result.message).toBe(
        `Lost track of job: HTTP 502. Job may still be running on server. Check ${JOB_URL}`,
      );
      expect(orchestrator.getStatus().runningJobs).toEqual({});
    });

    it('clears the running job when cancelled', async () => {
      gateway.pollStatus.mockResolvedValue({ jobId: 'job-1', status: 'running' });
      mockSleep.mockImplementation(async () => {
        context.cancel();
        throw new CancelledError('Interrupted by user');
      });
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');
      await orchestrator.execute('pattern-1');

      await expect(orchestrator.monitor('pattern-1', 600)).rejects.toBeInstanceOf(CancelledError);
      expect(orchestrator.getStatus().runningJobs).toEqual({});
      expect(orchestrator.lastResult('pattern-1')).toBeUndefined();
    });
  });

  describe('cleanup', () => {
    it('is a no-op success when not deployed', async () => {
      const orchestrator = makeOrchestrator();

      const report = await orchestrator.cleanupWithReport('pattern-1');

      expect(report.ok).toBe(true);
      expect(report.skipped).toBe(true);
      expect(gateway.listJobs).not.toHaveBeenCalled();
      expect(gateway.deleteProcess).not.toHaveBeenCalled();
    });

    it('deletes jobs then the process, and is idempotent', async () => {
      gateway.listJobs.mockResolvedValue(['job-a', 'job-b']);
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');

      expect(await orchestrator.cleanup('pattern-1')).toBe(true);
      expect(await orchestrator.cleanup('pattern-1')).toBe(true);

      expect(gateway.deleteJob.mock.calls.map(call => call[0])).toEqual(['job-a', 'job-b']);
      expect(gateway.deleteProcess).toHaveBeenCalledTimes(1);
      expect(gateway.deleteProcess).toHaveBeenCalledWith('pattern-1', {
        signal: context.signal,
        timeoutMs: 5000,
      });
      expect(orchestrator.isDeployed('pattern-1')).toBe(false);
    });

    it('keeps the pattern deployed when the process is not deleted', async () => {
      gateway.deleteProcess.mockResolvedValueOnce(false);
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');

      expect(await orchestrator.cleanup('pattern-1')).toBe(false);
      expect(orchestrator.isDeployed('pattern-1')).toBe(true);

      expect(await orchestrator.cleanup('pattern-1')).toBe(true);
      expect(orchestrator.isDeployed('pattern-1')).toBe(false);
    });

    it('tolerates job listing and job deletion failures', async () => {
      gateway.listJobs.mockResolvedValueOnce(['job-a', 'job-b']);
      gateway.deleteJob.mockResolvedValueOnce(false).mockRejectedValueOnce(new GatewayError('reset'));
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');

      const report = await orchestrator.cleanupWithReport('pattern-1');

      expect(report.ok).toBe(true);
      expect(report.steps).toEqual([
        { kind: 'list-jobs', target: 'pattern-1', ok: true },
        { kind: 'delete-job', target: 'job-a', ok: false },
        { kind: 'delete-job', target: 'job-b', ok: false, error: 'reset' },
        { kind: 'delete-process', target: 'pattern-1', ok: true },
      ]);
      expect(describeCleanup(report)).toBe('process deleted, 0/2 job(s) deleted');
    });

    it('still deletes the process when listing jobs fails', async () => {
      gateway.listJobs.mockRejectedValueOnce(new GatewayError('HTTP 500', { status: 500 }));
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');

      const report = await orchestrator.cleanupWithReport('pattern-1');

      expect(report.ok).toBe(true);
      expect(gateway.deleteJob).not.toHaveBeenCalled();
      expect(gateway.deleteProcess).toHaveBeenCalledTimes(1);
      expect(describeCleanup(report)).toBe('process deleted, 0/0 job(s) deleted, job listing failed');
    });

    it('reports an interrupted cleanup instead of throwing', async () => {
      gateway.listJobs.mockResolvedValueOnce(['job-a']);
      gateway.deleteJob.mockImplementationOnce(async () => {
        context.cancel();
        throw new CancelledError('Interrupted by user');
      });
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');

      const report = await orchestrator.cleanupWithReport('pattern-1');

      expect(report.interrupted).toBe(true);
      expect(report.ok).toBe(false);
      expect(gateway.deleteProcess).not.toHaveBeenCalled();
      expect(orchestrator.isDeployed('pattern-1')).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith('To clean up manually: ogc-patterns-tester cleanup pattern-1');
    });

    it('cleans up an adopted process without deploying it', async () => {
      const orchestrator = makeOrchestrator();

      orchestrator.adopt('pattern-7');
      expect(await orchestrator.cleanup('pattern-7')).toBe(true);

      expect(gateway.deploy).not.toHaveBeenCalled();
      expect(gateway.deleteProcess).toHaveBeenCalledWith('pattern-7', expect.anything());
      expect(orchestrator.isDeployed('pattern-7')).toBe(false);
    });

    it('cleanupAll is true only when every pattern is cleaned up', async () => {
      gateway.deleteProcess.mockImplementation(async processId => processId !== 'pattern-2');
      const orchestrator = makeOrchestrator();
      await orchestrator.deploy('pattern-1');
      await orchestrator.deploy('pattern-2');

      expect(await orchestrator.cleanupAll()).toBe(false);
      expect(orchestrator.getStatus().deployedProcesses).toEqual(['pattern-2']);
    });
  });

  describe('runSingle', () => {
    it('runs the full lifecycle and leaves no state behind', async () => {
      const orchestrator = makeOrchestrator();

      const result = await orchestrator.runSingle('pattern-1', { timeoutSeconds: 600 });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Job completed: successful');
      expect(Object.isFrozen(result)).toBe(true);
      expect(gateway.deleteProcess).toHaveBeenCalledTimes(1);
      expect(orchestrator.getStatus()).toEqual({
        deployedProcesses: [],
        runningJobs: {},
        completedResults: 1,
        lastResults: { 'pattern-1': result },
      });
      expect(context.inFlight()).toEqual({ patternId: null, jobId: null });
    });

    it('reports a deployment failure without cleanup', async () => {
      gateway.deploy.mockRejectedValue(new GatewayError('HTTP 500', { status: 500 }));
      const orchestrator = makeOrchestrator();

      const result = await orchestrator.runSingle('pattern-1');

      expect(result).toEqual({
        patternId: 'pattern-1',
        success: false,
        outcome: 'deploy-failed',
        message: 'Deployment failed',
      });
      expect(gateway.listJobs).not.toHaveBeenCalled();
      expect(gateway.deleteProcess).not.toHaveBeenCalled();
    });

    it('cleans up after an execution failure', async () => {
      gateway.execute.mockRejectedValue(new GatewayError('HTTP 400', { status: 400 }));
      const orchestrator = makeOrchestrator();

      const result = await orchestrator.runSingle('pattern-1');

      expect(result.outcome).toBe('execute-failed');
      expect(result.message).toBe('Execution failed');
      expect(gateway.deleteProcess).toHaveBeenCalledTimes(1);
      expect(orchestrator.isDeployed('pattern-1')).toBe(false);
    });

    it('skips cleanup when the job may still be running', async () => {
      gateway.pollStatus.mockResolvedValue({ jobId: 'job-1', status: 'running' });
      const orchestrator = makeOrchestrator();

      const result = await orchestrator.runSingle('pattern-1', { timeoutSeconds: 20 });

      expect(result.outcome).toBe('timeout');
      expect(result.message).toBe(
        `Monitoring timeout after 20s. Job may still be running on server. Check ${JOB_URL}${CLEANUP_SKIPPED_NOTE}`,
      );
      expect(gateway.deleteProcess).not.toHaveBeenCalled();
      expect(orchestrator.isDeployed('pattern-1')).toBe(true);
      expect(orchestrator.lastResult('pattern-1')).toBe(result);
    });

    it('skips cleanup after a monitoring error', async () => {
      gateway.pollStatus.mockRejectedValue(new GatewayError('HTTP 502', { status: 502 }));
      const orchestrator = makeOrchestrator();

      const result = await orchestrator.runSingle('pattern-1');

      expect(result.outcome).toBe('monitor-error');
      expect(result.message?.endsWith(CLEANUP_SKIPPED_NOTE)).toBe(true);
      expect(gateway.deleteProcess).not.toHaveBeenCalled();
    });

    it('cleans up after a failed job', async () => {
      gateway.pollStatus.mockResolvedValue({ jobId: 'job-1', status: 'failed' });
      const orchestrator = makeOrchestrator();

      const result = await orchestrator.runSingle('pattern-1');

      expect(result.message).toBe('Job completed: failed');
      expect(gateway.deleteProcess).toHaveBeenCalledTimes(1);
    });

    it('notes a failed cleanup on the result', async () => {
      gateway.deleteProcess.mockResolvedValue(false);
      const orchestrator = makeOrchestrator();

      const result = await orchestrator.runSingle('pattern-1');

      expect(result.success).toBe(true);
      expect(result.message).toBe(`Job completed: successful${CLEANUP_FAILED_NOTE}`);
      expect(orchestrator.isDeployed('pattern-1')).toBe(true);
    });

    it('leaves the pattern deployed when cleanup is disabled', async () => {
      const orchestrator = makeOrchestrator();

      const result = await orchestrator.runSingle('pattern-1', { cleanup: false });

      expect(result.message).toBe('Job completed: successful');
      expect(gateway.deleteProcess).not.toHaveBeenCalled();
      expect(orchestrator.getStatus().deployedProcesses).toEqual(['pattern-1']);
    });

    it('tracks the pattern and job in the run context while in flight', async () => {
      const seen: Array<{ patternId: string | null; jobId: string | null }> = [];
      gateway.pollStatus.mockImplementation(async jobId => {
        seen.push(context.inFlight());
        return { jobId, status: 'successful' };
      });
      const orchestrator = makeOrchestrator();

      await orchestrator.runSingle('pattern-1');

      expect(seen).toEqual([{ patternId: 'pattern-1', jobId: 'job-1' }]);
      expect(context.inFlight()).toEqual({ patternId: null, jobId: null });
    });

    it('propagates cancellation and clears the run context', async () => {
      gateway.pollStatus.mockImplementation(async () => {
        context.cancel();
        throw new CancelledError('Interrupted by user');
      });
      const orchestrator = makeOrchestrator();

      await expect(orchestrator.runSingle('pattern-1')).rejects.toThrow('Interrupted by user');
      expect(context.inFlight()).toEqual({ patternId: null, jobId: null });
      expect(orchestrator.getStatus().runningJobs).toEqual({});
      expect(orchestrator.isDeployed('pattern-1')).toBe(true);
    });
  });
});
