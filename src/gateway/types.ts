/**
 * Process API Gateway
 *
 * The orchestrator's view of an OGC API - Processes server. Failures are
 * thrown (GatewayError, or CancelledError when the run signal aborts);
 * the delete operations report the outcome as a boolean instead.
 */

import type { JobHandle, JobSnapshot, JsonObject, PatternId, ProcessHandle } from '../types/index.js';

export interface RequestOptions {
  /** Aborting cancels the request with CancelledError */
  signal?: AbortSignal;
  /** Overrides the client's per-request timeout */
  timeoutMs?: number;
}

export interface WorkflowDocument {
  /** CWL document as YAML (JSON is valid YAML) */
  content: string;
  /** Workflow label, used as the process title */
  label?: string;
}

export interface ProcessApiGateway {
  readonly baseUrl: string;
  deploy(processId: PatternId, workflow: WorkflowDocument, options?: RequestOptions): Promise<ProcessHandle>;
  execute(processId: PatternId, parameters: JsonObject, options?: RequestOptions): Promise<JobHandle>;
  pollStatus(jobId: string, options?: RequestOptions): Promise<JobSnapshot>;
  listJobs(processId: PatternId, options?: RequestOptions): Promise<string[]>;
  /** false when the server refused the deletion */
  deleteJob(jobId: string, options?: RequestOptions): Promise<boolean>;
  /** false when the server refused the deletion */
  deleteProcess(processId: PatternId, options?: RequestOptions): Promise<boolean>;
  /** Where an operator can check a job by hand */
  jobUrl(jobId: string): string;
}
