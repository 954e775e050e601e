/**
 * OGC API - Processes client
 *
 * HTTP implementation of the Process API Gateway on top of global fetch.
 * Every request carries a per-request timeout combined with the caller's
 * run signal; an abort of the run signal surfaces as CancelledError.
 */

import { z } from 'zod';
import { logger } from '../config/logger.js';
import type { ServerConfig } from '../config/server-config.js';
import { GatewayError, cancelledFrom, errorMessage } from '../errors.js';
import {
  JsonObjectSchema,
  parseJobStatus,
  type JobHandle,
  type JobSnapshot,
  type JsonObject,
  type ProcessHandle,
} from '../types/index.js';
import type { ProcessApiGateway, RequestOptions, WorkflowDocument } from './types.js';

const StatusInfoSchema = z.object({
  jobID: z.string().nullish(),
  processID: z.string().nullish(),
  status: z.string(),
  progress: z.number().nullish(),
  message: z.string().nullish(),
  created: z.string().nullish(),
  started: z.string().nullish(),
  finished: z.string().nullish(),
  outputs: JsonObjectSchema.nullish(),
}).passthrough();

const ExecuteResponseSchema = z.object({
  jobID: z.string().optional(),
  job_id: z.string().optional(),
  status: z.string().optional(),
}).passthrough();

const JobListSchema = z.object({
  jobs: z.array(z.unknown()),
}).passthrough();

const JobEntrySchema = z.object({ jobID: z.string() }).passthrough();

interface HttpRequest {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  headers?: Record<string, string>;
  body?: string;
  options?: RequestOptions;
}

export class OgcProcessesClient implements ProcessApiGateway {
  readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly serverConfig: ServerConfig) {
    this.baseUrl = serverConfig.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = serverConfig.timeoutSeconds * 1000;
  }

  /**
   * Authorization header, by precedence: basic credentials, bearer access
   * token, then API key (also sent as a bearer credential).
   */
  authHeaders(): Record<string, string> {
    const { username, password, accessToken, apiKey } = this.serverConfig;
    if (username && password) {
      const credentials = Buffer.from(`${username}:${password}`).toString('base64');
      return { Authorization: `Basic ${credentials}` };
    }
    if (accessToken) return { Authorization: `Bearer ${accessToken}` };
    if (apiKey) return { Authorization: `Bearer ${apiKey}` };
    return {};
  }

  jobUrl(jobId: string): string {
    return `${this.baseUrl}/jobs/${encodeURIComponent(jobId)}`;
  }

  async deploy(processId: string, workflow: WorkflowDocument, options?: RequestOptions): Promise<ProcessHandle> {
    logger.info(`Deploying process '${processId}' to ${this.baseUrl}`);

    const response = await this.send({
      method: 'POST',
      path: '/processes',
      headers: {
        'Content-Type': 'application/cwl+yaml',
        Accept: 'application/json',
      },
      body: workflow.content,
      options,
    });

    const handle: ProcessHandle = {
      processId,
      title: workflow.label ?? processId,
      deployed: true,
    };

    if (response.status === 200 || response.status === 201) {
      logger.info(`Process '${processId}' deployed successfully`);
      return handle;
    }

    if (response.status === 409) {
      logger.info(`Process '${processId}' already exists on server`);
      return handle;
    }

    throw await this.failure(`Deploying process '${processId}'`, response, options?.signal);
  }

  async execute(processId: string, parameters: JsonObject, options?: RequestOptions): Promise<JobHandle> {
    logger.info(`Executing process '${processId}'`);

    const response = await this.send({
      method: 'POST',
      path: `/processes/${encodeURIComponent(processId)}/execution`,
      headers: {
        Prefer: 'respond-async',
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({ inputs: parameters, response: 'document' }),
      options,
    });

    if (!response.ok) {
      throw await this.failure(`Executing process '${processId}'`, response, options?.signal);
    }

    const body = ExecuteResponseSchema.safeParse(await this.readJson(response, options?.signal));
    const fromBody = body.success ? body.data : undefined;
    const jobId = jobIdFromLocation(response.headers.get('Location'))
      ?? fromBody?.jobID
      ?? fromBody?.job_id;

    if (!jobId) {
      throw new GatewayError(`No job ID found in response for process '${processId}'`, {
        status: response.status,
      });
    }

    logger.info(`Job ${jobId} started for process '${processId}'`);
    return {
      jobId,
      processId,
      status: fromBody?.status ? parseJobStatus(fromBody.status) : 'accepted',
    };
  }

  async pollStatus(jobId: string, options?: RequestOptions): Promise<JobSnapshot> {
    logger.debug(`Checking status for job '${jobId}'`);

    const response = await this.send({
      method: 'GET',
      path: `/jobs/${encodeURIComponent(jobId)}`,
      headers: { Accept: 'application/json' },
      options,
    });

    if (!response.ok) {
      throw await this.failure(`Checking status of job '${jobId}'`, response, options?.signal);
    }

    const parsed = StatusInfoSchema.safeParse(await this.readJson(response, options?.signal));
    if (!parsed.success) {
      throw new GatewayError(`Unexpected status document for job '${jobId}'`, {
        status: response.status,
      });
    }

    const info = parsed.data;
    return {
      jobId: info.jobID ?? jobId,
      processId: info.processID ?? undefined,
      status: parseJobStatus(info.status),
      progress: info.progress ?? undefined,
      message: info.message ?? undefined,
      outputs: info.outputs ?? undefined,
      created: info.created ?? undefined,
      started: info.started ?? undefined,
      finished: info.finished ?? undefined,
    };
  }

  async listJobs(processId: string, options?: RequestOptions): Promise<string[]> {
    const response = await this.send({
      method: 'GET',
      path: `/jobs?processID=${encodeURIComponent(processId)}`,
      headers: { Accept: 'application/json' },
      options,
    });

    if (!response.ok) {
      throw await this.failure(`Listing jobs of process '${processId}'`, response, options?.signal);
    }

    const parsed = JobListSchema.safeParse(await this.readJson(response, options?.signal));
    if (!parsed.success) {
      throw new GatewayError(`Unexpected job list for process '${processId}'`, {
        status: response.status,
      });
    }

    // Entries without a jobID are skipped
    const jobIds = parsed.data.jobs.flatMap(entry => {
      const job = JobEntrySchema.safeParse(entry);
      return job.success ? [job.data.jobID] : [];
    });
    if (jobIds.length < parsed.data.jobs.length) {
      logger.warn(`Skipped ${parsed.data.jobs.length - jobIds.length} job entry(ies) without a jobID`);
    }
    logger.info(`Found ${jobIds.length} job(s) for process '${processId}'`);
    return jobIds;
  }

  async deleteJob(jobId: string, options?: RequestOptions): Promise<boolean> {
    logger.info(`Deleting job '${jobId}'`);

    const response = await this.send({
      method: 'DELETE',
      path: `/jobs/${encodeURIComponent(jobId)}`,
      headers: { Accept: 'application/json' },
      options,
    });

    if (response.ok) {
      logger.info(`Job '${jobId}' deleted successfully`);
      return true;
    }

    logger.warn(`Failed to delete job '${jobId}': HTTP ${response.status}`);
    return false;
  }

  async deleteProcess(processId: string, options?: RequestOptions): Promise<boolean> {
    logger.info(`Deleting process '${processId}'`);

    const response = await this.send({
      method: 'DELETE',
      path: `/processes/${encodeURIComponent(processId)}`,
      options,
    });

    if (response.status === 200 || response.status === 204) {
      logger.info(`Process '${processId}' deleted successfully`);
      return true;
    }

    const body = await this.readText(response, options?.signal);
    logger.error(`Failed to delete process '${processId}': HTTP ${response.status}`, body ? { body } : undefined);
    return false;
  }

  private async send(request: HttpRequest): Promise<Response> {
    const { method, path, headers = {}, body, options = {} } = request;
    const runSignal = options.signal;
    if (runSignal?.aborted) throw cancelledFrom(runSignal);

    const timeout = AbortSignal.timeout(options.timeoutMs ?? this.timeoutMs);
    const signal = runSignal ? AbortSignal.any([runSignal, timeout]) : timeout;

    try {
      return await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: { ...this.authHeaders(), ...headers },
        body,
        signal,
      });
    } catch (error) {
      if (runSignal?.aborted) throw cancelledFrom(runSignal);
      if (timeout.aborted) {
        throw new GatewayError(`${method} ${path} timed out after ${options.timeoutMs ?? this.timeoutMs}ms`, { cause: error });
      }
      throw new GatewayError(`${method} ${path} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async failure(action: string, response: Response, signal?: AbortSignal): Promise<GatewayError> {
    const body = await this.readText(response, signal);
    logger.error(`${action} failed: HTTP ${response.status}`, body ? { body } : undefined);
    return new GatewayError(`${action} failed: HTTP ${response.status}`, {
      status: response.status,
      body,
    });
  }

  /**
   * Body text, or '' when it cannot be read. A run signal aborted while
   * reading still surfaces as CancelledError.
   */
  private async readText(response: Response, signal?: AbortSignal): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      if (signal?.aborted) throw cancelledFrom(signal);
      logger.debug('Could not read response body', { error: errorMessage(error) });
      return '';
    }
  }

  private async readJson(response: Response, signal?: AbortSignal): Promise<unknown> {
    const text = await this.readText(response, signal);
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch {
      logger.debug('Response body is not JSON', { body: text.slice(0, 200) });
      return null;
    }
  }
}

/**
 * Job ID from a Location header such as `https://host/jobs/<id>`.
 */
export function jobIdFromLocation(location: string | null): string | undefined {
  if (!location) return undefined;
  const segment = location.replace(/\/+$/, '').split('/').pop();
  return segment ? decodeURIComponent(segment) : undefined;
}
