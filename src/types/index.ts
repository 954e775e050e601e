/**
 * Core types for the OGC patterns tester
 *
 * Patterns are CWL application packages deployed as processes on an
 * OGC API - Processes server. A deployed process is executed as a job,
 * which is polled until it reaches a terminal status.
 */

import { z } from 'zod';

// ============================================
// Patterns
// ============================================

/** Names a workflow definition and doubles as the remote process ID */
export type PatternId = string;

export type PatternType =
  | 'basic_processing'
  | 'scatter_gather'
  | 'conditional_workflow'
  | 'nested_workflow'
  | 'multiple_inputs'
  | 'multiple_outputs'
  | 'optional_outputs'
  | 'complex_parameters';

const PATTERN_TYPES: Record<string, PatternType> = {
  'pattern-1': 'basic_processing',
  'pattern-2': 'basic_processing',
  'pattern-3': 'basic_processing',
  'pattern-4': 'scatter_gather',
  'pattern-5': 'conditional_workflow',
  'pattern-6': 'nested_workflow',
  'pattern-7': 'basic_processing',
  'pattern-8': 'optional_outputs',
  'pattern-9': 'multiple_inputs',
  'pattern-10': 'multiple_outputs',
  'pattern-11': 'multiple_inputs',
  'pattern-12': 'complex_parameters',
};

export function patternTypeOf(patternId: PatternId): PatternType {
  return PATTERN_TYPES[patternId] ?? 'basic_processing';
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

export interface PatternDefinition {
  patternId: PatternId;
  /** Where the CWL workflow is fetched from */
  workflowUrl: string;
  /** Execution inputs, sent as-is in the execute request */
  parameters: JsonObject;
  patternType: PatternType;
}

// ============================================
// Processes and Jobs
// ============================================

export interface ProcessHandle {
  processId: PatternId;
  title?: string;
  deployed: boolean;
}

export const JOB_STATUSES = [
  'accepted',
  'running',
  'successful',
  'failed',
  'dismissed',
  'unknown',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

/**
 * Parse a server-reported status. Anything unrecognised is 'unknown',
 * which is never terminal.
 */
export function parseJobStatus(raw: unknown): JobStatus {
  if (typeof raw !== 'string') return 'unknown';
  const normalized = raw.trim().toLowerCase();
  return JOB_STATUSES.find(s => s === normalized) ?? 'unknown';
}

export function isTerminalStatus(status: JobStatus): boolean {
  return status === 'successful' || status === 'failed';
}

export interface JobHandle {
  jobId: string;
  processId: PatternId;
  status: JobStatus;
}

export interface JobSnapshot {
  jobId: string;
  processId?: string;
  status: JobStatus;
  progress?: number;
  message?: string;
  outputs?: JsonObject;
  created?: string;
  started?: string;
  finished?: string;
}

// ============================================
// Results
// ============================================

/**
 * How a single pattern run ended. 'timeout' and 'monitor-error' mean the
 * remote outcome is unknown: the job may still be running.
 */
export type ExecutionOutcome =
  | 'deploy-failed'
  | 'execute-failed'
  | 'no-job'
  | 'successful'
  | 'failed'
  | 'timeout'
  | 'monitor-error';

export interface ExecutionResult {
  readonly patternId: PatternId;
  readonly success: boolean;
  readonly outcome: ExecutionOutcome;
  readonly jobId?: string;
  readonly executionTimeSeconds?: number;
  readonly message?: string;
  /** Only present when the job finished successfully */
  readonly outputs?: JsonObject;
}

export function isOutcomeUnknown(result: ExecutionResult): boolean {
  return result.outcome === 'timeout' || result.outcome === 'monitor-error';
}

/** Returns a new result with `note` appended to its message. */
export function withNote(result: ExecutionResult, note: string): ExecutionResult {
  return Object.freeze({ ...result, message: `${result.message ?? ''}${note}` });
}

export interface TestSummary {
  totalPatterns: number;
  successfulPatterns: number;
  failedPatterns: number;
  totalExecutionTimeSeconds: number;
  results: ExecutionResult[];
}

/** Percentage of successful patterns, 0 for an empty batch */
export function successRate(summary: TestSummary): number {
  if (summary.totalPatterns === 0) return 0;
  return (summary.successfulPatterns / summary.totalPatterns) * 100;
}

// ============================================
// Orchestrator Status
// ============================================

export interface OrchestratorStatus {
  deployedProcesses: PatternId[];
  /** patternId -> jobId */
  runningJobs: Record<PatternId, string>;
  completedResults: number;
  lastResults: Record<PatternId, ExecutionResult>;
}

// ============================================
// Logging
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}
