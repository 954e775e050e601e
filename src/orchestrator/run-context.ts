/**
 * Run Context
 *
 * Owned by the top-level run invocation and injected into the
 * orchestrator. Records the pattern/job currently in flight so an
 * interrupt handler can tell the operator what to clean up by hand, and
 * carries the AbortSignal that cancels pending requests and waits.
 *
 * Advisory bookkeeping only: nothing here is transactional.
 */

import { CancelledError } from '../errors.js';
import type { PatternId } from '../types/index.js';

export interface InFlightWork {
  patternId: PatternId | null;
  jobId: string | null;
}

export interface RunContextOptions {
  /** Command an operator runs to remove a deployed pattern by hand */
  cleanupCommand?: (patternId: PatternId) => string;
}

const defaultCleanupCommand = (patternId: PatternId): string =>
  `ogc-patterns-tester cleanup ${patternId}`;

export class RunContext {
  private readonly controller = new AbortController();
  private readonly cleanupCommand: (patternId: PatternId) => string;
  private patternId: PatternId | null = null;
  private jobId: string | null = null;

  constructor(options: RunContextOptions = {}) {
    this.cleanupCommand = options.cleanupCommand ?? defaultCleanupCommand;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get activeJobId(): string | null {
    return this.jobId;
  }

  beginPattern(patternId: PatternId): void {
    this.patternId = patternId;
    this.jobId = null;
  }

  setActiveJob(jobId: string | null): void {
    this.jobId = jobId;
  }

  endPattern(): void {
    this.patternId = null;
    this.jobId = null;
  }

  /**
   * Abort pending requests and waits. Later calls are no-ops.
   */
  cancel(reason = 'Interrupted by user'): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new CancelledError(reason));
    }
  }

  inFlight(): InFlightWork {
    return { patternId: this.patternId, jobId: this.jobId };
  }

  manualCleanupCommand(patternId: PatternId): string {
    return this.cleanupCommand(patternId);
  }

  /**
   * Operator-facing description of the work in flight, one line each.
   */
  describeInFlight(jobUrl?: (jobId: string) => string): string[] {
    if (!this.patternId) return ['No pattern was in flight.'];

    const lines = [`Pattern in flight: ${this.patternId}`];
    if (this.jobId) {
      lines.push(`Job in flight: ${this.jobId}`);
      if (jobUrl) lines.push(`Check the job at: ${jobUrl(this.jobId)}`);
    }
    lines.push(`To clean up manually: ${this.cleanupCommand(this.patternId)}`);
    return lines;
  }
}
