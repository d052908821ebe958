import { FhirClient } from '../base/fhir-client.js';
import { ImportJob, ImportJobStates, ImportStatusReport, isTerminal } from '../types/import-job-types.js';
import {
  CancelledError,
  ImporterErrorKind,
  SubmissionError,
  TimeoutError,
  isContentTypeRejection
} from '../errors/import-errors.js';
import { IMPORT_DEFAULTS } from '../constants/import-constants.js';
import { LogPrefixes } from '../constants/log-prefixes.js';
import { Clock, systemClock } from '../utilities/clock.js';

export interface JobTrackerConfig {
  verbose: boolean;
  initialPollIntervalMs: number;
  maxPollIntervalMs: number;
  pollBackoffFactor: number;
  /** Total time to wait for one job before giving up on it. */
  maxWaitMs: number;
  /** Errors reported by a still-running job beyond which it is treated as failed. */
  maxErrorCount: number;
  clock?: Clock;
}

export const DEFAULT_TRACKER_CONFIG: JobTrackerConfig = {
  verbose: false,
  initialPollIntervalMs: IMPORT_DEFAULTS.initialPollIntervalMs,
  maxPollIntervalMs: IMPORT_DEFAULTS.maxPollIntervalMs,
  pollBackoffFactor: IMPORT_DEFAULTS.pollBackoffFactor,
  maxWaitMs: IMPORT_DEFAULTS.maxWaitMs,
  maxErrorCount: IMPORT_DEFAULTS.maxErrorCount
};

export class JobTracker {
  protected config: JobTrackerConfig;
  private fhirClient: FhirClient;
  private clock: Clock;

  constructor(fhirClient: FhirClient, config: JobTrackerConfig = DEFAULT_TRACKER_CONFIG) {
    this.fhirClient = fhirClient;
    this.config = config;
    this.clock = config.clock ?? systemClock;
  }

  /**
   * Poll the job until it reaches Succeeded, FailedRetryable or FailedFatal.
   * Rejects with `CancelledError` when the signal aborts; no further polls
   * are issued after that.
   */
  async await(job: ImportJob, signal?: AbortSignal): Promise<ImportJob> {
    if (isTerminal(job.state)) {
      return job;
    }
    if (!job.jobHandle) {
      return failImportJob(job, this.clock.now(), 'other-server', `No job handle for ${job.datasetName}`);
    }

    const jobHandle = job.jobHandle;
    const startedAt = this.clock.now();
    let interval = this.config.initialPollIntervalMs;
    let current: ImportJob = { ...job, state: ImportJobStates.POLLING };

    while (true) {
      throwIfCancelled(signal, current);

      let status: ImportStatusReport | null = null;
      try {
        status = await this.fhirClient.getImportStatus(jobHandle, signal);
      } catch (error) {
        if (!(error instanceof SubmissionError)) {
          throw error;
        }
        console.warn(`${LogPrefixes.POLL} ${current.datasetName}: ${error.message}; will retry`);
      }
      current = { ...current, pollCount: current.pollCount + 1 };

      if (status) {
        current = this.apply(current, status);
        if (isTerminal(current.state)) {
          return current;
        }
        if (current.errorCount > this.config.maxErrorCount) {
          const message = `Too many errors: ${current.errorCount}. ${current.lastErrorMessage ?? ''}`.trim();
          return failImportJob(current, this.clock.now(), classify(current.lastErrorMessage), message);
        }
        console.info(`${LogPrefixes.POLL} Import in progress for ${current.datasetName}... (poll ${current.pollCount}, ${current.errorCount} errors)`);
      }

      const remaining = this.config.maxWaitMs - (this.clock.now() - startedAt);
      if (remaining <= 0) {
        const error = new TimeoutError(`Import job for ${current.datasetName} did not finish within ${Math.round(this.config.maxWaitMs / 1000)}s (${jobHandle})`);
        return failImportJob(current, this.clock.now(), error.kind, error.message);
      }

      const wait = Math.min(interval, remaining);
      if (this.config.verbose) {
        console.debug(`${LogPrefixes.POLL} Next status check for ${current.datasetName} in ${Math.round(wait / 1000)}s`);
      }
      await this.clock.sleep(wait, signal);
      interval = Math.min(interval * this.config.pollBackoffFactor, this.config.maxPollIntervalMs);
    }
  }

  private apply(job: ImportJob, status: ImportStatusReport): ImportJob {
    const errorCount = Math.max(job.errorCount, status.errorCount);
    const lastErrorMessage = status.errorCount > 0 || status.phase === 'failed'
      ? status.diagnostics ?? job.lastErrorMessage
      : job.lastErrorMessage;
    const next: ImportJob = {
      ...job,
      errorCount,
      lastErrorMessage,
      report: status.report ?? job.report
    };

    if (status.phase === 'running') {
      return next;
    }
    const now = this.clock.now();
    if (status.phase === 'complete' && errorCount === 0) {
      return { ...next, state: ImportJobStates.SUCCEEDED, completedAt: now };
    }
    return failImportJob(next, now, classify(lastErrorMessage), lastErrorMessage ?? `Import failed with ${errorCount} errors`);
  }
}

/** Content type rejections may clear once object metadata is fixed; nothing else is retried. */
export function classify(message: string | null): ImporterErrorKind {
  return isContentTypeRejection(message) ? 'content-type-rejection' : 'other-server';
}

export function failImportJob(job: ImportJob, now: number, kind: ImporterErrorKind, message: string): ImportJob {
  return {
    ...job,
    state: kind === 'content-type-rejection' || kind === 'submission'
      ? ImportJobStates.FAILED_RETRYABLE
      : ImportJobStates.FAILED_FATAL,
    failureKind: kind,
    lastErrorMessage: message,
    completedAt: now
  };
}

function throwIfCancelled(signal: AbortSignal | undefined, job: ImportJob): void {
  if (signal?.aborted) {
    throw new CancelledError(`Polling cancelled for ${job.datasetName}`);
  }
}
