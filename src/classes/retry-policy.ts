import { BulkImportClient } from './bulk-import-client.js';
import { JobTracker, failImportJob } from './job-tracker.js';
import { Dataset } from '../types/dataset-types.js';
import { ImportJob, ImportJobStates, createImportJob } from '../types/import-job-types.js';
import { CancelledError, ImporterError, errorMessageOf, parseContentTypeRejection } from '../errors/import-errors.js';
import { IMPORT_DEFAULTS, REMEDIATION_HINT } from '../constants/import-constants.js';
import { LogPrefixes } from '../constants/log-prefixes.js';
import { Clock, systemClock } from '../utilities/clock.js';

export interface RetryPolicyConfig {
  verbose: boolean;
  maxAttempts: number;
  /** Pause before resubmitting a dataset after a retryable failure. */
  retryDelayMs: number;
  clock?: Clock;
}

export const DEFAULT_RETRY_CONFIG: RetryPolicyConfig = {
  verbose: false,
  maxAttempts: IMPORT_DEFAULTS.maxAttempts,
  retryDelayMs: IMPORT_DEFAULTS.retryDelayMs
};

/**
 * Submits a dataset and waits for it, resubmitting while failures are
 * classified as retryable. Object metadata is never repaired here; a
 * persistent content type rejection is reported for manual remediation.
 */
export class RetryPolicy {
  protected config: RetryPolicyConfig;
  private client: BulkImportClient;
  private tracker: JobTracker;
  private clock: Clock;

  constructor(client: BulkImportClient, tracker: JobTracker, config: RetryPolicyConfig = DEFAULT_RETRY_CONFIG) {
    this.client = client;
    this.tracker = tracker;
    this.config = config;
    this.clock = config.clock ?? systemClock;
  }

  async run(dataset: Dataset, maxAttempts: number = this.config.maxAttempts, signal?: AbortSignal): Promise<ImportJob> {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    for (let attempt = 1; ; attempt++) {
      const job = await this.attempt(dataset, attempt, signal);

      if (job.state === ImportJobStates.SUCCEEDED) {
        console.info(`${LogPrefixes.SUCCESS} Import completed for ${dataset.name}${attempt > 1 ? ` after ${attempt} attempts` : ''}`);
        if (job.report) {
          console.info(`${LogPrefixes.SUCCESS} Import report for ${dataset.name}: ${job.report}`);
        }
        return job;
      }

      if (job.state === ImportJobStates.FAILED_FATAL) {
        console.error(`${LogPrefixes.FAILURE} Import failed for ${dataset.name} (${job.failureKind}): ${job.lastErrorMessage}`);
        return job;
      }

      if (attempt >= maxAttempts) {
        console.error(`${LogPrefixes.FAILURE} Import failed for ${dataset.name} after ${attempt} attempts (${job.failureKind}): ${job.lastErrorMessage}`);
        if (job.failureKind === 'content-type-rejection') {
          const rejected = parseContentTypeRejection(job.lastErrorMessage ?? '');
          if (rejected) {
            console.error(`${LogPrefixes.FAILURE} ${rejected.url} is served as "${rejected.contentType}"`);
          }
          console.error(`${LogPrefixes.FAILURE} ${REMEDIATION_HINT}`);
        }
        return job;
      }

      console.warn(`${LogPrefixes.RETRY} ${dataset.name} attempt ${attempt}/${maxAttempts} failed (${job.failureKind}): ${job.lastErrorMessage}`);
      if (this.config.verbose) {
        console.debug(`${LogPrefixes.RETRY} Resubmitting ${dataset.name} in ${Math.round(this.config.retryDelayMs / 1000)}s`);
      }
      try {
        await this.clock.sleep(this.config.retryDelayMs, signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          throw new CancelledError(`Cancelled before resubmitting ${dataset.name}`, { cause: error, lastJob: job });
        }
        throw error;
      }
    }
  }

  private async attempt(dataset: Dataset, attempt: number, signal?: AbortSignal): Promise<ImportJob> {
    try {
      const submitted = await this.client.submit(dataset, attempt, signal);
      return await this.tracker.await(submitted, signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const unsubmitted = createImportJob(dataset.name, [], attempt, null, null);
      if (error instanceof ImporterError) {
        return failImportJob(unsubmitted, this.clock.now(), error.kind, error.message);
      }
      return failImportJob(unsubmitted, this.clock.now(), 'other-server', errorMessageOf(error));
    }
  }
}
