import axios, { AxiosInstance } from 'axios';
import { FhirClient } from './base/fhir-client.js';
import { ObjectStore, ObjectStoreClient } from './base/object-store-client.js';
import { DatasetCatalog, formatSizeMb } from './classes/dataset-catalog.js';
import { ImportPlanner } from './classes/import-planner.js';
import { BulkImportClient } from './classes/bulk-import-client.js';
import { JobTracker } from './classes/job-tracker.js';
import { RetryPolicy } from './classes/retry-policy.js';
import { ImporterConfig } from './config/importer-config.js';
import { Dataset } from './types/dataset-types.js';
import { ImportJob, ImportJobStates } from './types/import-job-types.js';
import { CancelledError } from './errors/import-errors.js';
import { REMEDIATION_HINT } from './constants/import-constants.js';
import { LogPrefixes } from './constants/log-prefixes.js';
import { Clock, systemClock } from './utilities/clock.js';
import { runWithConcurrency } from './utilities/worker-pool.js';

export type DatasetOutcomeStatus = 'succeeded' | 'failed' | 'cancelled' | 'skipped';

export interface DatasetOutcome {
  dataset: Dataset;
  status: DatasetOutcomeStatus;
  /** Final job; null when the dataset was never attempted. */
  job: ImportJob | null;
  remediation: string | null;
}

export interface RunSummary {
  outcomes: DatasetOutcome[];
  succeeded: number;
  failed: number;
  /** Datasets that needed more than one attempt, whatever their outcome. */
  retried: number;
  cancelled: number;
  skipped: number;
  exitCode: number;
}

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  CANCELLED: 130
} as const;

/** Replaceable collaborators, mainly for tests. */
export interface ImportCollaborators {
  http?: Pick<AxiosInstance, 'get' | 'post'>;
  store?: ObjectStore;
  clock?: Clock;
}

/**
 * Runs the catalog, planner and per-dataset retry loop for a whole import run.
 */
export class ImportUtilities {
  private config: ImporterConfig;
  private abortController = new AbortController();
  private catalog: DatasetCatalog;
  private planner: ImportPlanner;
  private retryPolicy: RetryPolicy;

  constructor(config: ImporterConfig, collaborators: ImportCollaborators = {}) {
    this.config = config;
    const http = collaborators.http ?? axios;
    const clock = collaborators.clock ?? systemClock;
    const store = collaborators.store ?? new ObjectStoreClient({
      bucketUrl: config.bucketUrl,
      verbose: config.verbose,
      http
    });
    const fhirClient = new FhirClient({
      fhirUrl: config.fhirUrl,
      verbose: config.verbose,
      timeout: config.requestTimeoutMs,
      http
    });

    this.catalog = new DatasetCatalog(store, config.naming);
    this.planner = new ImportPlanner(config.verbose);
    const client = new BulkImportClient(fhirClient, store, {
      dryRun: config.dryRun,
      verbose: config.verbose,
      preflight: config.preflight,
      clock
    });
    const tracker = new JobTracker(fhirClient, {
      verbose: config.verbose,
      initialPollIntervalMs: config.initialPollIntervalMs,
      maxPollIntervalMs: config.maxPollIntervalMs,
      pollBackoffFactor: config.pollBackoffFactor,
      maxWaitMs: config.maxWaitMs,
      maxErrorCount: config.maxErrorCount,
      clock
    });
    this.retryPolicy = new RetryPolicy(client, tracker, {
      verbose: config.verbose,
      maxAttempts: config.maxAttempts,
      retryDelayMs: config.retryDelayMs,
      clock
    });
  }

  /**
   * Stop polling and start no further datasets. Jobs already accepted by the
   * server keep running there.
   */
  cancel() {
    this.abortController.abort();
  }

  get isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  async listDatasets(): Promise<Dataset[]> {
    return this.catalog.discover();
  }

  async importDatasets(): Promise<RunSummary> {
    const catalog = await this.catalog.discover();
    const plan = this.planner.plan(catalog, this.config.plan);
    if (plan.length === 0) {
      console.info(`${LogPrefixes.PLAN} Nothing to import.`);
      return summarize([], this.isCancelled);
    }

    const signal = this.abortController.signal;
    const outcomes: DatasetOutcome[] = [];
    let remaining = plan;

    // Profiles from the implementation guide must be installed before other data arrives
    const guide = plan[0].isImplementationGuide ? plan[0] : null;
    if (guide) {
      outcomes.push(await this.importDataset(guide, signal));
      remaining = plan.slice(1);
    }

    const results = await runWithConcurrency(
      remaining,
      this.config.concurrency,
      dataset => this.importDataset(dataset, signal),
      signal
    );
    results.forEach((outcome, index) => {
      outcomes.push(outcome ?? { dataset: remaining[index], status: 'skipped', job: null, remediation: null });
    });

    const summary = summarize(outcomes, this.isCancelled);
    logSummary(summary);
    return summary;
  }

  private async importDataset(dataset: Dataset, signal: AbortSignal): Promise<DatasetOutcome> {
    if (signal.aborted) {
      return { dataset, status: 'skipped', job: null, remediation: null };
    }
    try {
      const job = await this.retryPolicy.run(dataset, this.config.maxAttempts, signal);
      const succeeded = job.state === ImportJobStates.SUCCEEDED;
      return {
        dataset,
        status: succeeded ? 'succeeded' : 'failed',
        job,
        remediation: succeeded ? null : remediationFor(job)
      };
    } catch (error) {
      if (error instanceof CancelledError) {
        console.warn(`${LogPrefixes.CANCEL} ${dataset.name}: ${error.message}`);
        const job = error.lastJob;
        return { dataset, status: 'cancelled', job, remediation: remediationFor(job) };
      }
      throw error;
    }
  }
}

function remediationFor(job: ImportJob | null): string | null {
  return job?.failureKind === 'content-type-rejection' ? REMEDIATION_HINT : null;
}

export function summarize(outcomes: DatasetOutcome[], cancelled: boolean): RunSummary {
  const count = (status: DatasetOutcomeStatus) => outcomes.filter(outcome => outcome.status === status).length;
  const failed = count('failed');
  let exitCode: number = EXIT_CODES.SUCCESS;
  if (cancelled) {
    exitCode = EXIT_CODES.CANCELLED;
  } else if (failed > 0) {
    exitCode = EXIT_CODES.FAILURE;
  }
  return {
    outcomes,
    succeeded: count('succeeded'),
    failed,
    retried: outcomes.filter(outcome => (outcome.job?.attempt ?? 1) > 1).length,
    cancelled: count('cancelled'),
    skipped: count('skipped'),
    exitCode
  };
}

export function formatDatasetLine(dataset: Dataset): string {
  const markers: string[] = [];
  if (dataset.isImplementationGuide) {
    markers.push('[implementation guide]');
  }
  if (dataset.isLegacy) {
    markers.push('[legacy]');
  }
  const suffix = markers.length > 0 ? ` ${markers.join(' ')}` : '';
  return `- ${dataset.name} (Size: ${formatSizeMb(dataset.sizeBytes)} MB)${suffix}`;
}

function logSummary(summary: RunSummary) {
  for (const outcome of summary.outcomes) {
    const attempts = outcome.job ? ` after ${outcome.job.attempt} attempt(s)` : '';
    const detail = outcome.status !== 'succeeded' && outcome.job?.lastErrorMessage ? `: ${outcome.job.lastErrorMessage}` : '';
    console.info(`${LogPrefixes.SUMMARY} ${outcome.dataset.name}: ${outcome.status}${attempts}${detail}`);
  }
  console.info(`${LogPrefixes.SUMMARY} ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.retried} retried, ${summary.cancelled} cancelled, ${summary.skipped} skipped`);
}
