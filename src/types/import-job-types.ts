import type { ManifestEntry } from './dataset-types.js';
import type { ImporterErrorKind } from '../errors/import-errors.js';

export const ImportJobStates = {
  SUBMITTED: 'Submitted',
  POLLING: 'Polling',
  SUCCEEDED: 'Succeeded',
  FAILED_RETRYABLE: 'FailedRetryable',
  FAILED_FATAL: 'FailedFatal'
} as const;

export type ImportJobState = typeof ImportJobStates[keyof typeof ImportJobStates];

export type TerminalImportJobState =
  | typeof ImportJobStates.SUCCEEDED
  | typeof ImportJobStates.FAILED_RETRYABLE
  | typeof ImportJobStates.FAILED_FATAL;

/**
 * One bulk import attempt for one dataset. Values are replaced, never mutated,
 * as the job moves through its states.
 */
export interface ImportJob {
  readonly datasetName: string;
  readonly manifest: readonly ManifestEntry[];
  /** Status URL returned by the server in `Content-Location`. */
  readonly jobHandle: string | null;
  readonly state: ImportJobState;
  readonly attempt: number;
  readonly errorCount: number;
  readonly lastErrorMessage: string | null;
  readonly failureKind: ImporterErrorKind | null;
  readonly pollCount: number;
  readonly report: string | null;
  readonly submittedAt: number | null;
  readonly completedAt: number | null;
}

export type ImportStatusPhase = 'running' | 'complete' | 'failed';

/** Parsed response of one status poll. */
export interface ImportStatusReport {
  phase: ImportStatusPhase;
  httpStatus: number;
  errorCount: number;
  diagnostics: string | null;
  report: string | null;
}

export function isTerminal(state: ImportJobState): state is TerminalImportJobState {
  return state === ImportJobStates.SUCCEEDED
    || state === ImportJobStates.FAILED_RETRYABLE
    || state === ImportJobStates.FAILED_FATAL;
}

export function createImportJob(
  datasetName: string,
  manifest: readonly ManifestEntry[],
  attempt: number,
  jobHandle: string | null,
  submittedAt: number | null
): ImportJob {
  return {
    datasetName,
    manifest,
    jobHandle,
    state: ImportJobStates.SUBMITTED,
    attempt,
    errorCount: 0,
    lastErrorMessage: null,
    failureKind: null,
    pollCount: 0,
    report: null,
    submittedAt,
    completedAt: null
  };
}
