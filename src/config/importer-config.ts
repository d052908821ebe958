import { PlanOptions } from '../types/dataset-types.js';
import { DatasetNamingConfig } from '../classes/dataset-catalog.js';
import { ConfigurationError } from '../errors/import-errors.js';
import {
  DATASET_NAMING,
  DEFAULT_BUCKET_URL,
  DEFAULT_FHIR_SERVER_URL,
  IMPORT_DEFAULTS
} from '../constants/import-constants.js';

export interface ImporterConfig {
  fhirUrl: string;
  bucketUrl: string;
  dryRun: boolean;
  verbose: boolean;
  preflight: boolean;
  concurrency: number;
  maxAttempts: number;
  initialPollIntervalMs: number;
  maxPollIntervalMs: number;
  pollBackoffFactor: number;
  maxWaitMs: number;
  maxErrorCount: number;
  retryDelayMs: number;
  requestTimeoutMs: number;
  plan: PlanOptions;
  naming: DatasetNamingConfig;
}

/** Option values as commander hands them over; numbers arrive as strings. */
export type ImporterCliOptions = {
  fhirUrl?: string;
  bucketUrl?: string;
  only?: string;
  includeLegacy?: boolean;
  filterBypassesLegacy?: boolean;
  concurrency?: string;
  maxAttempts?: string;
  pollInterval?: string;
  maxPollInterval?: string;
  maxWait?: string;
  maxErrorCount?: string;
  retryDelay?: string;
  requestTimeout?: string;
  preflight?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
};

export function resolveImporterConfig(options: ImporterCliOptions): ImporterConfig {
  const initialPollIntervalMs = secondsOption('--poll-interval', options.pollInterval, IMPORT_DEFAULTS.initialPollIntervalMs);
  const maxPollIntervalMs = secondsOption('--max-poll-interval', options.maxPollInterval, IMPORT_DEFAULTS.maxPollIntervalMs);
  if (maxPollIntervalMs < initialPollIntervalMs) {
    throw new ConfigurationError(`--max-poll-interval (${maxPollIntervalMs / 1000}s) must not be shorter than --poll-interval (${initialPollIntervalMs / 1000}s)`);
  }

  return {
    fhirUrl: urlOption('--fhir-url', options.fhirUrl ?? DEFAULT_FHIR_SERVER_URL),
    bucketUrl: urlOption('--bucket-url', options.bucketUrl ?? DEFAULT_BUCKET_URL),
    dryRun: options.dryRun ?? false,
    verbose: options.verbose ?? false,
    preflight: options.preflight ?? false,
    concurrency: integerOption('--concurrency', options.concurrency, IMPORT_DEFAULTS.concurrency, 1),
    maxAttempts: integerOption('--max-attempts', options.maxAttempts, IMPORT_DEFAULTS.maxAttempts, 1),
    initialPollIntervalMs,
    maxPollIntervalMs,
    pollBackoffFactor: IMPORT_DEFAULTS.pollBackoffFactor,
    maxWaitMs: secondsOption('--max-wait', options.maxWait, IMPORT_DEFAULTS.maxWaitMs),
    maxErrorCount: integerOption('--max-error-count', options.maxErrorCount, IMPORT_DEFAULTS.maxErrorCount, 0),
    retryDelayMs: secondsOption('--retry-delay', options.retryDelay, IMPORT_DEFAULTS.retryDelayMs, 0),
    requestTimeoutMs: secondsOption('--request-timeout', options.requestTimeout, IMPORT_DEFAULTS.requestTimeoutMs),
    plan: {
      filter: options.only,
      includeLegacy: options.includeLegacy ?? false,
      filterBypassesLegacy: options.filterBypassesLegacy ?? true
    },
    naming: DATASET_NAMING
  };
}

function integerOption(flag: string, value: string | undefined, fallback: number, min: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`${flag} must be an integer of at least ${min}, got "${value}"`);
  }
  return parsed;
}

function secondsOption(flag: string, value: string | undefined, fallbackMs: number, minSeconds: number = 1): number {
  if (value === undefined) {
    return fallbackMs;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < minSeconds) {
    throw new ConfigurationError(`${flag} must be a number of seconds of at least ${minSeconds}, got "${value}"`);
  }
  return Math.round(parsed * 1000);
}

function urlOption(flag: string, value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch (error) {
    throw new ConfigurationError(`${flag} is not a valid URL: "${value}"`, { cause: error });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`${flag} must be an http(s) URL, got "${value}"`);
  }
  return value.replace(/\/+$/, '');
}
