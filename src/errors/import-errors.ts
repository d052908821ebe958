import type { ImportJob } from '../types/import-job-types.js';
import { SUPPORTED_CONTENT_TYPES } from '../constants/import-constants.js';

export type ImporterErrorKind =
  | 'discovery'
  | 'rejected-manifest'
  | 'submission'
  | 'content-type-rejection'
  | 'timeout'
  | 'other-server'
  | 'cancelled'
  | 'configuration';

export abstract class ImporterError extends Error {
  abstract readonly kind: ImporterErrorKind;
  /** Whether resubmitting the same dataset may succeed. */
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The catalog could not be enumerated. Fatal for the whole run. */
export class DiscoveryError extends ImporterError {
  readonly kind = 'discovery';
  readonly retryable = false;
}

/** The server refused the manifest outright. Fatal for the dataset. */
export class RejectedManifestError extends ImporterError {
  readonly kind = 'rejected-manifest';
  readonly retryable = false;
}

/** Transient network or auth failure while submitting. */
export class SubmissionError extends ImporterError {
  readonly kind = 'submission';
  readonly retryable = true;
}

/** One or more source objects were served with an unsupported content type. */
export class ContentTypeRejection extends ImporterError {
  readonly kind = 'content-type-rejection';
  readonly retryable = true;
}

export class TimeoutError extends ImporterError {
  readonly kind = 'timeout';
  readonly retryable = false;
}

/** Any other server-reported failure; never retried. */
export class OtherServerError extends ImporterError {
  readonly kind = 'other-server';
  readonly retryable = false;
}

export class CancelledError extends ImporterError {
  readonly kind = 'cancelled';
  readonly retryable = false;
  /** Last finished attempt when the cancel arrived between attempts. */
  readonly lastJob: ImportJob | null;

  constructor(message: string, options?: { cause?: unknown; lastJob?: ImportJob }) {
    super(message, options);
    this.lastJob = options?.lastJob ?? null;
  }
}

export class ConfigurationError extends ImporterError {
  readonly kind = 'configuration';
  readonly retryable = false;
}

const CONTENT_TYPE_REJECTION_PATTERN = /Received content type "([^"]*)" from URL: (\S+?)\.? This format is not one of the supported content type/;

/**
 * Detects the server's per-object content type rejection, e.g.
 * `Received content type "application/octet-stream" from URL: https://.../x.ndjson. This format is not one of the supported content type: ...`
 */
export function isContentTypeRejection(message: string | null | undefined): boolean {
  if (!message) {
    return false;
  }
  return CONTENT_TYPE_REJECTION_PATTERN.test(message);
}

export function parseContentTypeRejection(message: string): { contentType: string; url: string } | null {
  const match = CONTENT_TYPE_REJECTION_PATTERN.exec(message);
  if (!match) {
    return null;
  }
  return { contentType: match[1], url: match[2] };
}

/** Builds a message in the same shape the server uses for a rejected source object. */
export function contentTypeRejectionMessage(contentType: string, url: string): string {
  return `Received content type "${contentType}" from URL: ${url}. This format is not one of the supported content type: ${SUPPORTED_CONTENT_TYPES.join(', ')}`;
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
