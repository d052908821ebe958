import axios, { AxiosInstance, AxiosResponse } from 'axios';
import type { OperationOutcome, Parameters as FhirParameters } from 'fhir/r4';
import { ImportStatusReport } from '../types/import-job-types.js';
import { CancelledError, RejectedManifestError, SubmissionError } from '../errors/import-errors.js';
import { IMPORT_DEFAULTS, IMPORT_REQUEST_HEADERS } from '../constants/import-constants.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

export interface FhirClientConfig {
  fhirUrl: string;
  verbose: boolean;
  timeout?: number;
  http?: Pick<AxiosInstance, 'get' | 'post'>;
}

// Statuses that mean "try again later" rather than "this request is wrong"
const TRANSIENT_STATUSES = new Set([401, 403, 408, 429]);
const TRANSIENT_POLL_STATUSES = new Set([429, 502, 503, 504]);

const ERROR_COUNT_PATTERN = /with (\d+) error count/;

/**
 * HTTP layer for the FHIR bulk `$import` operation: kickoff and status polling.
 */
export class FhirClient {
  protected config: FhirClientConfig;
  private http: Pick<AxiosInstance, 'get' | 'post'>;

  constructor(config: FhirClientConfig) {
    this.config = config;
    this.http = config.http ?? axios;
  }

  get baseUrl(): string {
    return this.config.fhirUrl.replace(/\/+$/, '');
  }

  /**
   * POST an `$import` request and return the job's status URL.
   */
  async kickoffImport(parameters: FhirParameters, signal?: AbortSignal): Promise<string> {
    const url = `${this.baseUrl}/$import`;
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(url, parameters, {
        headers: { ...IMPORT_REQUEST_HEADERS },
        timeout: this.config.timeout ?? IMPORT_DEFAULTS.requestTimeoutMs,
        validateStatus: () => true,
        signal
      });
    } catch (error) {
      if (axios.isCancel(error)) {
        throw new CancelledError(`Import kickoff to ${url} was cancelled`, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new SubmissionError(`Import kickoff to ${url} failed: ${message}`, { cause: error });
    }

    const diagnostics = describeBody(response.data);
    if (response.status >= 200 && response.status < 300) {
      const location = headerValue(response, 'content-location');
      if (!location) {
        throw new RejectedManifestError(`Server accepted the import request without a Content-Location header (status ${response.status})${diagnostics ? `: ${diagnostics}` : ''}`);
      }
      return this.resolveUrl(location);
    }
    const failure = `Import kickoff to ${url} failed with status ${response.status}${diagnostics ? `: ${diagnostics}` : ''}`;
    if (TRANSIENT_STATUSES.has(response.status) || response.status >= 500) {
      throw new SubmissionError(failure);
    }
    throw new RejectedManifestError(failure);
  }

  /**
   * GET the status of a running import. Transport failures and transient
   * server statuses are raised as `SubmissionError`.
   */
  async getImportStatus(jobHandle: string, signal?: AbortSignal): Promise<ImportStatusReport> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(jobHandle, {
        headers: { 'Accept': 'application/fhir+json' },
        timeout: this.config.timeout ?? IMPORT_DEFAULTS.requestTimeoutMs,
        validateStatus: () => true,
        signal
      });
    } catch (error) {
      if (axios.isCancel(error)) {
        throw new CancelledError(`Status poll of ${jobHandle} was cancelled`, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new SubmissionError(`Status poll of ${jobHandle} failed: ${message}`, { cause: error });
    }

    if (TRANSIENT_POLL_STATUSES.has(response.status)) {
      throw new SubmissionError(`Status poll of ${jobHandle} returned ${response.status}`);
    }
    if (this.config.verbose) {
      console.debug(`${LogPrefixes.POLL} ${jobHandle}: ${response.status} ${describeBody(response.data) ?? ''}`);
    }
    return parseImportStatus(response.status, response.data);
  }

  private resolveUrl(location: string): string {
    return new URL(location, `${this.baseUrl}/`).toString();
  }
}

export function isOperationOutcome(value: unknown): value is OperationOutcome {
  return typeof value === 'object'
    && value !== null
    && 'resourceType' in value
    && value.resourceType === 'OperationOutcome';
}

/**
 * Interprets one status poll response. 202 means the job is still running,
 * 2xx means it finished, anything else is a failure.
 */
export function parseImportStatus(httpStatus: number, body: unknown): ImportStatusReport {
  const issues = isOperationOutcome(body) ? body.issue ?? [] : [];
  const errorIssues = issues.filter(issue => issue.severity === 'error' || issue.severity === 'fatal');

  let diagnostics: string | null = null;
  const describing = errorIssues[0] ?? issues[0];
  if (describing) {
    diagnostics = describing.diagnostics ?? describing.details?.text ?? null;
  } else if (typeof body === 'string' && body.trim()) {
    diagnostics = body.trim();
  }

  let errorCount = errorIssues.length;
  for (const issue of issues) {
    const match = issue.diagnostics ? ERROR_COUNT_PATTERN.exec(issue.diagnostics) : null;
    if (match) {
      errorCount = Math.max(errorCount, Number(match[1]));
    }
  }

  let report: string | null = null;
  for (const issue of issues) {
    if (issue.severity === 'information' && issue.diagnostics?.includes('reportMsg')) {
      report = extractReportMessage(issue.diagnostics);
    }
  }

  let phase: ImportStatusReport['phase'];
  if (httpStatus === 202) {
    phase = 'running';
  } else if (httpStatus >= 200 && httpStatus < 300) {
    phase = errorIssues.length > 0 ? 'failed' : 'complete';
  } else {
    phase = 'failed';
  }
  if (phase === 'failed' && !diagnostics) {
    diagnostics = `Import job status returned HTTP ${httpStatus}`;
  }

  return { phase, httpStatus, errorCount, diagnostics, report };
}

function extractReportMessage(diagnostics: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(diagnostics);
  } catch {
    return diagnostics;
  }
  if (typeof parsed === 'object' && parsed !== null && 'reportMsg' in parsed && typeof parsed.reportMsg === 'string') {
    return parsed.reportMsg;
  }
  return diagnostics;
}

function describeBody(body: unknown): string | null {
  if (isOperationOutcome(body)) {
    const texts = (body.issue ?? [])
      .map(issue => issue.diagnostics ?? issue.details?.text)
      .filter((text): text is string => Boolean(text));
    return texts.length > 0 ? texts.join('; ') : null;
  }
  if (typeof body === 'string') {
    return body.trim() || null;
  }
  if (body === undefined || body === null || body === '') {
    return null;
  }
  return JSON.stringify(body);
}

function headerValue(response: AxiosResponse<unknown>, name: string): string | null {
  const value: unknown = response.headers[name];
  return typeof value === 'string' && value ? value : null;
}
