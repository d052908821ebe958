import { AxiosError } from 'axios';
import { FhirClient } from '../src/base/fhir-client';
import { JobTracker, JobTrackerConfig, classify } from '../src/classes/job-tracker';
import { ImportJob, ImportJobStates, createImportJob } from '../src/types/import-job-types';
import { CancelledError } from '../src/errors/import-errors';
import {
  CONTENT_TYPE_FAILURE,
  FHIR_URL,
  FakeClock,
  completed,
  failed,
  fakeHttp,
  inProgress,
  silenceConsole
} from './support/fakes';

const STATUS_URL = `${FHIR_URL}/$import-poll-status?_jobId=42`;

describe('JobTracker', () => {
  let http: ReturnType<typeof fakeHttp>;
  let clock: FakeClock;
  let job: ImportJob;

  function createTracker(overrides: Partial<JobTrackerConfig> = {}) {
    const fhirClient = new FhirClient({ fhirUrl: FHIR_URL, verbose: false, http });
    return new JobTracker(fhirClient, {
      verbose: false,
      initialPollIntervalMs: 10_000,
      maxPollIntervalMs: 30_000,
      pollBackoffFactor: 2,
      maxWaitMs: 3_600_000,
      maxErrorCount: 10,
      clock,
      ...overrides
    });
  }

  beforeEach(() => {
    silenceConsole();
    http = fakeHttp();
    clock = new FakeClock();
    job = createImportJob('FHIRIZED-GTEX/META', [], 1, STATUS_URL, 0);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should poll until the server reports completion', async () => {
    http.get
      .mockResolvedValueOnce(inProgress())
      .mockResolvedValueOnce(inProgress())
      .mockResolvedValueOnce(completed('Imported 17 resources'));

    const result = await createTracker().await(job);

    expect(result.state).toBe(ImportJobStates.SUCCEEDED);
    expect(result.pollCount).toBe(3);
    expect(result.report).toBe('Imported 17 resources');
    expect(result.errorCount).toBe(0);
    expect(result.completedAt).toBe(30_000);
    expect(clock.sleeps).toEqual([10_000, 20_000]);
    expect(http.get).toHaveBeenCalledWith(STATUS_URL, expect.objectContaining({ headers: { 'Accept': 'application/fhir+json' } }));
  });

  it('should back off exponentially up to the maximum interval', async () => {
    for (let i = 0; i < 6; i++) {
      http.get.mockResolvedValueOnce(inProgress());
    }
    http.get.mockResolvedValueOnce(completed());

    await createTracker().await(job);

    expect(clock.sleeps).toEqual([10_000, 20_000, 30_000, 30_000, 30_000, 30_000]);
  });

  it('should classify a content type rejection as retryable', async () => {
    http.get.mockResolvedValueOnce(inProgress()).mockResolvedValueOnce(failed(CONTENT_TYPE_FAILURE));

    const result = await createTracker().await(job);

    expect(result.state).toBe(ImportJobStates.FAILED_RETRYABLE);
    expect(result.failureKind).toBe('content-type-rejection');
    expect(result.errorCount).toBe(4);
    expect(result.lastErrorMessage).toBe(CONTENT_TYPE_FAILURE);
  });

  it('should classify any other server failure as fatal', async () => {
    http.get.mockResolvedValueOnce(failed('Job is in FAILED state with 1 error count. Last error: HAPI-0450: Failed to parse resource'));

    const result = await createTracker().await(job);

    expect(result.state).toBe(ImportJobStates.FAILED_FATAL);
    expect(result.failureKind).toBe('other-server');
    expect(result.lastErrorMessage).toBe('Job is in FAILED state with 1 error count. Last error: HAPI-0450: Failed to parse resource');
  });

  it('should give up with a timeout once the maximum wait is reached', async () => {
    http.get.mockResolvedValue(inProgress());

    const result = await createTracker({ maxWaitMs: 100_000 }).await(job);

    expect(result.state).toBe(ImportJobStates.FAILED_FATAL);
    expect(result.failureKind).toBe('timeout');
    expect(result.lastErrorMessage).toBe(`Import job for FHIRIZED-GTEX/META did not finish within 100s (${STATUS_URL})`);
    expect(clock.sleeps).toEqual([10_000, 20_000, 30_000, 30_000, 10_000]);
    expect(http.get).toHaveBeenCalledTimes(6);
  });

  it('should fail a running job once it reports more errors than allowed', async () => {
    const running = CONTENT_TYPE_FAILURE.replace('FAILED', 'IN_PROGRESS');
    http.get
      .mockResolvedValueOnce(inProgress('Job is in IN_PROGRESS state with 1 error count'))
      .mockResolvedValueOnce(inProgress(running));

    const result = await createTracker({ maxErrorCount: 2 }).await(job);

    expect(http.get).toHaveBeenCalledTimes(2);
    expect(result.state).toBe(ImportJobStates.FAILED_RETRYABLE);
    expect(result.errorCount).toBe(4);
    expect(result.lastErrorMessage).toBe(`Too many errors: 4. ${running}`);
  });

  it('should never lower the error count within an attempt', async () => {
    http.get
      .mockResolvedValueOnce(inProgress('Job is in IN_PROGRESS state with 3 error count'))
      .mockResolvedValueOnce(inProgress('Job is in IN_PROGRESS state with 1 error count'))
      .mockResolvedValueOnce(completed());

    const result = await createTracker().await(job);

    expect(result.errorCount).toBe(3);
    expect(result.state).toBe(ImportJobStates.FAILED_FATAL);
    expect(result.lastErrorMessage).toBe('Job is in IN_PROGRESS state with 1 error count');
  });

  it('should keep polling through transient transport errors', async () => {
    http.get
      .mockRejectedValueOnce(new AxiosError('socket hang up', 'ECONNRESET'))
      .mockResolvedValueOnce(completed());

    const result = await createTracker().await(job);

    expect(result.state).toBe(ImportJobStates.SUCCEEDED);
    expect(result.pollCount).toBe(2);
  });

  it('should stop polling promptly when cancelled during a backoff wait', async () => {
    const controller = new AbortController();
    http.get.mockResolvedValue(inProgress());
    clock.onSleep = () => controller.abort();

    await expect(createTracker().await(job, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(http.get).toHaveBeenCalledTimes(1);
  });

  it('should not poll at all when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createTracker().await(job, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(http.get).not.toHaveBeenCalled();
  });

  it('should return a terminal job unchanged', async () => {
    const done: ImportJob = { ...job, state: ImportJobStates.SUCCEEDED, jobHandle: 'dry-run' };

    await expect(createTracker().await(done)).resolves.toBe(done);
    expect(http.get).not.toHaveBeenCalled();
  });

  it('should fail a job without a handle', async () => {
    const result = await createTracker().await({ ...job, jobHandle: null });

    expect(result.state).toBe(ImportJobStates.FAILED_FATAL);
    expect(result.lastErrorMessage).toBe('No job handle for FHIRIZED-GTEX/META');
  });
});

describe('classify', () => {
  it('should only treat the content type signature as retryable', () => {
    expect(classify(CONTENT_TYPE_FAILURE)).toBe('content-type-rejection');
    expect(classify('Job is in FAILED state with 1 error count')).toBe('other-server');
    expect(classify(null)).toBe('other-server');
  });
});
