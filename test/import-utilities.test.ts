import type { Parameters as FhirParameters } from 'fhir/r4';
import { ImportUtilities, formatDatasetLine, summarize } from '../src/import-utilities';
import { ImporterCliOptions, ImporterConfig, resolveImporterConfig } from '../src/config/importer-config';
import { DiscoveryError } from '../src/errors/import-errors';
import { REMEDIATION_HINT } from '../src/constants/import-constants';
import {
  BUCKET_URL,
  CONTENT_TYPE_FAILURE,
  FHIR_URL,
  FakeClock,
  FakeObjectStore,
  accepted,
  completed,
  failed,
  fakeHttp,
  inProgress,
  ndjson,
  silenceConsole
} from './support/fakes';

type StatusResponse = ReturnType<typeof completed> | ReturnType<typeof inProgress> | ReturnType<typeof failed>;

function datasetOf(parameters: FhirParameters): string {
  const input = parameters.parameter?.find(parameter => parameter.name === 'input');
  const url = input?.part?.find(part => part.name === 'url')?.valueUri ?? '';
  return url.substring(BUCKET_URL.length + 1).split('/').slice(0, 2).join('/');
}

describe('ImportUtilities', () => {
  let http: ReturnType<typeof fakeHttp>;
  let clock: FakeClock;
  let store: FakeObjectStore;
  let events: string[];
  let script: Record<string, StatusResponse[]>;

  function createImporter(options: ImporterCliOptions = {}) {
    const config: ImporterConfig = {
      ...resolveImporterConfig({
        fhirUrl: FHIR_URL,
        bucketUrl: BUCKET_URL,
        pollInterval: '1',
        maxPollInterval: '4',
        retryDelay: '0',
        concurrency: '1',
        ...options
      }),
      naming: { implementationGuide: 'IG/META', legacyPrefixes: ['FHIRIZED-CDA', 'R4'] }
    };
    return new ImportUtilities(config, { http, store, clock });
  }

  beforeEach(() => {
    silenceConsole();
    http = fakeHttp();
    clock = new FakeClock();
    events = [];
    script = {};
    store = new FakeObjectStore([
      ndjson('FHIRIZED-1KGENOMES/META/Patient.ndjson', 2048),
      ndjson('FHIRIZED-CDA/META/Patient.ndjson', 1024),
      ndjson('IG/META/SearchParameter-patient-age.ndjson', 512)
    ]);

    http.post.mockImplementation(async (_url: string, body: FhirParameters) => {
      const name = datasetOf(body);
      events.push(`submit ${name}`);
      return accepted(`${FHIR_URL}/status/${encodeURIComponent(name)}`);
    });
    http.get.mockImplementation(async (url: string) => {
      const name = decodeURIComponent(url.substring(url.lastIndexOf('/') + 1));
      events.push(`poll ${name}`);
      return script[name]?.shift() ?? completed();
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should import the implementation guide first, skip legacy datasets and exit 0', async () => {
    const summary = await createImporter().importDatasets();

    expect(events).toEqual([
      'submit IG/META',
      'poll IG/META',
      'submit FHIRIZED-1KGENOMES/META',
      'poll FHIRIZED-1KGENOMES/META'
    ]);
    expect(summary.outcomes.map(outcome => [outcome.dataset.name, outcome.status])).toEqual([
      ['IG/META', 'succeeded'],
      ['FHIRIZED-1KGENOMES/META', 'succeeded']
    ]);
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(0);
    expect(summary.exitCode).toBe(0);
  });

  it('should not plan a prefix that holds no resource files', async () => {
    store.objects.push({ name: 'DOCS/IMAGES/logo.png', sizeBytes: 2048, contentType: 'image/png' });

    const summary = await createImporter().importDatasets();

    expect(summary.outcomes.map(outcome => outcome.dataset.name)).toEqual(['IG/META', 'FHIRIZED-1KGENOMES/META']);
    expect(summary.exitCode).toBe(0);
  });

  it('should import exactly the dataset named by --only and not the implementation guide', async () => {
    const summary = await createImporter({ only: 'FHIRIZED-1KGENOMES/META' }).importDatasets();

    expect(events).toEqual(['submit FHIRIZED-1KGENOMES/META', 'poll FHIRIZED-1KGENOMES/META']);
    expect(summary.outcomes).toHaveLength(1);
    expect(summary.exitCode).toBe(0);
  });

  it('should finish the implementation guide before submitting anything else, even with parallel workers', async () => {
    store.objects.push(ndjson('FHIRIZED-GTEX/META/Observation.ndjson'));
    script['IG/META'] = [inProgress(), inProgress(), completed()];

    const summary = await createImporter({ concurrency: '3' }).importDatasets();

    const lastGuidePoll = events.lastIndexOf('poll IG/META');
    const otherSubmissions = events
      .map((event, index) => ({ event, index }))
      .filter(({ event }) => event.startsWith('submit ') && event !== 'submit IG/META');
    expect(lastGuidePoll).toBe(3);
    expect(otherSubmissions.map(({ event }) => event).sort()).toEqual([
      'submit FHIRIZED-1KGENOMES/META',
      'submit FHIRIZED-GTEX/META'
    ]);
    otherSubmissions.forEach(({ index }) => expect(index).toBeGreaterThan(lastGuidePoll));
    expect(summary.succeeded).toBe(3);
  });

  it('should still run the other datasets when the implementation guide fails', async () => {
    script['IG/META'] = [failed('Job is in FAILED state with 1 error count. Last error: HAPI-0001: broken profile')];

    const summary = await createImporter().importDatasets();

    expect(events).toContain('submit FHIRIZED-1KGENOMES/META');
    expect(summary.outcomes.map(outcome => outcome.status)).toEqual(['failed', 'succeeded']);
    expect(summary.exitCode).toBe(1);
  });

  it('should count a dataset that succeeded after a retry', async () => {
    script['FHIRIZED-1KGENOMES/META'] = [failed(CONTENT_TYPE_FAILURE)];

    const summary = await createImporter().importDatasets();

    expect(summary.succeeded).toBe(2);
    expect(summary.retried).toBe(1);
    expect(summary.exitCode).toBe(0);
  });

  it('should report a persistent content type rejection with a remediation hint', async () => {
    script['FHIRIZED-1KGENOMES/META'] = [
      failed(CONTENT_TYPE_FAILURE),
      failed(CONTENT_TYPE_FAILURE),
      failed(CONTENT_TYPE_FAILURE)
    ];

    const summary = await createImporter({ only: 'FHIRIZED-1KGENOMES/META' }).importDatasets();
    const [outcome] = summary.outcomes;

    expect(outcome.status).toBe('failed');
    expect(outcome.job?.attempt).toBe(3);
    expect(outcome.job?.lastErrorMessage).toBe(CONTENT_TYPE_FAILURE);
    expect(outcome.remediation).toBe(REMEDIATION_HINT);
    expect(summary.failed).toBe(1);
    expect(summary.retried).toBe(1);
    expect(summary.exitCode).toBe(1);
  });

  it('should report nothing to import for an empty plan', async () => {
    const summary = await createImporter({ only: 'NOPE' }).importDatasets();

    expect(summary.outcomes).toEqual([]);
    expect(summary.exitCode).toBe(0);
    expect(http.post).not.toHaveBeenCalled();
  });

  it('should abort the run when discovery fails', async () => {
    store.failWith = new DiscoveryError('Object store unreachable for bucket test-bucket: getaddrinfo ENOTFOUND');

    await expect(createImporter().importDatasets()).rejects.toBeInstanceOf(DiscoveryError);
    expect(http.post).not.toHaveBeenCalled();
  });

  it('should stop polling on cancel and skip datasets that have not started', async () => {
    script['IG/META'] = [inProgress(), inProgress(), inProgress()];
    const importer = createImporter({ concurrency: '2' });
    clock.onSleep = () => importer.cancel();

    const summary = await importer.importDatasets();

    expect(events).toEqual(['submit IG/META', 'poll IG/META']);
    expect(summary.outcomes.map(outcome => [outcome.dataset.name, outcome.status])).toEqual([
      ['IG/META', 'cancelled'],
      ['FHIRIZED-1KGENOMES/META', 'skipped']
    ]);
    expect(summary.cancelled).toBe(1);
    expect(summary.skipped).toBe(1);
    expect(summary.exitCode).toBe(130);
  });

  it('should keep the finished attempt of a dataset cancelled before its retry', async () => {
    script['FHIRIZED-1KGENOMES/META'] = [failed(CONTENT_TYPE_FAILURE)];
    const importer = createImporter({ only: 'FHIRIZED-1KGENOMES/META' });
    clock.onSleep = () => importer.cancel();

    const summary = await importer.importDatasets();
    const [outcome] = summary.outcomes;

    expect(events).toEqual(['submit FHIRIZED-1KGENOMES/META', 'poll FHIRIZED-1KGENOMES/META']);
    expect(outcome.status).toBe('cancelled');
    expect(outcome.job?.attempt).toBe(1);
    expect(outcome.job?.lastErrorMessage).toBe(CONTENT_TYPE_FAILURE);
    expect(outcome.remediation).toBe(REMEDIATION_HINT);
    expect(summary.exitCode).toBe(130);
  });

  it('should not submit anything in a dry run', async () => {
    const summary = await createImporter({ dryRun: true }).importDatasets();

    expect(http.post).not.toHaveBeenCalled();
    expect(http.get).not.toHaveBeenCalled();
    expect(summary.succeeded).toBe(2);
    expect(summary.exitCode).toBe(0);
  });

  it('should list every discovered dataset including legacy ones', async () => {
    const datasets = await createImporter().listDatasets();

    expect(datasets.map(formatDatasetLine)).toEqual([
      '- FHIRIZED-1KGENOMES/META (Size: 0.00 MB)',
      '- FHIRIZED-CDA/META (Size: 0.00 MB) [legacy]',
      '- IG/META (Size: 0.00 MB) [implementation guide]'
    ]);
  });
});

describe('formatDatasetLine', () => {
  it('should print the size in megabytes', () => {
    expect(formatDatasetLine({
      name: 'FHIRIZED-GTEX/META',
      sizeBytes: 1572864,
      objectCount: 4,
      isLegacy: false,
      isImplementationGuide: false
    })).toBe('- FHIRIZED-GTEX/META (Size: 1.50 MB)');
  });
});

describe('summarize', () => {
  it('should exit 0 when nothing was planned', () => {
    expect(summarize([], false)).toEqual({
      outcomes: [],
      succeeded: 0,
      failed: 0,
      retried: 0,
      cancelled: 0,
      skipped: 0,
      exitCode: 0
    });
  });

  it('should exit 130 once the run was cancelled', () => {
    expect(summarize([], true).exitCode).toBe(130);
  });
});
