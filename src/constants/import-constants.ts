// Constants for the bulk $import protocol and the public dataset bucket

export const DEFAULT_FHIR_SERVER_URL = 'http://fhir-server:8080/fhir';
export const DEFAULT_BUCKET_URL = 'https://storage.googleapis.com/fhir-aggregator-public';

/** JSON listing API of the object store; `{bucket}` is replaced with the bucket name. */
export const STORAGE_LISTING_URL = 'https://storage.googleapis.com/storage/v1/b/{bucket}/o';
export const STORAGE_LISTING_PAGE_SIZE = 1000;

export const RESOURCE_FILE_SUFFIX = '.ndjson';

export const IMPORT_INPUT_FORMAT = 'application/fhir+ndjson';

/** Content types the server's bulk import parser accepts for a source file. */
export const SUPPORTED_CONTENT_TYPES = [
  'application/ndjson',
  'application/fhir+ndjson',
  'application/json+fhir',
  'application/fhir+json',
  'application/json',
  'text/plain'
] as const;

export const IMPORT_REQUEST_HEADERS = {
  'Content-Type': 'application/fhir+json',
  'Accept': 'application/fhir+json',
  'Prefer': 'respond-async',
  'X-Upsert-Existence-Check': 'disabled'
} as const;

export const DATASET_NAMING = {
  implementationGuide: 'IG/META',
  legacyPrefixes: ['R4']
} as const;

export const IMPORT_DEFAULTS = {
  concurrency: 2,
  maxAttempts: 3,
  initialPollIntervalMs: 10_000,
  maxPollIntervalMs: 120_000,
  pollBackoffFactor: 2,
  maxWaitMs: 2 * 60 * 60 * 1000,
  maxErrorCount: 10,
  retryDelayMs: 30_000,
  requestTimeoutMs: 60_000
} as const;

export const REMEDIATION_HINT =
  'Objects are served with an unsupported Content-Type. Set the Content-Type metadata of every .ndjson object in the bucket to application/fhir+ndjson and run the import again.';
