import type { Parameters as FhirParameters, ParametersParameter } from 'fhir/r4';
import { FhirClient } from '../base/fhir-client.js';
import { ObjectStore } from '../base/object-store-client.js';
import { Dataset, ManifestEntry, StoredObject } from '../types/dataset-types.js';
import { ImportJob, ImportJobStates, createImportJob } from '../types/import-job-types.js';
import {
  ContentTypeRejection,
  RejectedManifestError,
  SubmissionError,
  contentTypeRejectionMessage,
  errorMessageOf
} from '../errors/import-errors.js';
import { IMPORT_INPUT_FORMAT, RESOURCE_FILE_SUFFIX, SUPPORTED_CONTENT_TYPES } from '../constants/import-constants.js';
import { LogPrefixes } from '../constants/log-prefixes.js';
import { Clock, systemClock } from '../utilities/clock.js';

export interface BulkImportClientConfig {
  dryRun: boolean;
  verbose: boolean;
  /** Fail locally when a listed content type would be rejected by the server. */
  preflight: boolean;
  clock?: Clock;
}

export class BulkImportClient {
  protected config: BulkImportClientConfig;
  private fhirClient: FhirClient;
  private store: ObjectStore;
  private clock: Clock;

  constructor(fhirClient: FhirClient, store: ObjectStore, config: BulkImportClientConfig) {
    this.fhirClient = fhirClient;
    this.store = store;
    this.config = config;
    this.clock = config.clock ?? systemClock;
  }

  /**
   * Submit one `$import` job for the dataset. Every call creates a new
   * server-side job.
   */
  async submit(dataset: Dataset, attempt: number = 1, signal?: AbortSignal): Promise<ImportJob> {
    const manifest = await this.buildManifest(dataset);
    if (manifest.length === 0) {
      throw new RejectedManifestError(`No ${RESOURCE_FILE_SUFFIX} resources to import for ${dataset.name}`);
    }

    if (this.config.preflight) {
      const rejected = manifest.find(entry => !isSupportedContentType(entry.contentType));
      if (rejected) {
        throw new ContentTypeRejection(contentTypeRejectionMessage(rejected.contentType, rejected.url));
      }
    }

    if (this.config.dryRun) {
      console.log(`${LogPrefixes.DRY_RUN} Would POST $import for ${dataset.name} with ${manifest.length} resources to ${this.fhirClient.baseUrl}`);
      if (this.config.verbose) {
        manifest.forEach(entry => console.log(`${LogPrefixes.DRY_RUN}   ${entry.resourceType} ${entry.url}`));
      }
      const now = this.clock.now();
      return {
        ...createImportJob(dataset.name, manifest, attempt, 'dry-run', now),
        state: ImportJobStates.SUCCEEDED,
        completedAt: now
      };
    }

    console.info(`${LogPrefixes.SUBMIT} Importing ${dataset.name} with ${manifest.length} resources (attempt ${attempt})...`);
    const jobHandle = await this.fhirClient.kickoffImport(this.buildParameters(manifest), signal);
    console.info(`${LogPrefixes.SUBMIT} Import job submitted for ${dataset.name}: ${jobHandle}`);
    return createImportJob(dataset.name, manifest, attempt, jobHandle, this.clock.now());
  }

  async buildManifest(dataset: Dataset): Promise<ManifestEntry[]> {
    let objects: StoredObject[];
    try {
      objects = await this.store.listObjects(`${dataset.name}/`);
    } catch (error) {
      throw new SubmissionError(`Could not list objects for ${dataset.name}: ${errorMessageOf(error)}`, { cause: error });
    }
    const manifest: ManifestEntry[] = [];
    for (const object of objects) {
      if (!object.name.endsWith(RESOURCE_FILE_SUFFIX)) {
        if (this.config.verbose && !object.name.endsWith('/')) {
          console.debug(`${LogPrefixes.SKIP} ${object.name} is not a ${RESOURCE_FILE_SUFFIX} file`);
        }
        continue;
      }
      manifest.push({
        url: this.store.publicUrlFor(object.name),
        contentType: object.contentType,
        sizeBytes: object.sizeBytes,
        resourceType: resourceTypeFor(object.name)
      });
    }
    return manifest.sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));
  }

  buildParameters(manifest: readonly ManifestEntry[]): FhirParameters {
    const inputSource = this.store.publicUrlFor('');
    const parameter: ParametersParameter[] = [
      { name: 'inputFormat', valueCode: IMPORT_INPUT_FORMAT },
      { name: 'inputSource', valueUri: inputSource },
      {
        name: 'storageDetail',
        part: [{ name: 'type', valueCode: 'https' }]
      }
    ];
    for (const entry of manifest) {
      parameter.push({
        name: 'input',
        part: [
          { name: 'type', valueCode: entry.resourceType },
          { name: 'url', valueUri: entry.url }
        ]
      });
    }
    return { resourceType: 'Parameters', parameter };
  }
}

/**
 * FHIR resource type named by a resource file, e.g. `Observation.ndjson` or
 * `SearchParameter-patient-extensions-Patient-age.ndjson`.
 */
export function resourceTypeFor(objectName: string): string {
  const fileName = objectName.substring(objectName.lastIndexOf('/') + 1);
  const match = /^[A-Z][A-Za-z]*/.exec(fileName);
  if (match) {
    return match[0];
  }
  return fileName.endsWith(RESOURCE_FILE_SUFFIX)
    ? fileName.substring(0, fileName.length - RESOURCE_FILE_SUFFIX.length)
    : fileName;
}

export function isSupportedContentType(contentType: string): boolean {
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return SUPPORTED_CONTENT_TYPES.some(supported => supported === mediaType);
}
