import { ObjectStore } from '../base/object-store-client.js';
import { Dataset, StoredObject } from '../types/dataset-types.js';
import { DiscoveryError, ImporterError } from '../errors/import-errors.js';
import { DATASET_NAMING, RESOURCE_FILE_SUFFIX } from '../constants/import-constants.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

export interface DatasetNamingConfig {
  implementationGuide: string;
  legacyPrefixes: readonly string[];
}

/**
 * Turns the store's flat object namespace into `<GROUP>/<VARIANT>` datasets.
 * All knowledge of the naming convention lives here.
 */
export class DatasetCatalog {
  private store: ObjectStore;
  private naming: DatasetNamingConfig;

  constructor(store: ObjectStore, naming: DatasetNamingConfig = DATASET_NAMING) {
    this.store = store;
    this.naming = naming;
  }

  async discover(): Promise<Dataset[]> {
    console.info(`${LogPrefixes.DISCOVERY} Discovering datasets...`);
    let objects: StoredObject[];
    try {
      objects = await this.store.listObjects();
    } catch (error) {
      if (error instanceof ImporterError) {
        throw error;
      }
      throw new DiscoveryError(`Dataset discovery failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    const totals = new Map<string, { sizeBytes: number; objectCount: number }>();
    for (const object of objects) {
      const name = this.datasetNameFor(object.name);
      const isPlaceholder = object.name.endsWith('/');
      // Only resource files count; folder placeholders establish an empty dataset
      if (!name || (!isPlaceholder && !object.name.endsWith(RESOURCE_FILE_SUFFIX))) {
        continue;
      }
      const total = totals.get(name) ?? { sizeBytes: 0, objectCount: 0 };
      if (!isPlaceholder) {
        total.sizeBytes += object.sizeBytes;
        total.objectCount++;
      }
      totals.set(name, total);
    }

    const datasets = Array.from(totals.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, total]) => this.toDataset(name, total.sizeBytes, total.objectCount));

    console.info(`${LogPrefixes.DISCOVERY} Found ${datasets.length} datasets in ${objects.length} objects`);
    return datasets;
  }

  /**
   * Dataset name for an object name, or null for objects outside any dataset.
   */
  datasetNameFor(objectName: string): string | null {
    const segments = objectName.split('/');
    if (segments.length < 2 || !segments[0] || !segments[1]) {
      return null;
    }
    // `GROUP/file.ndjson` sits directly in a group, not a variant
    if (segments.length === 2 && !objectName.endsWith('/')) {
      return null;
    }
    return `${segments[0]}/${segments[1]}`;
  }

  isLegacy(name: string): boolean {
    return this.naming.legacyPrefixes.some(prefix => name.startsWith(prefix));
  }

  isImplementationGuide(name: string): boolean {
    return name === this.naming.implementationGuide;
  }

  private toDataset(name: string, sizeBytes: number, objectCount: number): Dataset {
    return {
      name,
      sizeBytes,
      objectCount,
      isLegacy: this.isLegacy(name),
      isImplementationGuide: this.isImplementationGuide(name)
    };
  }
}

export function formatSizeMb(sizeBytes: number): string {
  return (sizeBytes / (1024 * 1024)).toFixed(2);
}
