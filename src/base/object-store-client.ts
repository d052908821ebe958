import axios, { AxiosInstance } from 'axios';
import { StoredObject } from '../types/dataset-types.js';
import { DiscoveryError } from '../errors/import-errors.js';
import { STORAGE_LISTING_PAGE_SIZE, STORAGE_LISTING_URL } from '../constants/import-constants.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

export interface ObjectStore {
  listObjects(prefix?: string): Promise<StoredObject[]>;
  publicUrlFor(objectName: string): string;
}

export interface ObjectStoreClientConfig {
  /** Public base URL of the bucket, e.g. `https://storage.googleapis.com/<bucket>` */
  bucketUrl: string;
  verbose: boolean;
  http?: Pick<AxiosInstance, 'get'>;
  listingUrl?: string;
}

interface StorageListingItem {
  name?: string;
  size?: string | number;
  contentType?: string;
}

interface StorageListingPage {
  items?: StorageListingItem[];
  nextPageToken?: string;
}

/**
 * Lists a public Google Cloud Storage bucket through its JSON API.
 */
export class ObjectStoreClient implements ObjectStore {
  protected config: ObjectStoreClientConfig;
  private http: Pick<AxiosInstance, 'get'>;
  private bucketUrl: string;

  constructor(config: ObjectStoreClientConfig) {
    this.config = config;
    this.http = config.http ?? axios;
    this.bucketUrl = config.bucketUrl.replace(/\/+$/, '');
  }

  get bucketName(): string {
    return this.bucketUrl.substring(this.bucketUrl.lastIndexOf('/') + 1);
  }

  publicUrlFor(objectName: string): string {
    return `${this.bucketUrl}/${objectName}`;
  }

  async listObjects(prefix?: string): Promise<StoredObject[]> {
    const listingUrl = (this.config.listingUrl ?? STORAGE_LISTING_URL).replace('{bucket}', encodeURIComponent(this.bucketName));
    const objects: StoredObject[] = [];
    let pageToken: string | undefined = undefined;
    let pages = 0;

    do {
      const params: Record<string, string | number> = {
        fields: 'items(name,size,contentType),nextPageToken',
        maxResults: STORAGE_LISTING_PAGE_SIZE
      };
      if (prefix) {
        params.prefix = prefix;
      }
      if (pageToken) {
        params.pageToken = pageToken;
      }

      let page: StorageListingPage;
      try {
        const response = await this.http.get<StorageListingPage>(listingUrl, { params });
        page = response.data;
      } catch (error) {
        throw this.toDiscoveryError(error);
      }

      for (const item of page.items ?? []) {
        if (!item.name) {
          continue;
        }
        objects.push({
          name: item.name,
          sizeBytes: Number(item.size ?? 0),
          contentType: item.contentType ?? ''
        });
      }
      pages++;
      pageToken = page.nextPageToken;
    } while (pageToken);

    if (this.config.verbose) {
      console.debug(`${LogPrefixes.DISCOVERY} Listed ${objects.length} objects in ${pages} page(s) from ${this.bucketName}${prefix ? ` with prefix ${prefix}` : ''}`);
    }
    return objects;
  }

  private toDiscoveryError(error: unknown): DiscoveryError {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        return new DiscoveryError(
          `Object store listing failed for bucket ${this.bucketName}: ${error.response.status} ${error.response.statusText}`,
          { cause: error }
        );
      }
      return new DiscoveryError(`Object store unreachable for bucket ${this.bucketName}: ${error.message}`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new DiscoveryError(`Object store listing failed for bucket ${this.bucketName}: ${message}`, { cause: error });
  }
}
