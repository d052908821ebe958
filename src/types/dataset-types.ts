// An object as listed by the object store.
export interface StoredObject {
  name: string;
  sizeBytes: number;
  contentType: string;
}

export interface Dataset {
  /** `<GROUP>/<VARIANT>`, e.g. `FHIRIZED-GTEX/META` */
  name: string;
  sizeBytes: number;
  objectCount: number;
  isLegacy: boolean;
  isImplementationGuide: boolean;
}

export interface ManifestEntry {
  url: string;
  contentType: string;
  sizeBytes: number;
  resourceType: string;
}

export interface PlanOptions {
  filter?: string;
  includeLegacy?: boolean;
  /** Lets a non-empty filter select legacy datasets it matches by name. */
  filterBypassesLegacy?: boolean;
}
