export { Catalog } from './services/catalog';
export type { CatalogOptions, SearchPredicates, UpdateAllOptions, UpdateGroupOptions } from './services/catalog';
export { classifyArrayGroup, classifyListing, DEFAULT_ARRAY_THRESHOLD, extensionOf, splitLeafName } from './services/artifactClassifier';
export type { ClassifyOptions } from './services/artifactClassifier';
export { FileCatalogRepository, fromSnapshot, toSnapshot } from './services/catalogRepository';
export type { CatalogSnapshot } from './services/catalogRepository';
export { buildDatasetKey, DatasetService } from './services/datasetService';
export type { DownloadOptions, ReadOptions, ReadResult, Table } from './services/datasetService';
export { catalogError, isCatalogError } from './services/errors';
export type { CatalogErrorCode, CatalogErrorShape } from './services/errors';
export { normalizeIdentifier } from './services/identifier';
export { derivePattern } from './services/patternDeriver';
export { FileObjectStore } from './services/fileObjectStore';
export { S3ObjectStore } from './services/s3ObjectStore';
export { createObjectStore } from './services/storeFactory';
export type { CopyEndpoint, ListOptions, ObjectStore } from './services/objectStore';
export { datasetsOf, describeDataset } from './models/dataset';
export type { ArrayDataset, CatalogContents, Dataset, DatasetKind, FileDataset, GroupContents, NameEntry } from './models/dataset';
export { getRuntimeConfig, reloadRuntimeConfig } from './config/runtimeConfig';
export type { RuntimeConfig } from './config/runtimeConfig';
