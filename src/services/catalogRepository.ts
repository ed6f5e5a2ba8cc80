import fs from 'fs';
import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import snapshotSchema from '../../schemas/catalog-snapshot.schema.json';
import { CatalogContents, Dataset, GroupContents, NameEntry } from '../models/dataset';
import { isSupportedSnapshotVersion, SNAPSHOT_SCHEMA_VERSION } from '../versioning/schemaVersion';
import { atomicWriteJson } from './atomicFs';
import { catalogError } from './errors';

type SnapshotNameEntry =
  | { type: 'single'; dataset: Dataset }
  | { type: 'multiFormat'; formats: Record<string, Dataset> };

export interface CatalogSnapshot {
  schemaVersion: string;
  basePrefix: string;
  savedAt: string;
  groups: Record<string, Record<string, SnapshotNameEntry>>;
}

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);
const validateSnapshot = ajv.compile<CatalogSnapshot>(snapshotSchema);

function toSnapshotEntry(entry: NameEntry): SnapshotNameEntry {
  switch(entry.type){
    case 'single': return { type: 'single', dataset: entry.dataset };
    case 'multiFormat': return { type: 'multiFormat', formats: Object.fromEntries(entry.formats) };
  }
}

function fromSnapshotEntry(entry: SnapshotNameEntry): NameEntry {
  switch(entry.type){
    case 'single': return { type: 'single', dataset: entry.dataset };
    case 'multiFormat': return { type: 'multiFormat', formats: new Map(Object.entries(entry.formats)) };
  }
}

// Records are built with Object.fromEntries: an assignment to a key such as
// "__proto__" would set the prototype instead of adding an own property.
export function toSnapshot(contents: CatalogContents, basePrefix: string, savedAt = new Date()): CatalogSnapshot {
  const groups = new Map<string, Record<string, SnapshotNameEntry>>();
  for(const [group, names] of contents){
    const out = new Map<string, SnapshotNameEntry>();
    for(const [name, entry] of names) out.set(name, toSnapshotEntry(entry));
    groups.set(group, Object.fromEntries(out));
  }
  return { schemaVersion: SNAPSHOT_SCHEMA_VERSION, basePrefix, savedAt: savedAt.toISOString(), groups: Object.fromEntries(groups) };
}

export function fromSnapshot(snapshot: CatalogSnapshot): CatalogContents {
  const contents: CatalogContents = new Map();
  for(const [group, names] of Object.entries(snapshot.groups)){
    const groupContents: GroupContents = new Map();
    for(const [name, entry] of Object.entries(names)) groupContents.set(name, fromSnapshotEntry(entry));
    contents.set(group, groupContents);
  }
  return contents;
}

/**
 * Whole-catalog JSON snapshot at a single path. Every save replaces the previous
 * snapshot atomically; there is no locking between writers.
 */
export class FileCatalogRepository {
  constructor(private readonly filePath: string) {}

  get path(){ return this.filePath; }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /** Read and validate the snapshot. Throws on a missing file, bad JSON or schema mismatch. */
  load(): CatalogContents {
    const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
    if(!validateSnapshot(raw)){
      const detail = ajv.errorsText(validateSnapshot.errors);
      return catalogError('SnapshotInvalid', `Catalog snapshot ${this.filePath} failed validation: ${detail}`, { file: this.filePath });
    }
    if(!isSupportedSnapshotVersion(raw.schemaVersion)){
      return catalogError('SnapshotInvalid', `Unsupported catalog snapshot version ${raw.schemaVersion}`, { file: this.filePath, schemaVersion: raw.schemaVersion });
    }
    return fromSnapshot(raw);
  }

  save(contents: CatalogContents, basePrefix: string): void {
    atomicWriteJson(this.filePath, toSnapshot(contents, basePrefix));
  }
}
