import { normalizeIdentifier } from '../services/identifier';

export type DatasetKind = 'file' | 'array';

interface DatasetBase {
  group: string;    // normalized identifier of the owning group
  location: string; // object key (files) or prefix ending in '/' (arrays)
  format: string;   // upper-case extension or 'NA'
}

export interface FileDataset extends DatasetBase {
  kind: 'file';
}

export interface ArrayDataset extends DatasetBase {
  kind: 'array';
  count: number;   // members at classification time, always >= 2
  pattern: string; // representative key, e.g. run/sample_*.csv
  example: string; // one concrete member key
}

export type Dataset = FileDataset | ArrayDataset;

/**
 * A catalog name resolves either to one dataset or, when several files share a base
 * name and differ only by extension, to those datasets keyed by lower-case extension.
 */
export type NameEntry =
  | { type: 'single'; dataset: Dataset }
  | { type: 'multiFormat'; formats: Map<string, Dataset> };

export type GroupContents = Map<string, NameEntry>;
export type CatalogContents = Map<string, GroupContents>;

export const NA_FORMAT = 'NA';

export function fileDataset(group: string, location: string, format: string): FileDataset {
  return { group: normalizeIdentifier(group), location, format, kind: 'file' };
}

export function arrayDataset(group: string, location: string, format: string, members: { count: number; pattern: string; example: string }): ArrayDataset {
  return { group: normalizeIdentifier(group), location, format, kind: 'array', ...members };
}

/** Every dataset reachable from a name entry, in insertion order. */
export function datasetsOf(entry: NameEntry): Dataset[] {
  switch(entry.type){
    case 'single': return [entry.dataset];
    case 'multiFormat': return [...entry.formats.values()];
  }
}

/** Independent copy of an entry, down to its datasets. */
export function copyNameEntry(entry: NameEntry): NameEntry {
  switch(entry.type){
    case 'single': return { type: 'single', dataset: { ...entry.dataset } };
    case 'multiFormat': return { type: 'multiFormat', formats: new Map([...entry.formats].map(([ext, ds]) => [ext, { ...ds }] as const)) };
  }
}

export function describeDataset(ds: Dataset): string {
  const lines = [`DataSet object from ${ds.group.toUpperCase()}:`];
  const attrs: [string, string | number | undefined][] = [
    ['location', ds.location],
    ['format', ds.format],
    ['count', ds.kind === 'array' ? ds.count : undefined],
    ['kind', ds.kind],
    ['pattern', ds.kind === 'array' ? ds.pattern : undefined],
    ['example', ds.kind === 'array' ? ds.example : undefined],
  ];
  for(const [attr, val] of attrs){
    if(val !== undefined && val !== '') lines.push(`\t- ${attr}: ${val}`);
  }
  return lines.join('\n');
}
