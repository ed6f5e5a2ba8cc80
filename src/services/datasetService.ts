import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import path from 'path';
import { parse, Options as ParseOptions } from 'csv-parse';
import { stringify } from 'csv-stringify';
import { z } from 'zod';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { Dataset, FileDataset, fileDataset } from '../models/dataset';
import { splitLeafName } from './artifactClassifier';
import { catalogError } from './errors';
import { normalizeIdentifier } from './identifier';
import { logDebug, logInfo } from './logger';
import { joinKey, keyPath, ObjectStore } from './objectStore';

export interface Table {
  /** Header of the index column. */
  indexColumn: string;
  index: string[];
  columns: string[];
  rows: Record<string, string>[];
}

export interface ReadOptions {
  /** Array member to read; required for array datasets. */
  key?: string;
  /** Index column for CSV data, by position or header name (default 0). */
  index?: number | string;
  /** Passed to csv-parse; `columns` is always enabled. */
  csv?: Omit<ParseOptions, 'columns'>;
}

export interface DownloadOptions {
  key?: string;
  /** Local directory to copy into; defaults to the configured temp dir. */
  destinationDir?: string;
}

export type ReadResult =
  | { type: 'table'; table: Table }
  | { type: 'raw'; data: Buffer };

const csvRecords = z.array(z.record(z.string()));

function parseCsv(text: string, options: Omit<ParseOptions, 'columns'> = {}): Promise<Record<string, string>[]> {
  return new Promise((resolve, reject) => {
    parse(text, { skip_empty_lines: true, ...options, columns: true }, (err, records: unknown) => {
      if(err) reject(err);
      else resolve(csvRecords.parse(records));
    });
  });
}

function stringifyCsv(rows: Record<string, unknown>[]): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify(rows, { header: true }, (err, output) => {
      if(err) reject(err);
      else resolve(output);
    });
  });
}

/** Object key for an uploaded artifact: `<base>/<group>/[<subfolder>/]<file>`. */
export function buildDatasetKey(basePrefix: string, group: string, localPath: string, subfolder?: string): string {
  return joinKey(basePrefix, normalizeIdentifier(group), subfolder, path.basename(localPath));
}

/**
 * Store-backed operations on catalog datasets: member resolution, listing array keys,
 * downloading, reading and creating datasets from local content.
 */
export class DatasetService {
  constructor(private readonly store: ObjectStore, private readonly tmpDir: string = getRuntimeConfig().catalog.tmpDir) {}

  /** Concrete object key for a file dataset, or for member `key` of an array dataset. */
  resolveLocation(ds: Dataset, key?: string): string {
    if(ds.kind !== 'array') return ds.location;
    if(!key || !ds.format){
      return catalogError('InvalidArrayAccess', 'Unable to access DataSet array member without key or format.', { location: ds.location, key });
    }
    return `${ds.location}${key}.${ds.format.toLowerCase()}`;
  }

  /** Member keys currently stored under an array dataset (file names without the format extension). */
  async keys(ds: Dataset): Promise<string[]> {
    if(ds.kind !== 'array'){
      return catalogError('WrongDescriptorKind', 'Property `keys` only exists for DataSet arrays', { location: ds.location, kind: ds.kind });
    }
    const ext = '.' + ds.format.toLowerCase();
    const members = await this.store.list(ds.location, { suffix: ext });
    return members.map(m => keyPath.basename(m, ext));
  }

  async download(ds: Dataset, opts: DownloadOptions = {}): Promise<string> {
    const location = this.resolveLocation(ds, opts.key);
    const destination = path.join(opts.destinationDir ?? this.tmpDir, keyPath.basename(location));
    const localPath = await this.store.copy({ kind: 'store', key: location }, { kind: 'local', path: destination });
    logDebug('dataset:downloaded', { location, localPath });
    return localPath;
  }

  /** CSV datasets parse into a table indexed by `index`; every other format comes back as raw bytes. */
  async read(ds: Dataset, opts: ReadOptions = {}): Promise<ReadResult> {
    const location = this.resolveLocation(ds, opts.key);
    if(ds.format !== 'CSV') return { type: 'raw', data: await this.store.readRaw(location) };

    const rows = await parseCsv(await this.store.readText(location), opts.csv);
    const columns = rows.length ? Object.keys(rows[0]) : [];
    const selector = opts.index ?? 0;
    const indexColumn = typeof selector === 'number' ? columns[selector] : selector;
    if(indexColumn === undefined || !columns.includes(indexColumn)){
      throw new Error(`Index column ${String(selector)} not found in ${location}`);
    }
    return {
      type: 'table',
      table: {
        indexColumn,
        index: rows.map(r => r[indexColumn]),
        columns: columns.filter(c => c !== indexColumn),
        rows,
      },
    };
  }

  /** Upload a local file under the group's prefix and describe it as a file dataset. */
  async fromLocalFile(localPath: string, group: string, basePrefix: string, subfolder?: string): Promise<FileDataset> {
    const { ext } = splitLeafName(localPath);
    const key = buildDatasetKey(basePrefix, group, localPath, subfolder);
    await this.store.copy({ kind: 'local', path: localPath }, { kind: 'store', key });
    logInfo('dataset:uploaded', { key });
    return fileDataset(group, key, ext.toUpperCase());
  }

  /** Write `rows` as `<name>.csv` (header from the first row's keys), upload it and describe it. */
  async fromTable(rows: Record<string, unknown>[], name: string, group: string, basePrefix: string, subfolder?: string): Promise<FileDataset> {
    await mkdir(this.tmpDir, { recursive: true });
    const workDir = await mkdtemp(path.join(this.tmpDir, 'catalog-upload-'));
    try {
      const localPath = path.join(workDir, `${name}.csv`);
      await writeFile(localPath, await stringifyCsv(rows), 'utf8');
      const key = buildDatasetKey(basePrefix, group, localPath, subfolder);
      await this.store.copy({ kind: 'local', path: localPath }, { kind: 'store', key });
      logInfo('dataset:uploaded', { key, rows: rows.length });
      return fileDataset(group, key, 'CSV');
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
