import { arrayDataset, Dataset, fileDataset, GroupContents, NA_FORMAT, NameEntry } from '../models/dataset';
import { catalogError } from './errors';
import { logDebug } from './logger';
import { keyPath, lastSegment, ObjectStore } from './objectStore';
import { derivePattern } from './patternDeriver';

export interface ClassifyOptions {
  /** Collapse a group's loose files into arrays once there are more than `arrayThreshold` of them. */
  allowArrays: boolean;
  arrayThreshold?: number;
}

export const DEFAULT_ARRAY_THRESHOLD = 10;

/** Extension of a key's basename: text after the last '.', or the whole basename when there is none. */
export function extensionOf(key: string): string {
  const base = lastSegment(key);
  const dot = base.lastIndexOf('.');
  return dot === -1 ? base : base.slice(dot + 1);
}

/** Split a leaf key into base name and extension; leaves without an extension are rejected. */
export function splitLeafName(key: string): { name: string; ext: string } {
  const base = lastSegment(key);
  const dot = base.lastIndexOf('.');
  if(dot === -1) catalogError('MissingExtension', `Cannot classify "${key}": file name has no extension`, { key });
  return { name: base.slice(0, dot), ext: base.slice(dot + 1) };
}

/**
 * Add a single-file dataset under `name`. A second file with the same base name turns the
 * entry into a format-keyed map (lower-case extension) instead of replacing it.
 */
function addSingleFile(contents: GroupContents, name: string, dataset: Dataset, ext: string): void {
  const existing = contents.get(name);
  const formatKey = ext.toLowerCase();
  if(!existing){
    contents.set(name, { type: 'single', dataset });
    return;
  }
  let merged: NameEntry;
  switch(existing.type){
    case 'single':
      merged = { type: 'multiFormat', formats: new Map([[existing.dataset.format.toLowerCase(), existing.dataset], [formatKey, dataset]]) };
      break;
    case 'multiFormat':
      existing.formats.set(formatKey, dataset);
      merged = existing;
      break;
  }
  contents.set(name, merged);
}

/**
 * Classify keys that live together under one directory as arrays, one per extension.
 *
 * Names are `<dir>_array`, or `<dir>_<EXT>_array` when the directory mixes extensions.
 * An extension with a single member degrades to a plain file dataset.
 */
export function classifyArrayGroup(keys: readonly string[], group: string, contents: GroupContents = new Map()): GroupContents {
  const leaves = keys.filter(k => !k.endsWith('/'));
  if(!leaves.length) return contents;
  const dir = keyPath.dirname(leaves[0]);
  const baseDir = keyPath.basename(dir);

  const extensions: string[] = [];
  for(const k of leaves){
    const ext = extensionOf(k);
    if(!extensions.includes(ext)) extensions.push(ext);
  }

  for(const ext of extensions){
    const name = extensions.length > 1 ? `${baseDir}_${ext.toUpperCase()}_array` : `${baseDir}_array`;
    const members = leaves.filter(k => k.endsWith('.' + ext)).map(k => keyPath.basename(k));
    let dataset: Dataset;
    if(members.length === 0){
      // extension-less key: its "extension" is the whole basename
      const key = leaves.find(k => extensionOf(k) === ext) ?? ext;
      dataset = fileDataset(group, key, NA_FORMAT);
    } else if(members.length === 1){
      dataset = fileDataset(group, keyPath.join(dir, members[0]), ext.toUpperCase());
    } else {
      dataset = arrayDataset(group, dir + '/', ext.toUpperCase(), {
        count: members.length,
        pattern: keyPath.join(dir, derivePattern(members)),
        example: keyPath.join(dir, members[0]),
      });
    }
    contents.set(name, { type: 'single', dataset });
  }
  return contents;
}

/**
 * Turn one group's listing into named dataset entries.
 *
 * Sub-prefixes are always listed and classified as arrays. Loose files become arrays only
 * when `allowArrays` is set and there are more than `arrayThreshold` of them; otherwise each
 * is its own dataset named after its base name.
 *
 * The result is a new map; store listing errors propagate to the caller.
 */
export async function classifyListing(store: ObjectStore, listing: readonly string[], group: string, options: ClassifyOptions): Promise<GroupContents> {
  const threshold = options.arrayThreshold ?? DEFAULT_ARRAY_THRESHOLD;
  const contents: GroupContents = new Map();

  const folders = listing.filter(k => store.isPrefix(k));
  for(const prefix of folders){
    const children = await store.list(prefix);
    logDebug('classify:folder', { group, prefix, children: children.length });
    classifyArrayGroup(children, group, contents);
  }

  const files = listing.filter(k => !store.isPrefix(k));
  if(options.allowArrays && files.length > threshold){
    classifyArrayGroup(files, group, contents);
    return contents;
  }
  for(const key of files){
    const { name, ext } = splitLeafName(key);
    addSingleFile(contents, name, fileDataset(group, key, ext.toUpperCase()), ext);
  }
  return contents;
}
