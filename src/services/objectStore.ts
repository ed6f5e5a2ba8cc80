import path from 'path';

export interface ListOptions {
  /** Keep only entries whose last path segment starts with this text. */
  namePrefix?: string;
  /** Keep only entries whose key ends with this text. */
  suffix?: string;
}

export type CopyEndpoint =
  | { kind: 'local'; path: string }
  | { kind: 'store'; key: string };

/**
 * Narrow view of an object store used by the catalog. Keys use '/' separators;
 * prefix ("directory") entries returned by `list` end with '/'.
 */
export interface ObjectStore {
  /** Direct children of `prefix`, sorted by key. */
  list(prefix: string, options?: ListOptions): Promise<string[]>;
  isPrefix(key: string): boolean;
  /** Copy between the local filesystem and the store (either direction); resolves to the destination path or key. */
  copy(source: CopyEndpoint, destination: CopyEndpoint): Promise<string>;
  readText(key: string): Promise<string>;
  readRaw(key: string): Promise<Buffer>;
}

export const keyPath = path.posix;

/** Last non-empty segment of a key or prefix: `a/b/` -> `b`, `a/b/c.csv` -> `c.csv`. */
export function lastSegment(key: string): string {
  return keyPath.basename(key.endsWith('/') ? key.slice(0, -1) : key);
}

/** Join key segments, ignoring empty ones; never introduces a leading '/'. */
export function joinKey(...segments: (string | undefined)[]): string {
  const parts = segments.filter((s): s is string => !!s && s.length > 0);
  if(!parts.length) return '';
  return keyPath.join(...parts);
}

export function asPrefix(key: string): string {
  return key === '' || key.endsWith('/') ? key : key + '/';
}

export function applyListOptions(keys: string[], options?: ListOptions): string[] {
  let out = keys;
  const namePrefix = options?.namePrefix;
  const suffix = options?.suffix;
  if(namePrefix) out = out.filter(k => lastSegment(k).startsWith(namePrefix));
  if(suffix) out = out.filter(k => k.endsWith(suffix));
  return out;
}
