// On-disk catalog snapshot schema version. Bump on any backward-incompatible change
// to the snapshot layout; snapshots carrying another version are treated as unreadable
// and the catalog starts empty (a fresh crawl rebuilds it).
export const SNAPSHOT_SCHEMA_VERSION = '1';

export function isSupportedSnapshotVersion(version: unknown): boolean {
  return version === SNAPSHOT_SCHEMA_VERSION;
}
