/**
 * Canonical form of a project identifier so that `SGDS-123`, `sgds-123` and
 * `SGDS-123_some_description` all key the same catalog group (`sgds123`).
 *
 * Rules, in order:
 *  - trim surrounding whitespace
 *  - lower-case
 *  - keep only the text before the first underscore
 *  - drop every hyphen
 *  - trim again (whitespace that sat before the underscore)
 *
 * Total and idempotent; the empty string normalizes to itself.
 */
export function normalizeIdentifier(raw: string): string {
  const lowered = raw.trim().toLowerCase();
  const head = lowered.split('_')[0];
  return head.split('-').join('').trim();
}
