import { catalogError } from './errors';

/**
 * Summarize a set of keys as `<common prefix>*<common suffix>`, e.g.
 * `['abc_1.csv','abc_2.csv']` -> `abc_*.csv`.
 *
 * Prefix and suffix grow independently from the first member, so for members that are
 * identical or very short the two may overlap (`['aa','aa']` -> `aa*aa`).
 */
export function derivePattern(members: readonly string[]): string {
  if(!members.length) catalogError('EmptyPatternInput', 'Cannot derive a pattern from an empty member list');
  const reference = members[0];

  let prefix = '';
  for(let i = 0; i < reference.length; i++){
    const candidate = prefix + reference[i];
    if(!members.every(m => m.startsWith(candidate))) break;
    prefix = candidate;
  }

  let suffix = '';
  for(let i = reference.length - 1; i >= 0; i--){
    const candidate = reference[i] + suffix;
    if(!members.every(m => m.endsWith(candidate))) break;
    suffix = candidate;
  }

  return prefix + '*' + suffix;
}
