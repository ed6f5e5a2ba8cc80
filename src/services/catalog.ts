import { z } from 'zod';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { CatalogContents, copyNameEntry, Dataset, datasetsOf, GroupContents, NameEntry } from '../models/dataset';
import { classifyListing } from './artifactClassifier';
import { FileCatalogRepository } from './catalogRepository';
import { catalogError, describeError } from './errors';
import { normalizeIdentifier } from './identifier';
import { logDebug, logInfo, logWarn } from './logger';
import { lastSegment, ObjectStore } from './objectStore';

export interface CatalogOptions {
  /** Where the JSON snapshot lives. */
  catalogPath: string;
  /** Store prefix whose direct sub-prefixes are the catalog groups. */
  basePrefix: string;
  store: ObjectStore;
  /** Crawl the store instead of loading the snapshot. */
  fresh?: boolean;
  arrayThreshold?: number;
}

export interface UpdateGroupOptions {
  /** Normalize the identifier before matching (default true). When false it is matched and stored verbatim. */
  formatId?: boolean;
  allowArrays?: boolean;
}

export interface UpdateAllOptions {
  allowArrays?: boolean;
}

const searchPredicatesSchema = z.object({
  group: z.string(),
  location: z.string(),
  format: z.string(),
  kind: z.string(),
  count: z.string(),
  pattern: z.string(),
  example: z.string(),
}).partial().strict();

export type SearchPredicates = z.infer<typeof searchPredicatesSchema>;
type SearchField = keyof SearchPredicates;

function fieldValue(ds: Dataset, field: SearchField): string | undefined {
  switch(field){
    case 'group': return ds.group;
    case 'location': return ds.location;
    case 'format': return ds.format;
    case 'kind': return ds.kind;
    case 'count': return ds.kind === 'array' ? String(ds.count) : undefined;
    case 'pattern': return ds.kind === 'array' ? ds.pattern : undefined;
    case 'example': return ds.kind === 'array' ? ds.example : undefined;
  }
}

/**
 * Catalog of datasets keyed by normalized group identifier, then by dataset name.
 *
 * One writer at a time: every mutating operation rewrites the full snapshot at
 * `catalogPath`, and nothing guards against a second process doing the same.
 */
export class Catalog {
  private contents: CatalogContents = new Map();
  private readonly repository: FileCatalogRepository;
  private readonly arrayThreshold: number;

  private constructor(private readonly options: CatalogOptions) {
    this.repository = new FileCatalogRepository(options.catalogPath);
    this.arrayThreshold = options.arrayThreshold ?? getRuntimeConfig().catalog.arrayThreshold;
  }

  /**
   * Crawl a fresh catalog (`fresh: true`) or load the persisted snapshot. A snapshot that
   * cannot be read for any reason is logged and replaced by an empty catalog.
   */
  static async open(options: CatalogOptions): Promise<Catalog> {
    const catalog = new Catalog(options);
    if(options.fresh){
      await catalog.createFresh();
      return catalog;
    }
    try {
      catalog.contents = catalog.repository.load();
    } catch(e){
      logWarn('catalog:load-failed', { path: options.catalogPath, exists: catalog.repository.exists(), error: describeError(e) });
      catalog.contents = new Map();
    }
    logInfo('catalog:loaded', { path: options.catalogPath, groups: catalog.contents.size });
    return catalog;
  }

  get basePrefix(){ return this.options.basePrefix; }
  get size(){ return this.contents.size; }

  groups(): string[] {
    return [...this.contents.keys()];
  }

  /** Snapshot of one group's entries; changing it does not change the catalog. */
  get(group: string): ReadonlyMap<string, NameEntry> | undefined {
    const names = this.contents.get(group);
    if(!names) return undefined;
    return new Map([...names].map(([name, entry]) => [name, copyNameEntry(entry)] as const));
  }

  describe(): string {
    return `Catalog for ${this.options.basePrefix}: ${this.contents.size} records.`;
  }

  /** Rebuild every group from the store, discarding current contents. */
  async createFresh(): Promise<void> {
    const started = Date.now();
    const next: CatalogContents = new Map();
    for(const groupPrefix of await this.listGroupPrefixes()){
      const group = normalizeIdentifier(lastSegment(groupPrefix));
      logDebug('catalog:group-create', { group, prefix: groupPrefix });
      next.set(group, await this.classifyGroup(groupPrefix, group, true));
    }
    this.contents = next;
    this.save();
    logInfo('catalog:created', { groups: next.size, ms: Date.now() - started });
  }

  /**
   * Re-crawl one group, replacing its entry wholesale. The identifier must match exactly one
   * top-level prefix (by leading text); anything else throws AmbiguousMatch and leaves the
   * catalog untouched.
   */
  async updateGroup(rawIdentifier: string, opts: UpdateGroupOptions = {}): Promise<void> {
    const formatId = opts.formatId ?? true;
    const identifier = formatId ? normalizeIdentifier(rawIdentifier) : rawIdentifier;
    const candidates = formatId
      ? (await this.listGroupPrefixes()).filter(p => normalizeIdentifier(lastSegment(p)).startsWith(identifier))
      : await this.listGroupPrefixes(identifier);
    if(candidates.length !== 1){
      return catalogError('AmbiguousMatch', `Found ${candidates.length} prefixes matching ${identifier}.`, { identifier, candidates });
    }
    const groupContents = await this.classifyGroup(candidates[0], identifier, opts.allowArrays ?? false);
    this.contents.set(identifier, groupContents);
    this.save();
    logInfo('catalog:group-updated', { group: identifier, names: groupContents.size });
  }

  /** Add groups present in the store but missing from the catalog; existing groups are never re-crawled. */
  async updateAll(opts: UpdateAllOptions = {}): Promise<string[]> {
    const added: string[] = [];
    for(const groupPrefix of await this.listGroupPrefixes()){
      const group = normalizeIdentifier(lastSegment(groupPrefix));
      if(this.contents.has(group)) continue;
      logInfo('catalog:group-create', { group, prefix: groupPrefix });
      this.contents.set(group, await this.classifyGroup(groupPrefix, group, opts.allowArrays ?? false));
      added.push(group);
    }
    this.save();
    return added;
  }

  /**
   * Datasets whose attributes contain every given substring. Multi-format names contribute
   * each of their datasets. No predicates match everything.
   */
  search(predicates: SearchPredicates = {}): Dataset[] {
    const parsed = searchPredicatesSchema.safeParse(predicates);
    if(!parsed.success){
      return catalogError('InvalidSearchPredicate', `Invalid search predicates: ${parsed.error.issues.map(i => i.message).join('; ')}`, { predicates });
    }
    const terms = Object.entries(parsed.data).filter((t): t is [SearchField, string] => t[1] !== undefined);
    const results: Dataset[] = [];
    for(const names of this.contents.values()){
      for(const entry of names.values()){
        for(const ds of datasetsOf(entry)){
          if(terms.every(([field, needle]) => fieldValue(ds, field)?.includes(needle) ?? false)) results.push(ds);
        }
      }
    }
    if(results.length) logInfo('catalog:search', { predicates: parsed.data, hits: results.length });
    return results;
  }

  private async listGroupPrefixes(namePrefix?: string): Promise<string[]> {
    const entries = await this.options.store.list(this.options.basePrefix, namePrefix ? { namePrefix } : undefined);
    return entries.filter(e => this.options.store.isPrefix(e));
  }

  private async classifyGroup(groupPrefix: string, group: string, allowArrays: boolean): Promise<GroupContents> {
    const listing = await this.options.store.list(groupPrefix);
    return classifyListing(this.options.store, listing, group, { allowArrays, arrayThreshold: this.arrayThreshold });
  }

  private save(): void {
    this.repository.save(this.contents, this.options.basePrefix);
    logDebug('catalog:saved', { path: this.repository.path, groups: this.contents.size });
  }
}
