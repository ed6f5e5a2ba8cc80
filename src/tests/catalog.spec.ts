import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { Catalog } from '../services/catalog';
import { FileObjectStore } from '../services/fileObjectStore';
import { catchThrown, makeTempDir, writeObjects } from './util/storeFixture';

const BASE = 'projects';

describe('Catalog', () => {
  let root: string;
  let catalogPath: string;
  let store: FileObjectStore;

  beforeEach(() => {
    root = makeTempDir('catalog-store');
    catalogPath = path.join(makeTempDir('catalog-snap'), 'catalog.json');
    store = new FileObjectStore(root);
    writeObjects(root, {
      'projects/SGDS-123_first/report.csv': 'id,v\na,1\n',
      'projects/SGDS-123_first/report.json': '{}',
      'projects/SGDS-124_second/data.csv': 'id,v\n',
      'projects/OMICS-7/a.txt': 'note',
      'projects/loose.txt': 'not a group',
    });
  });

  const openFresh = () => Catalog.open({ catalogPath, basePrefix: BASE, store, fresh: true });

  it('crawls every group prefix into normalized identifiers and persists', async () => {
    const catalog = await openFresh();
    expect(catalog.groups()).toEqual(['omics7', 'sgds123', 'sgds124']);
    expect(catalog.describe()).toBe('Catalog for projects: 3 records.');
    expect(fs.existsSync(catalogPath)).toBe(true);
    expect(catalog.get('sgds123')?.get('report')?.type).toBe('multiFormat');
  });

  it('round-trips through the persisted snapshot', async () => {
    const created = await openFresh();
    const loaded = await Catalog.open({ catalogPath, basePrefix: BASE, store });
    expect(loaded.groups()).toEqual(created.groups());
    for(const group of created.groups()){
      expect(loaded.get(group)).toEqual(created.get(group));
    }
  });

  it('reloads a dataset whose name is __proto__', async () => {
    writeObjects(root, { 'projects/ABC-1/__proto__.csv': 'id\n', 'projects/ABC-1/b.csv': 'id\n' });
    const created = await openFresh();
    const loaded = await Catalog.open({ catalogPath, basePrefix: BASE, store });
    expect([...(created.get('abc1')?.keys() ?? [])]).toEqual(['__proto__', 'b']);
    expect(loaded.get('abc1')).toEqual(created.get('abc1'));
  });

  it('hands out copies of group entries', async () => {
    const catalog = await openFresh();
    const entry = catalog.get('sgds124')?.get('data');
    if(entry?.type !== 'single') throw new Error('expected a single-file entry');
    entry.dataset.location = 'elsewhere';
    expect(catalog.get('sgds124')?.get('data')).toEqual({
      type: 'single',
      dataset: { group: 'sgds124', location: 'projects/SGDS-124_second/data.csv', format: 'CSV', kind: 'file' },
    });
    expect(catalog.search({ location: 'elsewhere' })).toEqual([]);
  });

  it('starts empty when the snapshot is missing', async () => {
    const catalog = await Catalog.open({ catalogPath, basePrefix: BASE, store });
    expect(catalog.size).toBe(0);
  });

  it('starts empty when the snapshot is corrupt', async () => {
    fs.writeFileSync(catalogPath, '{ not json');
    const catalog = await Catalog.open({ catalogPath, basePrefix: BASE, store });
    expect(catalog.size).toBe(0);
  });

  it('propagates store failures from a fresh crawl', async () => {
    await expect(Catalog.open({ catalogPath, basePrefix: 'does-not-exist', store, fresh: true }))
      .rejects.toMatchObject({ code: 'ENOENT' });
    expect(fs.existsSync(catalogPath)).toBe(false);
  });

  describe('updateGroup', () => {
    it('replaces the matching group wholesale and persists', async () => {
      const catalog = await openFresh();
      writeObjects(root, { 'projects/SGDS-123_first/extra.parquet': 'p' });
      fs.rmSync(path.join(root, 'projects/SGDS-123_first/report.json'));
      await catalog.updateGroup('SGDS-123');
      const group = catalog.get('sgds123');
      expect([...(group?.keys() ?? [])]).toEqual(['extra', 'report']);
      expect(group?.get('report')?.type).toBe('single');
      const reloaded = await Catalog.open({ catalogPath, basePrefix: BASE, store });
      expect(reloaded.get('sgds123')).toEqual(group);
    });

    it('fails with AmbiguousMatch and leaves the catalog untouched when two prefixes match', async () => {
      const catalog = await openFresh();
      const before = fs.readFileSync(catalogPath, 'utf8');
      const groupBefore = catalog.get('sgds123');
      await expect(catalog.updateGroup('SGDS-12')).rejects.toMatchObject({
        code: 'AmbiguousMatch',
        message: 'Found 2 prefixes matching sgds12.',
      });
      expect(fs.readFileSync(catalogPath, 'utf8')).toBe(before);
      expect(catalog.get('sgds123')).toEqual(groupBefore);
    });

    it('fails with AmbiguousMatch when nothing matches', async () => {
      const catalog = await openFresh();
      await expect(catalog.updateGroup('NOPE-1')).rejects.toMatchObject({ code: 'AmbiguousMatch', data: { candidates: [] } });
    });

    it('matches and stores the raw identifier when formatting is disabled', async () => {
      const catalog = await openFresh();
      await catalog.updateGroup('SGDS-124', { formatId: false });
      expect(catalog.groups()).toContain('SGDS-124');
      expect(catalog.get('SGDS-124')?.get('data')).toEqual({
        type: 'single',
        dataset: { group: 'sgds124', location: 'projects/SGDS-124_second/data.csv', format: 'CSV', kind: 'file' },
      });
    });

    it('builds arrays when asked', async () => {
      const catalog = await openFresh();
      const many: Record<string, string> = {};
      for(let i = 10; i < 22; i++) many[`projects/OMICS-7/s${i}.csv`] = String(i);
      writeObjects(root, many);
      await catalog.updateGroup('omics-7', { allowArrays: true });
      expect(catalog.get('omics7')?.get('OMICS-7_TXT_array')?.type).toBe('single');
      const csv = catalog.get('omics7')?.get('OMICS-7_CSV_array');
      expect(csv?.type === 'single' && csv.dataset).toEqual({
        group: 'omics7',
        location: 'projects/OMICS-7/',
        format: 'CSV',
        kind: 'array',
        count: 12,
        pattern: 'projects/OMICS-7/s*.csv',
        example: 'projects/OMICS-7/s10.csv',
      });
    });
  });

  describe('updateAll', () => {
    it('adds new groups and never re-crawls existing ones', async () => {
      writeObjects(root, { 'projects/ABC-123_x/first.csv': '1' });
      const catalog = await openFresh();
      const abcBefore = catalog.get('abc123');
      writeObjects(root, {
        'projects/ABC-123_x/second.csv': '2',
        'projects/NEW-9/n.json': '{}',
      });
      const added = await catalog.updateAll();
      expect(added).toEqual(['new9']);
      expect(catalog.get('abc123')).toBe(abcBefore);
      expect([...(catalog.get('abc123')?.keys() ?? [])]).toEqual(['first']);
      const reloaded = await Catalog.open({ catalogPath, basePrefix: BASE, store });
      expect(reloaded.groups().sort()).toEqual(['abc123', 'new9', 'omics7', 'sgds123', 'sgds124']);
    });
  });

  describe('search', () => {
    it('returns descriptors whose format contains the substring across groups', async () => {
      const catalog = await openFresh();
      const hits = catalog.search({ format: 'CSV' });
      expect(hits.map(d => d.location).sort()).toEqual([
        'projects/SGDS-123_first/report.csv',
        'projects/SGDS-124_second/data.csv',
      ]);
    });

    it('requires every predicate to match', async () => {
      const catalog = await openFresh();
      expect(catalog.search({ group: 'sgds', format: 'JSON' }).map(d => d.location)).toEqual(['projects/SGDS-123_first/report.json']);
      expect(catalog.search({ group: 'omics', format: 'CSV' })).toEqual([]);
    });

    it('matches every descriptor when no predicates are given', async () => {
      const catalog = await openFresh();
      expect(catalog.search()).toHaveLength(4);
    });

    it('never matches array-only attributes on files', async () => {
      const catalog = await openFresh();
      expect(catalog.search({ pattern: '' })).toEqual([]);
    });

    it('rejects unknown attributes', async () => {
      const catalog = await openFresh();
      const predicates = JSON.parse('{"colour":"red"}');
      expect(catchThrown(() => catalog.search(predicates))).toMatchObject({ code: 'InvalidSearchPredicate' });
    });
  });
});
