/**
 * Tracker Importer Tests
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PatternCatalog } from '../../catalog/patternCatalog';
import { ConfigError, NetworkError } from '../../../utils/errors';
import type { TrackerDescriptor, TrackerFeed } from '../trackerFeed';
import { TrackerImporter, planTrackerMerge, renderKitSections } from '../trackerImporter';

const PROVENANCE = 'test feed';
const IMPORTED_AT = new Date('2024-05-01T12:00:00Z');

class StaticFeed implements TrackerFeed {
  readonly url = 'https://feed.example.test/trackers';
  calls = 0;

  constructor(private readonly trackers: TrackerDescriptor[]) {}

  async fetchTrackers(): Promise<TrackerDescriptor[]> {
    this.calls++;
    return this.trackers;
  }
}

class FailingFeed implements TrackerFeed {
  readonly url = 'https://feed.example.test/trackers';

  constructor(private readonly error: Error) {}

  async fetchTrackers(): Promise<TrackerDescriptor[]> {
    throw this.error;
  }
}

describe('planTrackerMerge', () => {
  const kit = PatternCatalog.parse('kit', 'kit.yaml', 'bar:\n  pattern: x/y|a/b\nfoo:\n  pattern: x/z\n');

  test('should skip a descriptor whose first fragment is already known', () => {
    const plan = planTrackerMerge([{ name: 'Baz', code_signature: 'a.b|q.r' }], kit, PROVENANCE);

    expect(plan.additions).toEqual([]);
    expect(plan.decisions).toEqual([{ kind: 'covered', tracker: 'Baz', fragment: 'a/b' }]);
  });

  test('should flag a known name with an unknown fragment for widening', () => {
    const plan = planTrackerMerge([{ name: 'Foo', code_signature: 'com.foo.' }], kit, PROVENANCE);

    expect(plan.additions).toEqual([]);
    expect(plan.decisions).toEqual([
      { kind: 'needs-widening', tracker: 'Foo', section: 'foo', fragment: 'com/foo', localPattern: 'x/z' }
    ]);
  });

  test('should skip pure noise signatures', () => {
    const plan = planTrackerMerge([{ name: 'Noise', code_signature: '.-.-.' }], kit, PROVENANCE);

    expect(plan.decisions).toEqual([{ kind: 'noise', tracker: 'Noise' }]);
  });

  test('should refuse names that reduce to nothing usable', () => {
    const plan = planTrackerMerge(
      [
        { name: '!!!', code_signature: 'com.bang' },
        { name: '2048', code_signature: 'com.game' }
      ],
      kit,
      PROVENANCE
    );

    expect(plan.additions).toEqual([]);
    expect(plan.decisions).toEqual([
      { kind: 'invalid-name', tracker: '!!!', section: '' },
      { kind: 'invalid-name', tracker: '2048', section: '2048' }
    ]);
  });

  test('should add new detectors with usable fragments only', () => {
    const plan = planTrackerMerge([{ name: 'Ad Network!', code_signature: 'com.ad.net.|.-.|org.adnet.' }], kit, PROVENANCE);

    expect(plan.additions).toEqual([
      { name: 'adnetwork', pattern: 'com/ad/net|org/adnet', description: 'Ad Network! (from test feed)' }
    ]);
  });

  test('should count sections planned earlier in the batch as known', () => {
    const plan = planTrackerMerge(
      [
        { name: 'Alpha', code_signature: 'com.alpha' },
        { name: 'Alpha Mirror', code_signature: 'com.alpha|com.mirror' },
        { name: 'ALPHA', code_signature: 'org.alpha' }
      ],
      kit,
      PROVENANCE
    );

    expect(plan.additions.map(addition => addition.name)).toEqual(['alpha']);
    expect(plan.decisions.map(decision => decision.kind)).toEqual(['added', 'covered', 'needs-widening']);
  });

  test('should ask the catalog whether a fragment is known', () => {
    const containsPattern = jest.spyOn(kit, 'containsPattern');

    planTrackerMerge([{ name: 'Delta', code_signature: 'com.delta|a.b' }], kit, PROVENANCE);

    expect(containsPattern).toHaveBeenCalledWith('com/delta');
    containsPattern.mockRestore();
  });

  test('should leave the catalog untouched', () => {
    planTrackerMerge([{ name: 'Gamma', code_signature: 'com.gamma' }], kit, PROVENANCE);

    expect(kit.sections()).toEqual(['bar', 'foo']);
    expect(kit.containsPattern('com/gamma')).toBe(false);
  });
});

describe('renderKitSections', () => {
  test('should render a dated block per addition', () => {
    const text = renderKitSections(
      [{ name: 'foo', pattern: 'a/b', description: 'Foo (from test feed)' }],
      PROVENANCE,
      IMPORTED_AT
    );

    expect(text).toBe('# Imported from test feed on 2024-05-01\nfoo:\n  description: Foo (from test feed)\n  pattern: a/b\n');
  });
});

describe('TrackerImporter', () => {
  let dir: string;
  let kitPath: string;

  const importerFor = (feed: TrackerFeed): TrackerImporter =>
    new TrackerImporter({ kitCatalogPath: kitPath, feed, provenance: PROVENANCE, now: () => IMPORTED_AT });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'droidmeta-import-'));
    kitPath = join(dir, 'kit.yaml');
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  test('should add one section to an empty catalog', async () => {
    writeFileSync(kitPath, '');

    const summary = await importerFor(new StaticFeed([{ name: 'Foo', code_signature: 'a.b' }])).importAndMerge();

    expect(summary.status).toBe('completed');
    expect(summary.appended).toEqual(['foo']);
    expect(readFileSync(kitPath, 'utf-8')).toBe(
      '# Imported from test feed on 2024-05-01\nfoo:\n  description: Foo (from test feed)\n  pattern: a/b\n'
    );

    const reloaded = PatternCatalog.load('kit', kitPath);
    expect(reloaded.sections()).toEqual(['foo']);
    expect(reloaded.patternOf('foo')).toBe('a/b');
  });

  test('should not add a section when a fragment is already covered', async () => {
    const original = 'bar:\n  pattern: x/y|a/b\n';
    writeFileSync(kitPath, original);

    const summary = await importerFor(new StaticFeed([{ name: 'Foo', code_signature: 'a.b' }])).importAndMerge();

    expect(summary.appended).toEqual([]);
    expect(summary.decisions).toEqual([{ kind: 'covered', tracker: 'Foo', fragment: 'a/b' }]);
    expect(readFileSync(kitPath, 'utf-8')).toBe(original);
  });

  test('should never rewrite an existing section', async () => {
    const original = 'foo:\n  description: Local Foo\n  pattern: x/z\n';
    writeFileSync(kitPath, original);

    const summary = await importerFor(
      new StaticFeed([
        { name: 'Foo', code_signature: 'com.foo.' },
        { name: 'Bar', code_signature: 'com.bar.' }
      ])
    ).importAndMerge();

    expect(summary.decisions.map(decision => decision.kind)).toEqual(['needs-widening', 'added']);
    expect(readFileSync(kitPath, 'utf-8')).toBe(
      `${original}\n# Imported from test feed on 2024-05-01\nbar:\n  description: Bar (from test feed)\n  pattern: com/bar\n`
    );

    const reloaded = PatternCatalog.load('kit', kitPath);
    expect(reloaded.sections()).toEqual(['foo', 'bar']);
    expect(reloaded.patternOf('foo')).toBe('x/z');
  });

  test('should start appended blocks on a new line', async () => {
    writeFileSync(kitPath, 'foo:\n  pattern: x/z');

    await importerFor(new StaticFeed([{ name: 'Bar', code_signature: 'com.bar' }])).importAndMerge();

    expect(PatternCatalog.load('kit', kitPath).sections()).toEqual(['foo', 'bar']);
  });

  test.each([
    ['an empty flow mapping', '{}\n'],
    ['a null document', '~\n']
  ])('should replace %s with the new sections', async (_label, original) => {
    writeFileSync(kitPath, original);

    const summary = await importerFor(new StaticFeed([{ name: 'Foo', code_signature: 'a.b' }])).importAndMerge();

    expect(summary.appended).toEqual(['foo']);
    expect(readFileSync(kitPath, 'utf-8')).toBe(
      '# Imported from test feed on 2024-05-01\nfoo:\n  description: Foo (from test feed)\n  pattern: a/b\n'
    );
    expect(PatternCatalog.load('kit', kitPath).patternOf('foo')).toBe('a/b');
  });

  test('should refuse to append to a flow-style catalog with sections', async () => {
    const original = '{bar: {pattern: x/y}}\n';
    writeFileSync(kitPath, original);

    const importer = importerFor(new StaticFeed([{ name: 'Foo', code_signature: 'a.b' }]));

    await expect(importer.importAndMerge()).rejects.toThrow(ConfigError);
    expect(readFileSync(kitPath, 'utf-8')).toBe(original);
    expect(PatternCatalog.load('kit', kitPath).sections()).toEqual(['bar']);
  });

  test('should plan without writing on a dry run', async () => {
    writeFileSync(kitPath, '');

    const summary = await importerFor(new StaticFeed([{ name: 'Foo', code_signature: 'a.b' }])).importAndMerge({ dryRun: true });

    expect(summary).toMatchObject({ status: 'completed', appended: ['foo'], dryRun: true });
    expect(readFileSync(kitPath, 'utf-8')).toBe('');
  });

  test('should abort without writing when the feed is unavailable', async () => {
    const original = 'foo:\n  pattern: x/z\n';
    writeFileSync(kitPath, original);
    const failure = new NetworkError('Tracker feed responds code=503', 'https://feed.example.test/trackers', 503);

    const summary = await importerFor(new FailingFeed(failure)).importAndMerge();

    expect(summary).toEqual({
      status: 'aborted',
      reason: 'Tracker feed responds code=503',
      decisions: [],
      appended: [],
      dryRun: false
    });
    expect(readFileSync(kitPath, 'utf-8')).toBe(original);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  test('should propagate a malformed payload as ConfigError', async () => {
    writeFileSync(kitPath, '');

    const importer = importerFor(new FailingFeed(new ConfigError('Unexpected tracker list', 'feed')));

    await expect(importer.importAndMerge()).rejects.toThrow(ConfigError);
    expect(readFileSync(kitPath, 'utf-8')).toBe('');
  });

  test('should fail before fetching when the kit catalog is malformed', async () => {
    writeFileSync(kitPath, 'foo:\n  description: no pattern\n');
    const feed = new StaticFeed([{ name: 'Foo', code_signature: 'a.b' }]);

    await expect(importerFor(feed).importAndMerge()).rejects.toThrow(ConfigError);
    expect(feed.calls).toBe(0);
  });
});
