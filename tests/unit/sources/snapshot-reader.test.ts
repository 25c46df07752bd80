import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import path from 'path';
import { parseSnapshot, toSnapshotEvents, SnapshotReader } from '../../../src/infrastructure/snapshot/snapshot-reader.js';
import type { SnapshotReaderConfig } from '../../../src/infrastructure/snapshot/snapshot-reader.js';
import { canonicalMilestone } from '../../../src/domain/splits/snapshot-aliases.js';
import { DetectedEvents } from '../../../src/domain/splits/detected-event.js';
import { NodeFileSystem } from '../../../src/infrastructure/fs/node-file-system.js';
import type { DirEntry, FileStat, FsError, SplitFileSystemPort } from '../../../src/infrastructure/fs/fs.port.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { makeTempDir, setMtime, writeFileAt } from '../../helpers/temp-dir.js';

function parsedEntries(text: string): Array<[string, number]> | string {
  const result = parseSnapshot(text);
  return result.isOk() ? [...result.value.entries()] : result.error._tag;
}

describe('canonicalMilestone', () => {
  it('maps every spelling onto one milestone', () => {
    expect(canonicalMilestone('enter_nether')).toBe('nether');
    expect(canonicalMilestone('enterNether')).toBe('nether');
    expect(canonicalMilestone(' NETHER_TRAVEL ')).toBe('first_portal');
    expect(canonicalMilestone('kill_ender_dragon')).toBe('finish');
  });

  it('returns null for names it does not know', () => {
    expect(canonicalMilestone('pick_up_wood')).toBeNull();
  });
});

describe('parseSnapshot', () => {
  it('reads a flat object of split names', () => {
    expect(parsedEntries('{"nether": 145000, "bastion": 195000, "mystery": 5}')).toEqual([
      ['nether', 145_000],
      ['bastion', 195_000],
    ]);
  });

  it('reads a timer record with timelines and a completed flag', () => {
    const record = JSON.stringify({
      timelines: [
        { name: 'enter_nether', igt: 145_000 },
        { name: 'nether_travel', igt: 285_000 },
        { name: 'trade_with_piglin', igt: 150_000 },
      ],
      is_completed: true,
      final_igt: 490_000,
    });
    expect(parsedEntries(record)).toEqual([
      ['nether', 145_000],
      ['first_portal', 285_000],
      ['finish', 490_000],
    ]);
  });

  it('ignores final_igt while the run is not completed', () => {
    const record = JSON.stringify({ timelines: [{ name: 'enter_nether', igt: 145_000 }], is_completed: false, final_igt: 200_000 });
    expect(parsedEntries(record)).toEqual([['nether', 145_000]]);
  });

  it('ignores final_igt on an unfinished record without timelines', () => {
    expect(parsedEntries('{"final_igt": 300000, "is_completed": false, "nether": 100000}')).toEqual([['nether', 100_000]]);
    expect(parsedEntries('{"final_igt": 300000, "nether": 100000}')).toEqual([['nether', 100_000]]);
  });

  it('counts final_igt on a completed record without timelines', () => {
    expect(parsedEntries('{"final_igt": 300000, "is_completed": true, "nether": 100000}')).toEqual([
      ['nether', 100_000],
      ['finish', 300_000],
    ]);
  });

  it('keeps the earliest time when two names map to one split', () => {
    const record = JSON.stringify({
      timelines: [
        { name: 'enter_nether', igt: 150_000 },
        { name: 'nether', igt: 145_000 },
      ],
    });
    expect(parsedEntries(record)).toEqual([['nether', 145_000]]);
  });

  it('drops negative and non-numeric values', () => {
    expect(parsedEntries('{"nether": -5, "bastion": "soon", "fortress": 240000}')).toEqual([['fortress', 240_000]]);
  });

  it('treats unusable content as no data', () => {
    expect(parsedEntries('')).toBe('EmptySnapshot');
    expect(parsedEntries('   \n')).toBe('EmptySnapshot');
    expect(parsedEntries('{"nether": 14')).toBe('MalformedJson');
    expect(parsedEntries('[1, 2]')).toBe('UnexpectedShape');
    expect(parsedEntries('42')).toBe('UnexpectedShape');
    expect(parsedEntries('{"seed": 12345}')).toBe('NoRecognizedSplits');
  });
});

describe('toSnapshotEvents', () => {
  it('advances to the furthest split, then offers each time in split order', () => {
    const events = toSnapshotEvents(
      new Map([
        ['bastion', 195_000],
        ['nether', 145_000],
      ]),
      7,
    );
    expect(events).toEqual([
      DetectedEvents.snapshotAdvance('bastion', 195_000, 7),
      DetectedEvents.enrich('nether', 145_000, 7),
      DetectedEvents.enrich('bastion', 195_000, 7),
    ]);
  });

  it('has nothing to say about an empty map', () => {
    expect(toSnapshotEvents(new Map(), 7)).toEqual([]);
  });
});

const WORLDS = ['w1', 'w2', 'w3'];

/** Root lists three world directories; their listings wait for `releaseAll`. */
class GatedFileSystem implements SplitFileSystemPort {
  readonly listed: string[] = [];
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly root: string) {}

  readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError> {
    this.listed.push(dirPath);
    if (dirPath === this.root) {
      return okAsync<readonly DirEntry[], FsError>(WORLDS.map((name) => ({ name, isDirectory: true, isFile: false })));
    }
    return ResultAsync.fromSafePromise<readonly DirEntry[], FsError>(
      new Promise((resolve) => {
        this.waiting.push(() => resolve([{ name: 'record.json', isDirectory: false, isFile: true }]));
      }),
    );
  }

  stat(filePath: string): ResultAsync<FileStat, FsError> {
    const mtimeMs = filePath.includes('w2') ? 2_000 : 1_000;
    return okAsync<FileStat, FsError>({ sizeBytes: 10, mtimeMs, identity: null });
  }

  readFileUtf8(): ResultAsync<string, FsError> {
    return okAsync<string, FsError>('{"nether": 1}');
  }

  readRange(): ResultAsync<Uint8Array, FsError> {
    return errAsync<Uint8Array, FsError>({ code: 'FS_IO_ERROR', message: 'not used' });
  }

  releaseAll(): void {
    this.waiting.splice(0).forEach((release) => release());
  }
}

describe('SnapshotReader directory walk', () => {
  it('lists sibling directories without waiting on each other', async () => {
    const root = path.join('/', 'instances');
    const fs = new GatedFileSystem(root);
    const reader = new SnapshotReader(root, fs, new FakeLogger().logger);

    const newest = reader.findNewest();
    await vi.waitFor(() => expect(fs.listed).toHaveLength(4));
    fs.releaseAll();

    expect(await newest).toEqual({ filePath: path.join(root, 'w2', 'record.json'), mtimeMs: 2_000 });
  });
});

describe('SnapshotReader', () => {
  let root: string;
  let cleanup: () => void;
  let logger: FakeLogger;

  beforeEach(() => {
    ({ dir: root, cleanup } = makeTempDir('snapshot-reader'));
    logger = new FakeLogger();
  });

  afterEach(() => cleanup());

  const reader = (config: Partial<SnapshotReaderConfig> = {}) => new SnapshotReader(root, new NodeFileSystem(), logger.logger, config);

  it('returns null when no snapshot file exists', async () => {
    expect(await reader().read()).toBeNull();
  });

  it('picks the most recently modified file', async () => {
    const older = writeFileAt(root, ['instance-a', 'record.json'], '{"nether": 100000}');
    const newer = writeFileAt(root, ['instance-b', 'speedrunigt', 'latest_world'], '{"bastion": 195000}');
    setMtime(older, 1_600_000_000_000);
    setMtime(newer, 1_600_000_060_000);

    const observation = await reader().read();

    expect(observation?.filePath).toBe(newer);
    expect(observation?.mtimeMs).toBe(1_600_000_060_000);
    expect(observation ? [...observation.splits.entries()] : null).toEqual([['bastion', 195_000]]);
  });

  it('skips a file written before the cutoff', async () => {
    const file = writeFileAt(root, ['record.json'], '{"nether": 145000}');
    setMtime(file, 1_600_000_000_000);

    expect(await reader().read(1_600_000_000_001)).toBeNull();
    expect(await reader().read(1_600_000_000_000)).not.toBeNull();
  });

  it('treats a half-written newest file as no data', async () => {
    const file = writeFileAt(root, ['record.json'], '{"nether": 14');
    setMtime(file, 1_600_000_000_000);

    expect(await reader().read()).toBeNull();
    expect(logger.hasEntry('debug', 'Snapshot unusable')).toBe(true);
  });

  it('does not descend into world data directories or past the depth limit', async () => {
    writeFileAt(root, ['saves', 'world', 'region', 'record.json'], '{"nether": 1}');
    writeFileAt(root, ['a', 'b', 'c', 'record.json'], '{"nether": 2}');

    expect(await reader({ maxDepth: 2 }).read()).toBeNull();
    expect((await reader({ maxDepth: 3 }).read())?.filePath).toBe(path.join(root, 'a', 'b', 'c', 'record.json'));
  });

  it('matches only configured file names', async () => {
    writeFileAt(root, ['splits.json'], '{"nether": 1}');

    expect(await reader().read()).toBeNull();
    expect(await reader({ fileNames: ['splits.json'] }).read()).not.toBeNull();
  });
});
