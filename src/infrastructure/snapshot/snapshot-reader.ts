import path from 'path';
import { z } from 'zod';
import { Result, err, ok } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { DirEntry, SplitFileSystemPort } from '../fs/fs.port.js';
import type { Milestone } from '../../domain/splits/milestones.js';
import { rankOf } from '../../domain/splits/milestones.js';
import { canonicalMilestone } from '../../domain/splits/snapshot-aliases.js';
import type { DetectedEvent } from '../../domain/splits/detected-event.js';
import { DetectedEvents } from '../../domain/splits/detected-event.js';

export type SplitTimes = ReadonlyMap<Milestone, number>;

export interface SnapshotObservation {
  readonly filePath: string;
  readonly mtimeMs: number;
  readonly splits: SplitTimes;
}

export type SnapshotParseError =
  | { readonly _tag: 'EmptySnapshot' }
  | { readonly _tag: 'MalformedJson'; readonly message: string }
  | { readonly _tag: 'UnexpectedShape'; readonly message: string }
  | { readonly _tag: 'NoRecognizedSplits' };

export interface SnapshotReaderConfig {
  /** Base names of snapshot files, matched exactly. */
  readonly fileNames: readonly string[];
  /** Directory levels below the search root to descend. */
  readonly maxDepth: number;
  /** Directory names never descended into (world data, game assets). */
  readonly skipDirectories: readonly string[];
}

const DEFAULT_CONFIG: SnapshotReaderConfig = {
  fileNames: ['record.json', 'latest_world'],
  maxDepth: 4,
  skipDirectories: [
    'region', 'DIM-1', 'DIM1', 'data', 'entities', 'poi', 'playerdata', 'stats', 'advancements',
    'logs', 'crash-reports', 'mods', 'resourcepacks', 'shaderpacks', 'screenshots', 'assets',
    'libraries', 'versions', 'natives',
  ],
};

// =============================================================================
// Schemas
// =============================================================================

const TimelineSchema = z.object({
  name: z.string(),
  igt: z.number().finite().nonnegative(),
});

const RecordSchema = z.object({
  timelines: z.array(z.unknown()),
  is_completed: z.boolean().optional(),
  final_igt: z.number().finite().optional(),
});

const FlatSchema = z.record(z.unknown());

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e): SnapshotParseError => ({ _tag: 'MalformedJson', message: e instanceof Error ? e.message : String(e) }),
);

function keepEarliest(splits: Map<Milestone, number>, rawName: string, elapsedMs: number): void {
  const milestone = canonicalMilestone(rawName);
  if (milestone === null) return;
  const existing = splits.get(milestone);
  if (existing === undefined || elapsedMs < existing) {
    splits.set(milestone, elapsedMs);
  }
}

function fromRecord(record: z.infer<typeof RecordSchema>): Map<Milestone, number> {
  const splits = new Map<Milestone, number>();
  for (const entry of record.timelines) {
    const timeline = TimelineSchema.safeParse(entry);
    if (timeline.success) {
      keepEarliest(splits, timeline.data.name, timeline.data.igt);
    }
  }
  keepCompletion(splits, record.is_completed, record.final_igt);
  return splits;
}

/** The final time counts as a finish only on a record marked completed. */
function keepCompletion(splits: Map<Milestone, number>, isCompleted: unknown, finalIgt: unknown): void {
  if (isCompleted === true && typeof finalIgt === 'number' && Number.isFinite(finalIgt) && finalIgt > 0) {
    keepEarliest(splits, 'finish', finalIgt);
  }
}

function fromFlat(flat: Record<string, unknown>): Map<Milestone, number> {
  const splits = new Map<Milestone, number>();
  for (const [key, value] of Object.entries(flat)) {
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
      keepEarliest(splits, key, value);
    }
  }
  keepCompletion(splits, flat['is_completed'], flat['final_igt']);
  return splits;
}

/**
 * Parse snapshot text into milestone → elapsed ms.
 *
 * Accepts a timer-mod record (`timelines` array) or a flat object of split
 * names. Unknown names are dropped; zero recognized splits is an error so
 * callers treat it as "no data".
 */
export function parseSnapshot(text: string): Result<SplitTimes, SnapshotParseError> {
  if (text.trim().length === 0) return err({ _tag: 'EmptySnapshot' });

  return parseJson(text).andThen(interpretJson).andThen(requireSplits);
}

function interpretJson(json: unknown): Result<Map<Milestone, number>, SnapshotParseError> {
  const record = RecordSchema.safeParse(json);
  if (record.success) return ok(fromRecord(record.data));

  const flat = FlatSchema.safeParse(json);
  if (flat.success) return ok(fromFlat(flat.data));

  return err({ _tag: 'UnexpectedShape', message: flat.error.errors.map((e) => e.message).join('; ') });
}

function requireSplits(splits: Map<Milestone, number>): Result<SplitTimes, SnapshotParseError> {
  return splits.size === 0 ? err({ _tag: 'NoRecognizedSplits' }) : ok(splits);
}

/**
 * Snapshot events for one observation: an advance to the furthest split,
 * then an enrich per split. The machine keeps only what applies.
 */
export function toSnapshotEvents(splits: SplitTimes, observedAtMs: number): DetectedEvent[] {
  const ordered = [...splits.entries()].sort(([a], [b]) => rankOf(a) - rankOf(b));
  const furthest = ordered[ordered.length - 1];
  if (furthest === undefined) return [];

  const [milestone, elapsedMs] = furthest;
  return [
    DetectedEvents.snapshotAdvance(milestone, elapsedMs, observedAtMs),
    ...ordered.map(([m, t]) => DetectedEvents.enrich(m, t, observedAtMs)),
  ];
}

// =============================================================================
// Reader
// =============================================================================

interface Candidate {
  readonly filePath: string;
  readonly mtimeMs: number;
}

/**
 * Finds the most recently modified snapshot file under a search root and
 * parses it. Any failure, including a half-written file, is "no data".
 */
export class SnapshotReader {
  private readonly config: SnapshotReaderConfig;

  constructor(
    readonly searchRoot: string,
    private readonly fs: SplitFileSystemPort,
    private readonly logger: Logger,
    config: Partial<SnapshotReaderConfig> = {},
  ) {
    this.config = Object.freeze({ ...DEFAULT_CONFIG, ...config });
  }

  /**
   * @param cutoffMs files last modified before this are skipped (previous run)
   */
  async read(cutoffMs: number | null = null): Promise<SnapshotObservation | null> {
    const newest = await this.findNewest();
    if (!newest) return null;

    if (cutoffMs !== null && newest.mtimeMs < cutoffMs) {
      this.logger.debug({ filePath: newest.filePath, mtimeMs: newest.mtimeMs, cutoffMs }, 'Snapshot predates current run, ignoring');
      return null;
    }

    const text = await this.fs.readFileUtf8(newest.filePath);
    if (text.isErr()) {
      this.logger.debug({ filePath: newest.filePath, error: text.error.message }, 'Snapshot read failed, no data this cycle');
      return null;
    }

    const parsed = parseSnapshot(text.value);
    if (parsed.isErr()) {
      this.logger.debug({ filePath: newest.filePath, reason: parsed.error._tag }, 'Snapshot unusable, no data this cycle');
      return null;
    }

    return { filePath: newest.filePath, mtimeMs: newest.mtimeMs, splits: parsed.value };
  }

  async findNewest(): Promise<Candidate | null> {
    const found = await this.collect(this.searchRoot, 0);
    return found.reduce<Candidate | null>((best, c) => (best === null || c.mtimeMs > best.mtimeMs ? c : best), null);
  }

  /** Siblings are visited concurrently; results are flattened in listing order. */
  private async collect(dir: string, depth: number): Promise<Candidate[]> {
    const listing = await this.fs.readdir(dir);
    if (listing.isErr()) return [];

    const nested = await Promise.all(listing.value.map((entry) => this.visit(dir, entry, depth)));
    return nested.flat();
  }

  private async visit(dir: string, entry: DirEntry, depth: number): Promise<Candidate[]> {
    const entryPath = path.join(dir, entry.name);
    if (entry.isFile && this.config.fileNames.includes(entry.name)) {
      const stat = await this.fs.stat(entryPath);
      return stat.isOk() ? [{ filePath: entryPath, mtimeMs: stat.value.mtimeMs }] : [];
    }
    if (entry.isDirectory && depth < this.config.maxDepth && !this.config.skipDirectories.includes(entry.name)) {
      return this.collect(entryPath, depth + 1);
    }
    return [];
  }
}
