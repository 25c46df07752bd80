import path from 'path';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { SplitFileSystemPort } from '../fs/fs.port.js';
import type { LogNotFoundError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';

export interface DiscoveryEnv {
  readonly homeDir: string;
  readonly platform: NodeJS.Platform;
  /** `%APPDATA%` on Windows. */
  readonly appData?: string;
}

export interface LatestLog {
  readonly logFile: string;
  /** The game directory the log belongs to (parent of `logs/`). */
  readonly gameDir: string;
  readonly mtimeMs: number;
}

const LOG_RELATIVE = path.join('logs', 'latest.log');

/** Directory names a launcher instance keeps its game directory under. */
const INSTANCE_GAME_DIRS = ['.minecraft', 'minecraft'];

/**
 * Plausible game directories and launcher instance roots, most likely first
 * for the platform.
 */
export function candidateMinecraftDirs(env: DiscoveryEnv): string[] {
  const home = env.homeDir;
  const appData = env.appData ?? path.join(home, 'AppData', 'Roaming');

  const vanilla = {
    win32: path.join(appData, '.minecraft'),
    darwin: path.join(home, 'Library', 'Application Support', 'minecraft'),
    linux: path.join(home, '.minecraft'),
  };
  const own =
    env.platform === 'win32' ? vanilla.win32 : env.platform === 'darwin' ? vanilla.darwin : vanilla.linux;

  const candidates = [
    own,
    vanilla.win32,
    vanilla.darwin,
    vanilla.linux,
    path.join(home, 'MultiMC', 'instances'),
    path.join(appData, 'PrismLauncher', 'instances'),
    path.join(home, '.local', 'share', 'PrismLauncher', 'instances'),
    path.join(home, 'Library', 'Application Support', 'PrismLauncher', 'instances'),
    path.join(home, 'Desktop', 'MCSR'),
  ];
  return [...new Set(candidates)];
}

/** First candidate directory that exists, or null. */
export async function findMinecraftDir(
  fs: SplitFileSystemPort,
  env: DiscoveryEnv,
): Promise<string | null> {
  for (const dir of candidateMinecraftDirs(env)) {
    const listing = await fs.readdir(dir);
    if (listing.isOk()) return dir;
  }
  return null;
}

function statLog(fs: SplitFileSystemPort, gameDir: string): Promise<LatestLog | null> {
  const logFile = path.join(gameDir, LOG_RELATIVE);
  return fs.stat(logFile).match(
    (stat) => ({ logFile, gameDir, mtimeMs: stat.mtimeMs }),
    () => null,
  );
}

async function newestInstanceLog(fs: SplitFileSystemPort, root: string): Promise<LatestLog | null> {
  const listing = await fs.readdir(root);
  if (listing.isErr()) return null;

  const found: LatestLog[] = [];
  for (const entry of listing.value) {
    if (!entry.isDirectory) continue;
    for (const gameDirName of INSTANCE_GAME_DIRS) {
      const log = await statLog(fs, path.join(root, entry.name, gameDirName));
      if (log) found.push(log);
    }
  }
  return found.reduce<LatestLog | null>((best, log) => (best === null || log.mtimeMs > best.mtimeMs ? log : best), null);
}

/**
 * `root/logs/latest.log` if present; otherwise treat `root` as a launcher
 * instance directory and take the most recently written instance log.
 */
export function findLatestLog(fs: SplitFileSystemPort, root: string): ResultAsync<LatestLog, LogNotFoundError> {
  const lookup = async (): Promise<LatestLog | null> => (await statLog(fs, root)) ?? newestInstanceLog(fs, root);

  return ResultAsync.fromSafePromise(lookup()).andThen((log): ResultAsync<LatestLog, LogNotFoundError> =>
    log ? okAsync(log) : errAsync(Err.logNotFound([path.join(root, LOG_RELATIVE), path.join(root, '*', '.minecraft', LOG_RELATIVE)])),
  );
}

/**
 * Log and snapshot locations for a tracking session: explicit paths win,
 * then the given game directory, then auto-detection.
 */
export interface TrackingPaths {
  readonly logFile: string;
  readonly snapshotRoot: string;
}

export interface ResolvePathsInput {
  readonly minecraftDir: string | null;
  readonly logFile: string | null;
  readonly snapshotRoot: string | null;
}

export function resolveTrackingPaths(
  fs: SplitFileSystemPort,
  env: DiscoveryEnv,
  input: ResolvePathsInput,
): ResultAsync<TrackingPaths, LogNotFoundError> {
  const explicitLog = input.logFile;
  if (explicitLog !== null) {
    const snapshotRoot = input.snapshotRoot ?? input.minecraftDir ?? path.dirname(path.dirname(explicitLog));
    return okAsync({ logFile: explicitLog, snapshotRoot });
  }

  const root = input.minecraftDir;
  const rootResult: ResultAsync<string, LogNotFoundError> =
    root !== null
      ? okAsync(root)
      : ResultAsync.fromSafePromise(findMinecraftDir(fs, env)).andThen((dir): ResultAsync<string, LogNotFoundError> =>
          dir !== null ? okAsync(dir) : errAsync(Err.logNotFound(candidateMinecraftDirs(env))),
        );

  return rootResult.andThen((dir) =>
    findLatestLog(fs, dir).map((log) => ({
      logFile: log.logFile,
      snapshotRoot: input.snapshotRoot ?? log.gameDir,
    })),
  );
}
