import * as fs from 'fs/promises';
import { ResultAsync } from 'neverthrow';
import type { DirEntry, FileStat, FsError, SplitFileSystemPort } from './fs.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  const code = (e as { readonly code?: unknown }).code;
  return typeof code === 'string' ? code : undefined;
}

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

async function readBytes(filePath: string, start: number, end: number): Promise<Uint8Array> {
  const handle = await fs.open(filePath, 'r');
  try {
    const length = Math.max(0, end - start);
    const buffer = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      const { bytesRead } = await handle.read(buffer, filled, length - filled, start + filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return new Uint8Array(buffer.subarray(0, filled));
  } finally {
    await handle.close();
  }
}

export class NodeFileSystem implements SplitFileSystemPort {
  stat(filePath: string): ResultAsync<FileStat, FsError> {
    return ResultAsync.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath)).map((s) => ({
      sizeBytes: s.size,
      mtimeMs: s.mtimeMs,
      identity: s.ino === 0 ? null : `${s.dev}:${s.ino}`,
    }));
  }

  readRange(filePath: string, start: number, end: number): ResultAsync<Uint8Array, FsError> {
    return ResultAsync.fromPromise(readBytes(filePath, start, end), (e) => mapFsError(e, filePath));
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return ResultAsync.fromPromise(fs.readFile(filePath, 'utf8'), (e) => mapFsError(e, filePath));
  }

  readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError> {
    return ResultAsync.fromPromise(fs.readdir(dirPath, { withFileTypes: true }), (e) => mapFsError(e, dirPath)).map(
      (entries) =>
        entries.map((entry) => ({
          name: entry.name,
          isDirectory: entry.isDirectory(),
          isFile: entry.isFile(),
        })),
    );
  }
}
