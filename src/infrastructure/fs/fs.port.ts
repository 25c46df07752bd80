import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_IO_ERROR'; readonly message: string };

export interface FileStat {
  readonly sizeBytes: number;
  readonly mtimeMs: number;
  /**
   * `dev:ino` of the file, or null where the platform reports no inode.
   * A change means the path now names a different file (rotation).
   */
  readonly identity: string | null;
}

export interface DirEntry {
  readonly name: string;
  readonly isDirectory: boolean;
  readonly isFile: boolean;
}

/**
 * Port: the read-only file access both split readers need.
 * Every failure is data; nothing here throws.
 */
export interface SplitFileSystemPort {
  stat(filePath: string): ResultAsync<FileStat, FsError>;

  /** Bytes in `[start, end)`. Returns fewer bytes if the file shrank meanwhile. */
  readRange(filePath: string, start: number, end: number): ResultAsync<Uint8Array, FsError>;

  readFileUtf8(filePath: string): ResultAsync<string, FsError>;

  readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError>;
}
