/**
 * Backup rotation.
 *
 * A snapshot is a directory `.backups/backup_<YYYYMMDD_HHMMSS>` holding copies
 * of the top-level content files. Snapshot names sort in creation order, so
 * retention keeps the last MAX_BACKUPS names and deletes the rest.
 */

import type { Dirent } from 'node:fs';
import { copyFile, mkdir, readdir, rm, stat, utimes } from 'node:fs/promises';
import { basename, join } from 'node:path';

import { ensureDir, isErrnoException, pathExists } from './fs-utils.js';
import { getBackupRoot, listContentFiles } from './paths.js';
import { formatSnapshotTimestamp } from './timestamp.js';
import type { BackupSnapshot } from './types.js';
import { BACKUP_PREFIX, FilesystemError, MAX_BACKUPS, errorMessage } from './types.js';

/** Upper bound on same-second suffixes before giving up. */
const MAX_NAME_ATTEMPTS = 100;

export interface BackupOptions {
  /** Time stamped into the snapshot name (default: now) */
  timestamp?: Date | undefined;
  /** Snapshots kept after rotation (default: MAX_BACKUPS) */
  keep?: number | undefined;
}

/**
 * Copy every content file into a new snapshot, then prune old snapshots.
 * Throws FilesystemError on any mkdir, copy or delete failure.
 */
export async function createBackup(
  localDirectory: string,
  options: BackupOptions = {},
): Promise<BackupSnapshot> {
  const backupRoot = getBackupRoot(localDirectory);
  const timestamp = formatSnapshotTimestamp(options.timestamp ?? new Date());

  try {
    // Never create the local directory: a first clone needs it absent or empty.
    if (!(await pathExists(localDirectory))) {
      throw new FilesystemError(`Backup failed: ${localDirectory} does not exist`, [
        'Run `promptsync sync` to clone the repository first.',
      ]);
    }
    await ensureDir(backupRoot);
    const directoryPath = await createSnapshotDir(backupRoot, `${BACKUP_PREFIX}${timestamp}`);

    for (const file of await listContentFiles(localDirectory)) {
      await copyPreservingTimes(file, join(directoryPath, basename(file)));
    }

    await pruneBackups(backupRoot, options.keep ?? MAX_BACKUPS);
    return { timestamp, directoryPath };
  } catch (error) {
    if (error instanceof FilesystemError) {
      throw error;
    }
    throw new FilesystemError(`Backup failed: ${errorMessage(error)}`);
  }
}

/**
 * Create a uniquely named snapshot directory. A second backup within the same
 * second gets a zero-padded suffix ("_01"), which still sorts after the
 * unsuffixed name and before the next second.
 */
async function createSnapshotDir(backupRoot: string, baseName: string): Promise<string> {
  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
    const name = attempt === 0 ? baseName : `${baseName}_${String(attempt).padStart(2, '0')}`;
    const dirPath = join(backupRoot, name);
    try {
      await mkdir(dirPath);
      return dirPath;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        continue;
      }
      throw error;
    }
  }
  throw new FilesystemError(`Too many backups within one second: ${baseName}`);
}

async function copyPreservingTimes(source: string, destination: string): Promise<void> {
  await copyFile(source, destination);
  const stats = await stat(source);
  await utimes(destination, stats.atime, stats.mtime);
}

/** Snapshot directory names under the backup root, oldest first. */
export async function listBackups(backupRoot: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(backupRoot, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
  return entries
    .filter((entry) => entry.isDirectory() && entry.name.startsWith(BACKUP_PREFIX))
    .map((entry) => entry.name)
    .sort();
}

/** Delete every snapshot beyond the `keep` most recent. Returns removed paths. */
export async function pruneBackups(backupRoot: string, keep: number): Promise<string[]> {
  const names = await listBackups(backupRoot);
  const excess = names.slice(0, Math.max(0, names.length - keep));
  const removed: string[] = [];
  for (const name of excess) {
    const dirPath = join(backupRoot, name);
    await rm(dirPath, { recursive: true, force: true });
    removed.push(dirPath);
  }
  return removed;
}
