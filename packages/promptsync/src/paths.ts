/**
 * Path resolution utilities.
 *
 * Handles home expansion, content-file naming and enumeration, and the
 * fixed locations of the backup root and sync log.
 */

import { readdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, isAbsolute, join, relative, resolve, sep } from 'node:path';

import { BACKUP_DIR_NAME, CONTENT_EXTENSION, LOG_FILE_NAME } from './types.js';

/** Default local directory when none is configured. */
export function getDefaultAgentsDir(): string {
  return join(homedir(), 'agents');
}

/** Expand a leading `~` to the user's home directory. */
export function expandHome(inputPath: string): string {
  if (inputPath === '~') {
    return homedir();
  }
  if (inputPath.startsWith('~/')) {
    return join(homedir(), inputPath.slice(2));
  }
  return inputPath;
}

/** Expand `~` and make the path absolute against cwd. */
export function resolveUserPath(inputPath: string): string {
  return resolve(expandHome(inputPath));
}

export function getBackupRoot(localDirectory: string): string {
  return join(localDirectory, BACKUP_DIR_NAME);
}

export function getLogPath(localDirectory: string): string {
  return join(localDirectory, LOG_FILE_NAME);
}

export function getGitDir(localDirectory: string): string {
  return join(localDirectory, '.git');
}

export function isContentFileName(fileName: string): boolean {
  return fileName.endsWith(CONTENT_EXTENSION) && fileName.length > CONTENT_EXTENSION.length;
}

/** Strip the content extension if present: "go-agent.md" -> "go-agent" */
export function stripContentExtension(fileName: string): string {
  if (fileName.endsWith(CONTENT_EXTENSION)) {
    return fileName.slice(0, -CONTENT_EXTENSION.length);
  }
  return fileName;
}

/**
 * Absolute paths of the top-level content files in a directory, sorted by
 * name. Subdirectories are not searched.
 */
export async function listContentFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isContentFileName(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(directory, name));
}

/**
 * Candidate paths for an agent name, in lookup order: the name with the
 * content extension appended, then the name as a literal file name. Names
 * that escape the directory yield no candidates.
 */
export function agentPathCandidates(directory: string, name: string): string[] {
  const root = resolve(directory);
  return [`${name}${CONTENT_EXTENSION}`, name]
    .map((candidate) => resolve(root, candidate))
    .filter((candidate) => isInside(root, candidate));
}

function isInside(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel.length > 0 && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/** Agent name of a content file path. */
export function agentName(filePath: string): string {
  return stripContentExtension(basename(filePath));
}
