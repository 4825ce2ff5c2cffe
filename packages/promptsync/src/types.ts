/**
 * Shared type definitions for promptsync.
 *
 * Central types, constants and error classes used across the codebase.
 */

/** Extension of a content file (one prompt/agent definition per file). */
export const CONTENT_EXTENSION = '.md';

/** Backup snapshots live here, relative to the local directory. */
export const BACKUP_DIR_NAME = '.backups';

/** Prefix of every snapshot directory name. */
export const BACKUP_PREFIX = 'backup_';

/** Number of snapshots kept after each backup. */
export const MAX_BACKUPS = 5;

/** Append-only sync log, relative to the local directory. */
export const LOG_FILE_NAME = '.sync.log';

/** Separator between timestamp and message in a log line. */
export const LOG_SEPARATOR = ' - ';

/** Remote name used for fetch and pull. */
export const REMOTE_NAME = 'origin';

/** Branches tried in order when fetching counts or pulling. */
export const CANDIDATE_BRANCHES = ['main', 'master'] as const;

/** Heading that introduces an agent's role description. */
export const ROLE_HEADING = '## Role';

/** Only this many leading lines are scanned for the role heading. */
export const ROLE_SCAN_LINES = 10;

/** Role summaries longer than this are truncated with an ellipsis. */
export const ROLE_SUMMARY_MAX_LENGTH = 100;

/** Role summary reported when a file has no role section. */
export const ROLE_UNAVAILABLE = 'No description available';

/** Remote repository and the local directory mirroring it. */
export interface RepositoryConfig {
  /** Remote URL to clone from (empty when not configured) */
  readonly remoteUrl: string;
  /** Absolute path of the local clone */
  readonly localDirectory: string;
}

/** Outcome of a single sync invocation. Not persisted. */
export interface SyncResult {
  success: boolean;
  /** Repo-relative paths added or removed by the pull, sorted */
  changedFiles: string[];
  /** Cause of failure, when success is false */
  error?: PromptSyncError | undefined;
}

/** A point-in-time copy of the content files. */
export interface BackupSnapshot {
  /** Sortable local timestamp, YYYYMMDD_HHMMSS */
  timestamp: string;
  directoryPath: string;
}

/** Read-only view over one content file, recomputed on every listing. */
export interface AgentDescriptor {
  /** File name without the content extension */
  name: string;
  filePath: string;
  sizeBytes: number;
  modifiedTime: Date;
  /** First line of the role section, or ROLE_UNAVAILABLE */
  roleSummary: string;
}

/** Composite, read-only status report. */
export interface RepositoryStatus {
  initialized: boolean;
  localDirectory: string;
  remoteUrl: string;
  totalAgents: number;
  /** Timestamp of the last log entry, absent when unknown */
  lastSync?: string | undefined;
  hasUpdates: boolean;
  /** Raw porcelain status lines */
  localChanges: string[];
}

/** Options for copying prompts into another tool's agent directory. */
export interface ExportOptions {
  targetDirectory: string;
  /** Glob patterns (matched against file names) to leave out */
  exclude?: string[] | undefined;
  /** Value of the `tools` frontmatter field, when set */
  tools?: string | undefined;
  /** Source agent name -> exported agent name */
  rename?: Record<string, string> | undefined;
  /** Remove existing content files from the target first */
  clean?: boolean | undefined;
  dryRun?: boolean | undefined;
}

export interface ExportSummary {
  targetDirectory: string;
  /** Exported file names, in the target directory */
  written: string[];
  /** Source file names left out by the exclusion patterns */
  skipped: string[];
}

/** Settings read from the user config file. */
export interface PromptSyncConfigFile {
  remote_url?: string | undefined;
  directory?: string | undefined;
  export?:
    | {
        target?: string | undefined;
        exclude?: string[] | undefined;
        tools?: string | undefined;
        rename?: Record<string, string> | undefined;
      }
    | undefined;
}

/** Diagnostic sink for the core. The CLI decides where messages go. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Capability set of the external version-control tool. Every method runs in
 * the local directory; a non-zero exit rejects with a TransportError.
 */
export interface VersionControlClient {
  clone(url: string, destination: string): Promise<void>;
  fetch(remoteName: string): Promise<void>;
  pull(remoteName: string, branch: string): Promise<void>;
  stash(message: string): Promise<void>;
  /** One line per locally modified path; empty when clean */
  statusPorcelain(): Promise<string[]>;
  /** Paths tracked at HEAD */
  listTrackedFiles(): Promise<Set<string>>;
  revListCount(range: string): Promise<number>;
}

export type Result<T, E = PromptSyncError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type ErrorCategory =
  | 'configuration'
  | 'transport'
  | 'filesystem'
  | 'conflict'
  | 'authentication'
  | 'not_found'
  | 'network'
  | 'unknown';

/** Structured error with category and optional troubleshooting. */
export class PromptSyncError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly exitCode = 1,
    public readonly suggestions?: string[],
  ) {
    super(message);
    this.name = 'PromptSyncError';
  }
}

/** Missing or malformed configuration, e.g. no remote URL. */
export class ConfigurationError extends PromptSyncError {
  constructor(message: string, suggestions?: string[]) {
    super(message, 'configuration', 1, suggestions);
    this.name = 'ConfigurationError';
  }
}

/**
 * A version-control invocation failed. The tool's own diagnostic text is
 * carried in the message unparsed.
 */
export class TransportError extends PromptSyncError {
  constructor(
    message: string,
    category: ErrorCategory = 'transport',
    public readonly exitStatus?: number,
    suggestions?: string[],
  ) {
    super(message, category, 1, suggestions);
    this.name = 'TransportError';
  }
}

/** Copy, mkdir or delete failed while writing snapshots or exports. */
export class FilesystemError extends PromptSyncError {
  constructor(message: string, suggestions?: string[]) {
    super(message, 'filesystem', 1, suggestions);
    this.name = 'FilesystemError';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wrap an unknown thrown value, keeping typed errors as they are. */
export function toPromptSyncError(error: unknown): PromptSyncError {
  if (error instanceof PromptSyncError) {
    return error;
  }
  return new PromptSyncError(errorMessage(error), 'unknown');
}
