/**
 * SyncManager: keeps a local directory of prompt files in step with a remote
 * git repository.
 *
 * Public operations never throw. Failures come back as a Result, a failed
 * SyncResult, an undefined value or `false`, with a diagnostic sent to the
 * injected logger. Deciding what to print and which exit code to use is left
 * to the caller.
 */

import { readAgent, listAgents } from './agents.js';
import { createBackup } from './backup.js';
import { exportAgents } from './export.js';
import { ensureDir, isErrnoException, pathExists } from './fs-utils.js';
import { GitClient } from './git-client.js';
import { createConsoleLogger } from './logger.js';
import { getGitDir, listContentFiles } from './paths.js';
import { appendLogEntry, readLastSync } from './sync-log.js';
import { formatLogTimestamp } from './timestamp.js';
import type {
  AgentDescriptor,
  BackupSnapshot,
  ExportOptions,
  ExportSummary,
  Logger,
  RepositoryConfig,
  RepositoryStatus,
  Result,
  SyncResult,
  VersionControlClient,
} from './types.js';
import {
  CANDIDATE_BRANCHES,
  ConfigurationError,
  FilesystemError,
  PromptSyncError,
  REMOTE_NAME,
  err,
  errorMessage,
  ok,
  toPromptSyncError,
} from './types.js';

export interface SyncManagerOptions {
  /** Version-control collaborator (default: git in the local directory) */
  client?: VersionControlClient | undefined;
  logger?: Logger | undefined;
  /** Source of "now" for snapshot names, log lines and stash messages */
  clock?: (() => Date) | undefined;
  /** Branch names tried in order for update checks and pulls */
  branches?: readonly string[] | undefined;
}

/** Paths present in exactly one of the two sets, sorted. */
export function symmetricDifference(before: Set<string>, after: Set<string>): string[] {
  const changed = new Set<string>();
  for (const path of before) {
    if (!after.has(path)) {
      changed.add(path);
    }
  }
  for (const path of after) {
    if (!before.has(path)) {
      changed.add(path);
    }
  }
  return [...changed].sort();
}

function failure(error: PromptSyncError): SyncResult {
  return { success: false, changedFiles: [], error };
}

export class SyncManager {
  readonly config: RepositoryConfig;
  private readonly client: VersionControlClient;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly branches: readonly string[];

  constructor(config: RepositoryConfig, options: SyncManagerOptions = {}) {
    this.config = config;
    this.client = options.client ?? new GitClient(config.localDirectory);
    this.logger = options.logger ?? createConsoleLogger();
    this.clock = options.clock ?? (() => new Date());
    this.branches = options.branches ?? CANDIDATE_BRANCHES;
  }

  /** True when the local directory holds version-control metadata. */
  async isInitialized(): Promise<boolean> {
    try {
      return await pathExists(getGitDir(this.config.localDirectory));
    } catch (error) {
      this.logger.debug(`Cannot inspect ${this.config.localDirectory}: ${errorMessage(error)}`);
      return false;
    }
  }

  /** Clone the remote into the local directory unless it is already a clone. */
  async ensureInitialized(): Promise<Result<void>> {
    if (await this.isInitialized()) {
      return ok(undefined);
    }
    if (!this.config.remoteUrl) {
      return err(
        new ConfigurationError('Repository URL not set.', [
          'Set the AGENT_REPO_URL environment variable or pass --repo <url>.',
        ]),
      );
    }

    try {
      await ensureDir(this.config.localDirectory);
    } catch (error) {
      return err(
        new FilesystemError(
          `Cannot create ${this.config.localDirectory}: ${errorMessage(error)}`,
        ),
      );
    }

    try {
      this.logger.debug(`Cloning ${this.config.remoteUrl} into ${this.config.localDirectory}`);
      await this.client.clone(this.config.remoteUrl, this.config.localDirectory);
    } catch (error) {
      return err(toPromptSyncError(error));
    }

    await this.log('Repository cloned successfully');
    return ok(undefined);
  }

  /**
   * Fetch, then count commits on the remote branch that HEAD lacks. Fails
   * open: any error is logged and reported as "no updates".
   */
  async hasUpdates(): Promise<boolean> {
    if (!(await this.isInitialized())) {
      return false;
    }
    try {
      await this.client.fetch(REMOTE_NAME);
      const { value: count } = await this.tryBranches((branch) =>
        this.client.revListCount(`HEAD..${REMOTE_NAME}/${branch}`),
      );
      return count > 0;
    } catch (error) {
      this.logger.warn(`Error checking for updates: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Pull the remote into the local directory.
   *
   * Uncommitted local changes block the sync unless `force` is set, in which
   * case they are backed up and stashed first. The changed-file list is the
   * symmetric difference of the tracked path sets before and after the pull,
   * so edits to existing files are not reported.
   */
  async sync(force = false): Promise<SyncResult> {
    try {
      return await this.runSync(force);
    } catch (error) {
      const syncError = toPromptSyncError(error);
      this.logger.error(`Error during sync: ${syncError.message}`);
      return failure(syncError);
    }
  }

  private async runSync(force: boolean): Promise<SyncResult> {
    const init = await this.ensureInitialized();
    if (!init.ok) {
      return failure(init.error);
    }

    const localChanges = await this.client.statusPorcelain();
    if (localChanges.length > 0) {
      if (!force) {
        return failure(
          new PromptSyncError(
            `Local changes detected (${localChanges.length} paths).`,
            'conflict',
            1,
            ['Run with --force to back up and stash them, or commit them first.'],
          ),
        );
      }
      await this.backup();
      await this.stashLocalChanges();
    }

    const before = await this.trackedFiles();

    try {
      const { branch } = await this.tryBranches((candidate) =>
        this.client.pull(REMOTE_NAME, candidate),
      );
      this.logger.debug(`Pulled ${REMOTE_NAME}/${branch}`);
    } catch (error) {
      return failure(toPromptSyncError(error));
    }

    const after = await this.trackedFiles();
    const changedFiles = symmetricDifference(before, after);
    await this.log(`Synced successfully. ${changedFiles.length} files changed.`);
    return { success: true, changedFiles };
  }

  private async stashLocalChanges(): Promise<void> {
    try {
      await this.client.stash(`Auto-stash ${formatLogTimestamp(this.clock())}`);
    } catch (error) {
      this.logger.warn(`Stash failed, continuing: ${errorMessage(error)}`);
    }
  }

  /** Tracked paths at HEAD; empty when the listing fails (e.g. no commits yet). */
  private async trackedFiles(): Promise<Set<string>> {
    try {
      return await this.client.listTrackedFiles();
    } catch (error) {
      this.logger.debug(`Cannot list tracked files: ${errorMessage(error)}`);
      return new Set();
    }
  }

  /** Run `operation` per candidate branch; the first success wins, else the last error is thrown. */
  private async tryBranches<T>(
    operation: (branch: string) => Promise<T>,
  ): Promise<{ branch: string; value: T }> {
    let lastError: unknown = new ConfigurationError('No candidate branches configured.');
    for (const branch of this.branches) {
      try {
        return { branch, value: await operation(branch) };
      } catch (error) {
        this.logger.debug(`Branch ${branch} failed: ${errorMessage(error)}`);
        lastError = error;
      }
    }
    throw lastError;
  }

  /** Snapshot the content files and rotate old snapshots. */
  async backup(): Promise<Result<BackupSnapshot, FilesystemError>> {
    try {
      const snapshot = await createBackup(this.config.localDirectory, {
        timestamp: this.clock(),
      });
      await this.log(`Backup created: ${snapshot.directoryPath}`);
      return ok(snapshot);
    } catch (error) {
      const backupError =
        error instanceof FilesystemError ? error : new FilesystemError(errorMessage(error));
      this.logger.warn(`Error creating backup: ${backupError.message}`);
      return err(backupError);
    }
  }

  async listAgents(): Promise<AgentDescriptor[]> {
    try {
      return await listAgents(this.config.localDirectory, this.logger);
    } catch (error) {
      if (!(isErrnoException(error) && error.code === 'ENOENT')) {
        this.logger.warn(`Error listing agents: ${errorMessage(error)}`);
      }
      return [];
    }
  }

  /** Full contents of an agent file, by name with or without extension. */
  async getAgent(name: string): Promise<string | undefined> {
    try {
      return await readAgent(this.config.localDirectory, name, this.logger);
    } catch (error) {
      this.logger.warn(`Error reading agent ${name}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /** Gather the status report. Each field is collected independently. */
  async getStatus(): Promise<RepositoryStatus> {
    const status: RepositoryStatus = {
      initialized: await this.isInitialized(),
      localDirectory: this.config.localDirectory,
      remoteUrl: this.config.remoteUrl,
      totalAgents: 0,
      lastSync: undefined,
      hasUpdates: false,
      localChanges: [],
    };

    try {
      status.totalAgents = (await listContentFiles(this.config.localDirectory)).length;
    } catch (error) {
      this.logger.debug(`Cannot count agents: ${errorMessage(error)}`);
    }

    if (!status.initialized) {
      return status;
    }

    try {
      status.lastSync = await readLastSync(this.config.localDirectory);
    } catch (error) {
      this.logger.debug(`Cannot read sync log: ${errorMessage(error)}`);
    }

    status.hasUpdates = await this.hasUpdates();

    try {
      status.localChanges = await this.client.statusPorcelain();
    } catch (error) {
      this.logger.debug(`Cannot read local changes: ${errorMessage(error)}`);
    }

    return status;
  }

  /** Copy prompts into another tool's agent directory. Not recorded in the sync log. */
  async exportAgents(options: ExportOptions): Promise<Result<ExportSummary>> {
    try {
      const summary = await exportAgents(this.config.localDirectory, options, this.logger);
      this.logger.debug(`Exported ${summary.written.length} agents to ${options.targetDirectory}`);
      return ok(summary);
    } catch (error) {
      return err(toPromptSyncError(error));
    }
  }

  /** Append to the sync log; a failed append is not an error. */
  private async log(message: string): Promise<void> {
    try {
      await appendLogEntry(this.config.localDirectory, message, this.clock());
    } catch (error) {
      this.logger.debug(`Cannot write sync log: ${errorMessage(error)}`);
    }
  }
}
