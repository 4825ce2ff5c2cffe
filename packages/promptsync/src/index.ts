/**
 * promptsync -- Keep a directory of agent prompts in sync with a git repository.
 *
 * Library exports for programmatic usage.
 */

export type {
  AgentDescriptor,
  BackupSnapshot,
  ErrorCategory,
  ExportOptions,
  ExportSummary,
  Logger,
  PromptSyncConfigFile,
  RepositoryConfig,
  RepositoryStatus,
  Result,
  SyncResult,
  VersionControlClient,
} from './types.js';

export {
  ConfigurationError,
  FilesystemError,
  PromptSyncError,
  TransportError,
  CONTENT_EXTENSION,
  MAX_BACKUPS,
} from './types.js';

export { SyncManager, symmetricDifference } from './sync-manager.js';
export type { SyncManagerOptions } from './sync-manager.js';
export { GitClient } from './git-client.js';
export { createBackup, listBackups, pruneBackups } from './backup.js';
export { extractRoleSummary, listAgents, readAgent } from './agents.js';
export { exportAgents, formatFrontmatter, toExportName } from './export.js';
export { readLastSync } from './sync-log.js';
export {
  loadConfigFile,
  loadUserConfig,
  resolveExportOptions,
  resolveRepositoryConfig,
} from './config.js';
export { createConsoleLogger } from './logger.js';
