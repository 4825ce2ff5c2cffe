/**
 * Command handlers for the promptsync CLI.
 *
 * Each handler takes a SyncManager, prints human-readable results to stdout,
 * and returns the process exit code. Diagnostics go to stderr.
 */

import type { Command } from 'commander';

import { loadUserConfig, resolveExportOptions, resolveRepositoryConfig } from './config.js';
import type { ColorMode } from './format.js';
import {
  formatAgent,
  formatCount,
  formatError,
  formatFailure,
  formatHeading,
  formatHint,
  formatStatus,
  formatSuccess,
  initColors,
} from './format.js';
import { createConsoleLogger } from './logger.js';
import { SyncManager } from './sync-manager.js';
import type { PromptSyncConfigFile } from './types.js';
import { ConfigurationError } from './types.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/** Global CLI options shared across all commands. */
export interface GlobalOptions {
  repo?: string | undefined;
  dir?: string | undefined;
  config?: string | undefined;
  quiet: boolean;
  verbose: boolean;
  color: ColorMode;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function parseColorMode(value: unknown): ColorMode {
  if (value === undefined || value === 'auto') {
    return 'auto';
  }
  if (value === 'always' || value === 'never') {
    return value;
  }
  throw new ConfigurationError(`Invalid --color value: ${String(value)}`, [
    'Use one of: auto, always, never',
  ]);
}

export function getGlobalOpts(cmd: Command): GlobalOptions {
  const root = cmd.parent ?? cmd;
  const opts = root.opts();
  return {
    repo: optionalString(opts.repo),
    dir: optionalString(opts.dir),
    config: optionalString(opts.config),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    color: parseColorMode(opts.color),
  };
}

export interface CommandContext {
  manager: SyncManager;
  fileConfig: PromptSyncConfigFile;
}

/**
 * Resolve configuration from flags, the environment and the user config file,
 * and build the manager. This is the only place the environment is read.
 */
export async function createContext(globalOpts: GlobalOptions): Promise<CommandContext> {
  if (globalOpts.quiet && globalOpts.verbose) {
    throw new ConfigurationError('--quiet and --verbose cannot be used together.');
  }
  initColors(globalOpts.color);
  const fileConfig = await loadUserConfig(process.env, globalOpts.config);
  const config = resolveRepositoryConfig(
    { repo: globalOpts.repo, dir: globalOpts.dir },
    process.env,
    fileConfig,
  );
  const logger = createConsoleLogger({ quiet: globalOpts.quiet, verbose: globalOpts.verbose });
  return { manager: new SyncManager(config, { logger }), fileConfig };
}

export async function handleSync(manager: SyncManager, force: boolean): Promise<number> {
  const result = await manager.sync(force);
  if (!result.success) {
    console.log(formatFailure('Sync failed.'));
    if (result.error) {
      console.error(formatError(result.error));
    }
    return EXIT_FAILURE;
  }

  console.log(
    formatSuccess(`Sync successful. ${formatCount(result.changedFiles.length, 'file')} changed.`),
  );
  if (result.changedFiles.length > 0) {
    console.log('Changed files:');
    for (const file of result.changedFiles) {
      console.log(`  - ${file}`);
    }
  }
  return EXIT_SUCCESS;
}

export async function handleStatus(manager: SyncManager): Promise<number> {
  const status = await manager.getStatus();
  console.log(formatHeading('Agent Repository Status'));
  for (const line of formatStatus(status)) {
    console.log(line);
  }
  return EXIT_SUCCESS;
}

export async function handleList(manager: SyncManager): Promise<number> {
  const agents = await manager.listAgents();
  if (agents.length === 0) {
    console.log('No agents found.');
    return EXIT_SUCCESS;
  }
  console.log(formatHeading('Available Agents'));
  for (const agent of agents) {
    console.log('');
    console.log(formatAgent(agent));
  }
  return EXIT_SUCCESS;
}

export async function handleGet(manager: SyncManager, name: string): Promise<number> {
  const content = await manager.getAgent(name);
  if (content === undefined) {
    console.log(formatFailure(`Agent '${name}' not found.`));
    return EXIT_FAILURE;
  }
  console.log(content);
  return EXIT_SUCCESS;
}

export async function handleBackup(manager: SyncManager): Promise<number> {
  const result = await manager.backup();
  if (!result.ok) {
    console.log(formatFailure('Backup failed.'));
    return EXIT_FAILURE;
  }
  console.log(formatSuccess(`Backup created: ${result.value.directoryPath}`));
  return EXIT_SUCCESS;
}

export interface ExportCommandOptions {
  target?: string | undefined;
  clean?: boolean | undefined;
  dryRun?: boolean | undefined;
}

export async function handleExport(
  context: CommandContext,
  opts: ExportCommandOptions,
): Promise<number> {
  const options = resolveExportOptions(opts, context.fileConfig);
  const result = await context.manager.exportAgents(options);
  if (!result.ok) {
    console.log(formatFailure('Export failed.'));
    console.error(formatError(result.error));
    return EXIT_FAILURE;
  }

  const { written, skipped, targetDirectory } = result.value;
  const verb = options.dryRun ? 'Would export' : 'Exported';
  console.log(formatSuccess(`${verb} ${formatCount(written.length, 'agent')} to ${targetDirectory}`));
  if (skipped.length > 0) {
    console.log(formatHint(`Skipped: ${skipped.join(', ')}`));
  }
  return EXIT_SUCCESS;
}
