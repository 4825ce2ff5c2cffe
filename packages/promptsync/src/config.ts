/**
 * Configuration loading and resolution.
 *
 * The repository config is resolved once, by the CLI entry point, in this
 * order: explicit flags <- environment (AGENT_REPO_URL, AGENTS_DIR) <- user
 * config file (~/.promptsync.yml) <- built-in defaults. Core modules receive
 * the resolved RepositoryConfig and never read the environment themselves.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { parse as parseYaml } from 'yaml';

import { DEFAULT_EXPORT_EXCLUDE } from './export.js';
import { getDefaultAgentsDir, resolveUserPath } from './paths.js';
import type { ExportOptions, PromptSyncConfigFile, RepositoryConfig } from './types.js';
import { ConfigurationError, errorMessage } from './types.js';

export const CONFIG_FILENAME = '.promptsync.yml';

/** Environment variable naming the remote repository URL. */
export const ENV_REPO_URL = 'AGENT_REPO_URL';

/** Environment variable naming the local agents directory. */
export const ENV_AGENTS_DIR = 'AGENTS_DIR';

/** Overrides the directory holding the user config file (used by tests). */
export const ENV_CONFIG_HOME = 'PROMPTSYNC_HOME';

/** Default export target: the user-level agent directory, ~/.claude/agents. */
export function getDefaultExportTarget(): string {
  return join(homedir(), '.claude', 'agents');
}

/** Get the user config file path (~/.promptsync.yml). */
export function getGlobalConfigPath(env: NodeJS.ProcessEnv): string {
  const home = env[ENV_CONFIG_HOME] ?? homedir();
  return join(home, CONFIG_FILENAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((entry) => typeof entry === 'string');
}

const TOP_LEVEL_KEYS = new Set(['remote_url', 'directory', 'export']);
const EXPORT_KEYS = new Set(['target', 'exclude', 'tools', 'rename']);

function checkKeys(record: Record<string, unknown>, allowed: Set<string>, where: string): void {
  for (const key of Object.keys(record)) {
    if (!allowed.has(key)) {
      throw new ConfigurationError(`Unknown key "${key}" in ${where}`, [
        `Allowed keys: ${[...allowed].join(', ')}`,
      ]);
    }
  }
}

function expectString(value: unknown, key: string, filePath: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`Invalid "${key}" in ${filePath}: expected a string`);
  }
  return value;
}

/** Check field types and build the typed config. */
export function validateConfig(parsed: Record<string, unknown>, filePath: string): PromptSyncConfigFile {
  checkKeys(parsed, TOP_LEVEL_KEYS, filePath);

  const config: PromptSyncConfigFile = {
    remote_url: expectString(parsed.remote_url, 'remote_url', filePath),
    directory: expectString(parsed.directory, 'directory', filePath),
  };

  const exportSection = parsed.export;
  if (exportSection === undefined || exportSection === null) {
    return config;
  }
  if (!isRecord(exportSection)) {
    throw new ConfigurationError(`Invalid "export" in ${filePath}: expected an object`);
  }
  checkKeys(exportSection, EXPORT_KEYS, `"export" in ${filePath}`);

  const { exclude, rename } = exportSection;
  if (exclude !== undefined && !isStringArray(exclude)) {
    throw new ConfigurationError(`Invalid "export.exclude" in ${filePath}: expected a list of globs`);
  }
  if (rename !== undefined && !isStringRecord(rename)) {
    throw new ConfigurationError(
      `Invalid "export.rename" in ${filePath}: expected a map of agent names`,
    );
  }

  config.export = {
    target: expectString(exportSection.target, 'export.target', filePath),
    tools: expectString(exportSection.tools, 'export.tools', filePath),
    exclude,
    rename,
  };
  return config;
}

/** Parse a single config file. */
export async function loadConfigFile(filePath: string): Promise<PromptSyncConfigFile> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file: ${filePath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigurationError(
      `Malformed YAML in config file: ${filePath}: ${errorMessage(err)}`,
      [`Check that ${filePath} contains valid YAML.`],
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Invalid config file (not an object): ${filePath}`);
  }

  return validateConfig(parsed, filePath);
}

/**
 * Load the user config. An explicit path must exist; the default path is
 * optional.
 */
export async function loadUserConfig(
  env: NodeJS.ProcessEnv,
  explicitPath?: string,
): Promise<PromptSyncConfigFile> {
  if (explicitPath) {
    return loadConfigFile(resolveUserPath(explicitPath));
  }
  const globalPath = getGlobalConfigPath(env);
  if (!existsSync(globalPath)) {
    return {};
  }
  return loadConfigFile(globalPath);
}

export interface ConfigOverrides {
  repo?: string | undefined;
  dir?: string | undefined;
}

function firstNonEmpty(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value.length > 0);
}

/** Merge flags, environment and file settings into the repository config. */
export function resolveRepositoryConfig(
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv,
  fileConfig: PromptSyncConfigFile = {},
): RepositoryConfig {
  const remoteUrl =
    firstNonEmpty(overrides.repo, env[ENV_REPO_URL], fileConfig.remote_url) ?? '';
  const directory = firstNonEmpty(overrides.dir, env[ENV_AGENTS_DIR], fileConfig.directory);
  return {
    remoteUrl,
    localDirectory: directory ? resolveUserPath(directory) : getDefaultAgentsDir(),
  };
}

export interface ExportOverrides {
  target?: string | undefined;
  clean?: boolean | undefined;
  dryRun?: boolean | undefined;
}

/** Merge export flags with the `export` section of the config file. */
export function resolveExportOptions(
  overrides: ExportOverrides,
  fileConfig: PromptSyncConfigFile = {},
): ExportOptions {
  const section = fileConfig.export ?? {};
  const target = firstNonEmpty(overrides.target, section.target);
  return {
    targetDirectory: target ? resolveUserPath(target) : getDefaultExportTarget(),
    exclude: section.exclude ?? DEFAULT_EXPORT_EXCLUDE,
    tools: section.tools,
    rename: section.rename,
    clean: overrides.clean ?? false,
    dryRun: overrides.dryRun ?? false,
  };
}
