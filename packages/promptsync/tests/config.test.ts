import { mkdtempSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  getDefaultExportTarget,
  getGlobalConfigPath,
  loadConfigFile,
  loadUserConfig,
  resolveExportOptions,
  resolveRepositoryConfig,
} from '../src/config.js';
import { DEFAULT_EXPORT_EXCLUDE } from '../src/export.js';
import { ConfigurationError } from '../src/types.js';

function tmpDir(): string {
  return mkdtempSync(join(tmpdir(), 'promptsync-config-test-'));
}

describe('loadConfigFile', () => {
  it('loads a valid config file', async () => {
    const dir = tmpDir();
    const configPath = join(dir, '.promptsync.yml');
    writeFileSync(
      configPath,
      `remote_url: https://example.com/prompts.git
directory: ~/prompts
export:
  target: /tmp/exported
  exclude: ["README*"]
  tools: Read, Grep
  rename:
    Go_Agent: golang
`,
    );

    expect(await loadConfigFile(configPath)).toEqual({
      remote_url: 'https://example.com/prompts.git',
      directory: '~/prompts',
      export: {
        target: '/tmp/exported',
        exclude: ['README*'],
        tools: 'Read, Grep',
        rename: { Go_Agent: 'golang' },
      },
    });
  });

  it('handles an empty config file', async () => {
    const configPath = join(tmpDir(), '.promptsync.yml');
    writeFileSync(configPath, '');
    expect(await loadConfigFile(configPath)).toEqual({});
  });

  it('rejects non-object YAML', async () => {
    const configPath = join(tmpDir(), '.promptsync.yml');
    writeFileSync(configPath, '"just a string"');
    await expect(loadConfigFile(configPath)).rejects.toThrow('not an object');
  });

  it('rejects unknown keys', async () => {
    const configPath = join(tmpDir(), '.promptsync.yml');
    writeFileSync(configPath, 'remote: https://example.com/prompts.git\n');
    await expect(loadConfigFile(configPath)).rejects.toThrow(
      `Unknown key "remote" in ${configPath}`,
    );
  });

  it('rejects fields of the wrong type', async () => {
    const configPath = join(tmpDir(), '.promptsync.yml');
    writeFileSync(configPath, 'export:\n  exclude: README.md\n');
    await expect(loadConfigFile(configPath)).rejects.toThrow(
      `Invalid "export.exclude" in ${configPath}: expected a list of globs`,
    );
  });

  it('reports malformed YAML as a configuration error', async () => {
    const configPath = join(tmpDir(), '.promptsync.yml');
    writeFileSync(configPath, 'remote_url: [unclosed\n');
    await expect(loadConfigFile(configPath)).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('loadUserConfig', () => {
  it('returns an empty config when the default file is absent', async () => {
    expect(await loadUserConfig({ PROMPTSYNC_HOME: tmpDir() })).toEqual({});
  });

  it('reads the file under PROMPTSYNC_HOME', async () => {
    const home = tmpDir();
    writeFileSync(join(home, '.promptsync.yml'), 'directory: /srv/agents\n');
    expect(await loadUserConfig({ PROMPTSYNC_HOME: home })).toEqual({
      remote_url: undefined,
      directory: '/srv/agents',
    });
  });

  it('requires an explicit path to exist', async () => {
    const missing = join(tmpDir(), 'nope.yml');
    await expect(loadUserConfig({}, missing)).rejects.toThrow('Cannot read config file');
  });
});

describe('getGlobalConfigPath', () => {
  it('respects PROMPTSYNC_HOME when set', () => {
    expect(getGlobalConfigPath({ PROMPTSYNC_HOME: '/cfg' })).toBe(join('/cfg', '.promptsync.yml'));
  });

  it('falls back to the home directory', () => {
    expect(getGlobalConfigPath({})).toBe(join(homedir(), '.promptsync.yml'));
  });
});

describe('resolveRepositoryConfig', () => {
  const fileConfig = { remote_url: 'https://example.com/file.git', directory: '/from/file' };
  const env = { AGENT_REPO_URL: 'https://example.com/env.git', AGENTS_DIR: '/from/env' };

  it('prefers flags over environment and file', () => {
    expect(
      resolveRepositoryConfig(
        { repo: 'https://example.com/flag.git', dir: '/from/flag' },
        env,
        fileConfig,
      ),
    ).toEqual({ remoteUrl: 'https://example.com/flag.git', localDirectory: resolve('/from/flag') });
  });

  it('prefers environment over file', () => {
    expect(resolveRepositoryConfig({}, env, fileConfig)).toEqual({
      remoteUrl: 'https://example.com/env.git',
      localDirectory: resolve('/from/env'),
    });
  });

  it('uses the file when nothing else is set, skipping empty values', () => {
    expect(resolveRepositoryConfig({ repo: '' }, { AGENT_REPO_URL: '' }, fileConfig)).toEqual({
      remoteUrl: 'https://example.com/file.git',
      localDirectory: resolve('/from/file'),
    });
  });

  it('falls back to an empty URL and ~/agents', () => {
    expect(resolveRepositoryConfig({}, {})).toEqual({
      remoteUrl: '',
      localDirectory: join(homedir(), 'agents'),
    });
  });

  it('expands a tilde in the directory', () => {
    expect(resolveRepositoryConfig({ dir: '~/prompts' }, {}).localDirectory).toBe(
      join(homedir(), 'prompts'),
    );
  });
});

describe('resolveExportOptions', () => {
  it('uses defaults without flags or config', () => {
    expect(resolveExportOptions({})).toEqual({
      targetDirectory: getDefaultExportTarget(),
      exclude: DEFAULT_EXPORT_EXCLUDE,
      tools: undefined,
      rename: undefined,
      clean: false,
      dryRun: false,
    });
  });

  it('merges flags with the export section', () => {
    const options = resolveExportOptions(
      { target: '/flag/target', dryRun: true },
      { export: { target: '/file/target', exclude: [], tools: 'Read', rename: { a: 'b' } } },
    );
    expect(options).toEqual({
      targetDirectory: resolve('/flag/target'),
      exclude: [],
      tools: 'Read',
      rename: { a: 'b' },
      clean: false,
      dryRun: true,
    });
  });
});
