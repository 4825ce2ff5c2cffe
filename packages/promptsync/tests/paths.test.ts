import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  agentName,
  agentPathCandidates,
  expandHome,
  getDefaultAgentsDir,
  isContentFileName,
  listContentFiles,
  stripContentExtension,
} from '../src/paths.js';

describe('listContentFiles', () => {
  function tmpDir(): string {
    return mkdtempSync(join(tmpdir(), 'promptsync-paths-test-'));
  }

  it('returns sorted top-level markdown files', async () => {
    const dir = tmpDir();
    mkdirSync(join(dir, 'sub'));
    mkdirSync(join(dir, 'folder.md'));
    writeFileSync(join(dir, 'b.md'), '');
    writeFileSync(join(dir, 'a.md'), '');
    writeFileSync(join(dir, 'c.txt'), '');
    writeFileSync(join(dir, 'sub', 'd.md'), '');

    expect(await listContentFiles(dir)).toEqual([join(dir, 'a.md'), join(dir, 'b.md')]);
  });

  it('rejects for a missing directory', async () => {
    await expect(listContentFiles(join(tmpDir(), 'missing'))).rejects.toThrow(/ENOENT/);
  });
});

describe('content file names', () => {
  it('recognizes the content extension', () => {
    expect(isContentFileName('agent.md')).toBe(true);
    expect(isContentFileName('agent.txt')).toBe(false);
    expect(isContentFileName('.md')).toBe(false);
  });

  it('strips the extension only when present', () => {
    expect(stripContentExtension('go-agent.md')).toBe('go-agent');
    expect(stripContentExtension('go-agent')).toBe('go-agent');
    expect(agentName('/x/y/reviewer.md')).toBe('reviewer');
  });
});

describe('agentPathCandidates', () => {
  it('tries the extension first, then the literal name', () => {
    expect(agentPathCandidates('/agents', 'writer')).toEqual([
      resolve('/agents/writer.md'),
      resolve('/agents/writer'),
    ]);
  });

  it('drops candidates outside the directory', () => {
    expect(agentPathCandidates('/agents', '../etc/passwd')).toEqual([]);
    expect(agentPathCandidates('/agents', '/etc/passwd')).toEqual([]);
  });

  it('allows names that merely start with dots', () => {
    expect(agentPathCandidates('/agents', '..draft')).toEqual([
      resolve('/agents/..draft.md'),
      resolve('/agents/..draft'),
    ]);
  });
});

describe('home paths', () => {
  it('expands a leading tilde', () => {
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('~/agents')).toBe(join(homedir(), 'agents'));
    expect(expandHome('/abs/~/x')).toBe('/abs/~/x');
  });

  it('defaults to ~/agents', () => {
    expect(getDefaultAgentsDir()).toBe(join(homedir(), 'agents'));
  });
});
