import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it, vi, beforeEach, afterEach } from 'vitest';

import { describeAgent, extractRoleSummary, listAgents, readAgent } from '../src/agents.js';
import type { Logger } from '../src/types.js';

describe('extractRoleSummary', () => {
  it('returns the first text line after the role heading', () => {
    const content = '# Reviewer\n\n## Role\n\nReviews pull requests.\nSecond line.\n';
    expect(extractRoleSummary(content)).toBe('Reviews pull requests.');
  });

  it('skips nested headings after the role heading', () => {
    const content = '## Role\n### Summary\nPlans releases.\n';
    expect(extractRoleSummary(content)).toBe('Plans releases.');
  });

  it('trims surrounding whitespace', () => {
    expect(extractRoleSummary('  ## Role  \n   Indented role.   \n')).toBe('Indented role.');
  });

  it('truncates long summaries to 100 characters plus an ellipsis', () => {
    const long = 'x'.repeat(150);
    expect(extractRoleSummary(`## Role\n${long}\n`)).toBe(`${'x'.repeat(100)}...`);
  });

  it('keeps a summary of exactly 100 characters', () => {
    const exact = 'y'.repeat(100);
    expect(extractRoleSummary(`## Role\n${exact}\n`)).toBe(exact);
  });

  it('ignores a role heading beyond the first ten lines', () => {
    const content = `${'filler\n'.repeat(10)}## Role\nToo late.\n`;
    expect(extractRoleSummary(content)).toBeUndefined();
  });

  it('requires the summary within the first ten lines', () => {
    const content = `## Role\n${'\n'.repeat(9)}Too late.\n`;
    expect(extractRoleSummary(content)).toBeUndefined();
  });

  it('does not match other headings', () => {
    expect(extractRoleSummary('## Roles\nNot it.\n')).toBeUndefined();
    expect(extractRoleSummary('# Role\nNot it either.\n')).toBeUndefined();
  });
});

describe('agent files', () => {
  let dir: string;
  let logger: Logger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'promptsync-agents-test-'));
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('describes a file', async () => {
    const filePath = join(dir, 'writer.md');
    await writeFile(filePath, '## Role\nWrites docs.\n');

    const agent = await describeAgent(filePath);

    expect(agent.name).toBe('writer');
    expect(agent.filePath).toBe(filePath);
    expect(agent.sizeBytes).toBe(21);
    expect(agent.roleSummary).toBe('Writes docs.');
    expect(agent.modifiedTime).toBeInstanceOf(Date);
  });

  it('lists agents sorted by name', async () => {
    await writeFile(join(dir, 'zeta.md'), 'Z');
    await writeFile(join(dir, 'alpha.md'), 'A');

    const agents = await listAgents(dir, logger);

    expect(agents.map((agent) => agent.name)).toEqual(['alpha', 'zeta']);
    expect(agents.map((agent) => agent.roleSummary)).toEqual([
      'No description available',
      'No description available',
    ]);
  });

  it('prefers the name with the extension appended', async () => {
    await writeFile(join(dir, 'notes'), 'literal');
    await writeFile(join(dir, 'notes.md'), 'markdown');

    expect(await readAgent(dir, 'notes', logger)).toBe('markdown');
  });

  it('falls back to the literal file name', async () => {
    await writeFile(join(dir, 'notes'), 'literal');
    expect(await readAgent(dir, 'notes', logger)).toBe('literal');
  });

  it('returns undefined when nothing matches', async () => {
    expect(await readAgent(dir, 'absent', logger)).toBeUndefined();
  });
});
