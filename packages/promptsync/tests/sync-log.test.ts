import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it, beforeEach, afterEach } from 'vitest';

import { appendLogEntry, formatLogEntry, parseLastSync, readLastSync } from '../src/sync-log.js';
import { formatLogTimestamp, formatSnapshotTimestamp } from '../src/timestamp.js';

describe('timestamps', () => {
  const date = new Date(2023, 11, 31, 23, 5, 9);

  it('formats snapshot names', () => {
    expect(formatSnapshotTimestamp(date)).toBe('20231231_230509');
  });

  it('formats log lines', () => {
    expect(formatLogTimestamp(date)).toBe('2023-12-31 23:05:09');
  });
});

describe('parseLastSync', () => {
  it('returns the timestamp of the last entry', () => {
    const content =
      '2024-01-01 10:00:00 - Repository cloned successfully\n' +
      '2024-01-02 11:30:00 - Synced successfully. 3 files changed.\n\n';
    expect(parseLastSync(content)).toBe('2024-01-02 11:30:00');
  });

  it('splits on the first separator only', () => {
    expect(parseLastSync('2024-01-01 10:00:00 - a - b\n')).toBe('2024-01-01 10:00:00');
  });

  it('is undefined for empty content or a line without separator', () => {
    expect(parseLastSync('')).toBeUndefined();
    expect(parseLastSync('\n\n')).toBeUndefined();
    expect(parseLastSync('no separator here\n')).toBeUndefined();
  });
});

describe('sync log file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'promptsync-log-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('appends formatted entries', async () => {
    await appendLogEntry(dir, 'first', new Date(2024, 0, 1, 9, 0, 0));
    await appendLogEntry(dir, 'second', new Date(2024, 0, 1, 9, 0, 1));

    expect(await readFile(join(dir, '.sync.log'), 'utf-8')).toBe(
      formatLogEntry('first', new Date(2024, 0, 1, 9, 0, 0)) +
        '2024-01-01 09:00:01 - second\n',
    );
    expect(await readLastSync(dir)).toBe('2024-01-01 09:00:01');
  });

  it('reads undefined when the log does not exist', async () => {
    expect(await readLastSync(dir)).toBeUndefined();
  });

  it('reads undefined for a log without entries', async () => {
    await writeFile(join(dir, '.sync.log'), '');
    expect(await readLastSync(dir)).toBeUndefined();
  });
});
