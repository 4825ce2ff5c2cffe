import { describe, expect, it } from 'vitest';
import { CONTENT_EXTENSION, MAX_BACKUPS, SyncManager, toExportName } from '../src/index.js';

describe('promptsync exports', () => {
  it('exports content constants', () => {
    expect(CONTENT_EXTENSION).toBe('.md');
    expect(MAX_BACKUPS).toBe(5);
  });

  it('exports the manager and helpers', () => {
    expect(typeof SyncManager).toBe('function');
    expect(toExportName('Data_Agent')).toBe('data-agent');
  });
});
