/**
 * Output formatting for CLI display.
 *
 * Status lines, agent listings, structured error formatting, and semantic
 * coloring via picocolors.
 *
 * Colors are automatically disabled when output is piped (non-TTY),
 * when NO_COLOR is set, or via the --color never flag.
 */

import colors, { createColors } from 'picocolors';

import type { AgentDescriptor, PromptSyncError, RepositoryStatus } from './types.js';

// --- Semantic color map ---

type ColorFn = (s: string | number) => string;

/** Semantic color wrappers for CLI output. */
export const c: {
  success: ColorFn;
  error: ColorFn;
  warning: ColorFn;
  info: ColorFn;
  command: ColorFn;
  heading: ColorFn;
  hint: ColorFn;
  muted: ColorFn;
} = {
  success: colors.green,
  error: colors.red,
  warning: colors.yellow,
  info: colors.cyan,
  command: colors.bold,
  heading: colors.bold,
  hint: colors.dim,
  muted: colors.gray,
};

export type ColorMode = 'always' | 'never' | 'auto';

/**
 * Re-initialize the semantic color map with explicit color mode.
 * Call this after parsing the --color flag, before any output.
 */
export function initColors(mode: ColorMode): void {
  if (mode === 'auto') {
    return; // Use picocolors default detection
  }
  const pc = createColors(mode === 'always');
  c.success = pc.green;
  c.error = pc.red;
  c.warning = pc.yellow;
  c.info = pc.cyan;
  c.command = pc.bold;
  c.heading = pc.bold;
  c.hint = pc.dim;
  c.muted = pc.gray;
}

/** Centralized symbols for result output. */
export const OUTPUT_SYMBOLS = {
  pass: '✓',
  fail: '✗',
  warn: '⚠',
} as const;

/** Pluralize: "1 file" / "3 files". Custom plural form optional. */
export function formatCount(n: number, singular: string, plural?: string): string {
  return `${n} ${n === 1 ? singular : (plural ?? `${singular}s`)}`;
}

/** Format a section heading: "=== Title ===" */
export function formatHeading(title: string): string {
  return c.heading(`=== ${title} ===`);
}

/** "✓ message" */
export function formatSuccess(message: string): string {
  return `${c.success(OUTPUT_SYMBOLS.pass)} ${message}`;
}

/** "✗ message" */
export function formatFailure(message: string): string {
  return `${c.error(OUTPUT_SYMBOLS.fail)} ${message}`;
}

/** "⚠  message" */
export function formatWarning(message: string): string {
  return `${c.warning(OUTPUT_SYMBOLS.warn)}  ${c.warning(message)}`;
}

/** Format a note/hint: "  hint text" */
export function formatHint(hint: string): string {
  return c.hint(`  ${hint}`);
}

/** Format an error with troubleshooting suggestions. */
export function formatError(error: PromptSyncError | Error): string {
  const lines: string[] = [c.error(`Error: ${error.message}`)];

  if ('suggestions' in error && error.suggestions) {
    lines.push('');
    for (const suggestion of error.suggestions) {
      lines.push(formatHint(suggestion));
    }
  }

  return lines.join('\n');
}

/** Multi-line listing entry for one agent. */
export function formatAgent(agent: AgentDescriptor): string {
  return [
    c.command(agent.name),
    `  Role: ${agent.roleSummary}`,
    `  Modified: ${agent.modifiedTime.toISOString()}`,
    `  Size: ${formatCount(agent.sizeBytes, 'byte')}`,
  ].join('\n');
}

/** Status report lines, without the heading. */
export function formatStatus(status: RepositoryStatus): string[] {
  const lines = [
    `Initialized: ${status.initialized ? 'yes' : 'no'}`,
    `Directory: ${status.localDirectory}`,
    `Repository: ${status.remoteUrl || c.muted('Not configured')}`,
    `Total agents: ${status.totalAgents}`,
    `Last sync: ${status.lastSync ?? c.muted('Never')}`,
    `Updates available: ${status.hasUpdates ? c.info('yes') : 'no'}`,
  ];
  if (status.localChanges.length > 0) {
    lines.push(c.warning(`Local changes: ${formatCount(status.localChanges.length, 'file')}`));
    for (const change of status.localChanges) {
      lines.push(c.muted(`  ${change}`));
    }
  }
  return lines;
}
