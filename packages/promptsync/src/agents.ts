/**
 * Agent catalog: enumerate content files, extract role summaries, and read
 * a single prompt by name.
 */

import { readFile, stat } from 'node:fs/promises';

import { pathExists } from './fs-utils.js';
import { agentName, agentPathCandidates, listContentFiles } from './paths.js';
import type { AgentDescriptor, Logger } from './types.js';
import {
  errorMessage,
  ROLE_HEADING,
  ROLE_SCAN_LINES,
  ROLE_SUMMARY_MAX_LENGTH,
  ROLE_UNAVAILABLE,
} from './types.js';

/**
 * Find the role summary in the first ROLE_SCAN_LINES lines: the first line
 * after a `## Role` heading that is neither blank nor another heading.
 */
export function extractRoleSummary(content: string): string | undefined {
  const lines = content.split('\n').slice(0, ROLE_SCAN_LINES);
  const headingIndex = lines.findIndex((line) => line.trim() === ROLE_HEADING);
  if (headingIndex === -1) {
    return undefined;
  }
  for (const line of lines.slice(headingIndex + 1)) {
    const text = line.trim();
    if (text.length > 0 && !text.startsWith('#')) {
      return truncateSummary(text);
    }
  }
  return undefined;
}

function truncateSummary(text: string): string {
  if (text.length <= ROLE_SUMMARY_MAX_LENGTH) {
    return text;
  }
  return `${text.slice(0, ROLE_SUMMARY_MAX_LENGTH)}...`;
}

export async function describeAgent(filePath: string): Promise<AgentDescriptor> {
  const content = await readFile(filePath, 'utf-8');
  const stats = await stat(filePath);
  return {
    name: agentName(filePath),
    filePath,
    sizeBytes: stats.size,
    modifiedTime: stats.mtime,
    roleSummary: extractRoleSummary(content) ?? ROLE_UNAVAILABLE,
  };
}

/** Describe every content file; unreadable files are logged and skipped. */
export async function listAgents(directory: string, logger: Logger): Promise<AgentDescriptor[]> {
  const agents: AgentDescriptor[] = [];
  for (const filePath of await listContentFiles(directory)) {
    try {
      agents.push(await describeAgent(filePath));
    } catch (error) {
      logger.warn(`Error reading ${filePath}: ${errorMessage(error)}`);
    }
  }
  return agents;
}

/**
 * Read a prompt by name. `name` may omit or include the content extension.
 * Undefined when no candidate file exists or the read fails.
 */
export async function readAgent(
  directory: string,
  name: string,
  logger: Logger,
): Promise<string | undefined> {
  for (const candidate of agentPathCandidates(directory, name)) {
    if (!(await pathExists(candidate))) {
      continue;
    }
    try {
      return await readFile(candidate, 'utf-8');
    } catch (error) {
      logger.warn(`Error reading agent file ${candidate}: ${errorMessage(error)}`);
      return undefined;
    }
  }
  return undefined;
}
