/**
 * Export prompts into another tool's agent directory.
 *
 * Each content file is copied to the target. Files without frontmatter get a
 * YAML block (`name`, `description`, optional `tools`) derived from the file
 * name and role summary; files that already start with `---` are copied as-is.
 */

import { readFile, unlink } from 'node:fs/promises';
import { basename, join } from 'node:path';

import { writeFile } from 'atomically';
import picomatch from 'picomatch';
import { stringify as stringifyYaml } from 'yaml';

import { extractRoleSummary } from './agents.js';
import { ensureDir, pathExists } from './fs-utils.js';
import { agentName, listContentFiles } from './paths.js';
import type { ExportOptions, ExportSummary, Logger } from './types.js';
import { CONTENT_EXTENSION, FilesystemError, PromptSyncError, errorMessage } from './types.js';

/** Files that document the repository rather than define an agent. */
export const DEFAULT_EXPORT_EXCLUDE = [
  'README*',
  'CATALOG*',
  'SETUP*',
  'REMOTE*',
  'DISCOVERY*',
  'manifest*',
];

/** Description used when a prompt has no role section. */
export const DEFAULT_EXPORT_DESCRIPTION = 'Specialist agent';

const FRONTMATTER_DELIMITER = '---';

export interface Frontmatter {
  name: string;
  description: string;
  tools?: string | undefined;
}

/** Lowercase, with underscores as hyphens: "Go_Agent" -> "go-agent" */
export function toExportName(name: string): string {
  return name.toLowerCase().replace(/_/g, '-');
}

export function hasFrontmatter(content: string): boolean {
  const firstLine = content.split('\n', 1)[0] ?? '';
  return firstLine.trim() === FRONTMATTER_DELIMITER;
}

/** Render a frontmatter block followed by a blank line. */
export function formatFrontmatter(fields: Frontmatter): string {
  const data: Record<string, string> = { name: fields.name, description: fields.description };
  if (fields.tools) {
    data.tools = fields.tools;
  }
  return `${FRONTMATTER_DELIMITER}\n${stringifyYaml(data)}${FRONTMATTER_DELIMITER}\n\n`;
}

/**
 * Copy every non-excluded content file of `sourceDirectory` into the target.
 * Throws FilesystemError when reading, deleting or writing fails.
 */
export async function exportAgents(
  sourceDirectory: string,
  options: ExportOptions,
  logger: Logger,
): Promise<ExportSummary> {
  const { targetDirectory, tools, rename, clean, dryRun } = options;
  const exclude = options.exclude ?? DEFAULT_EXPORT_EXCLUDE;
  const isExcluded: (fileName: string) => boolean =
    exclude.length > 0 ? picomatch(exclude) : () => false;

  const summary: ExportSummary = { targetDirectory, written: [], skipped: [] };

  try {
    if (clean && (await pathExists(targetDirectory))) {
      for (const existing of await listContentFiles(targetDirectory)) {
        if (dryRun) {
          logger.info(`Would remove ${existing}`);
        } else {
          await unlink(existing);
          logger.debug(`Removed ${existing}`);
        }
      }
    }

    if (!dryRun) {
      await ensureDir(targetDirectory);
    }

    for (const filePath of await listContentFiles(sourceDirectory)) {
      const fileName = basename(filePath);
      if (isExcluded(fileName)) {
        summary.skipped.push(fileName);
        continue;
      }

      const sourceName = agentName(filePath);
      const exportName = rename?.[sourceName] ?? toExportName(sourceName);
      const content = await readFile(filePath, 'utf-8');
      const output = hasFrontmatter(content)
        ? content
        : formatFrontmatter({
            name: exportName,
            description: extractRoleSummary(content) ?? DEFAULT_EXPORT_DESCRIPTION,
            tools,
          }) + content;

      const targetName = `${exportName}${CONTENT_EXTENSION}`;
      if (dryRun) {
        logger.info(`Would write ${join(targetDirectory, targetName)}`);
      } else {
        await writeFile(join(targetDirectory, targetName), output);
        logger.debug(`Exported ${sourceName} -> ${targetName}`);
      }
      summary.written.push(targetName);
    }
  } catch (error) {
    if (error instanceof PromptSyncError) {
      throw error;
    }
    throw new FilesystemError(`Export to ${targetDirectory} failed: ${errorMessage(error)}`);
  }

  return summary;
}
