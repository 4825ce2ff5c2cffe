/**
 * Append-only sync log (`.sync.log`).
 *
 * Each line is "<YYYY-MM-DD HH:MM:SS> - <message>". The file is opened,
 * appended and closed per entry; it is advisory and only used to answer
 * "when did the last sync happen".
 */

import { appendFile, readFile } from 'node:fs/promises';

import { isErrnoException } from './fs-utils.js';
import { getLogPath } from './paths.js';
import { formatLogTimestamp } from './timestamp.js';
import { LOG_SEPARATOR } from './types.js';

/** Format one log line, including the trailing newline. */
export function formatLogEntry(message: string, timestamp: Date): string {
  return `${formatLogTimestamp(timestamp)}${LOG_SEPARATOR}${message}\n`;
}

export async function appendLogEntry(
  localDirectory: string,
  message: string,
  timestamp: Date = new Date(),
): Promise<void> {
  await appendFile(getLogPath(localDirectory), formatLogEntry(message, timestamp), 'utf-8');
}

/**
 * Timestamp of the final entry: the text before the first separator on the
 * last non-empty line. Undefined when there is no such line or no separator.
 */
export function parseLastSync(content: string): string | undefined {
  const lines = content.split('\n').filter((line) => line.trim().length > 0);
  const last = lines[lines.length - 1];
  if (last === undefined) {
    return undefined;
  }
  const index = last.indexOf(LOG_SEPARATOR);
  if (index <= 0) {
    return undefined;
  }
  return last.slice(0, index);
}

/** Read the last-sync timestamp; undefined when the log does not exist. */
export async function readLastSync(localDirectory: string): Promise<string | undefined> {
  let content: string;
  try {
    content = await readFile(getLogPath(localDirectory), 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  return parseLastSync(content);
}
