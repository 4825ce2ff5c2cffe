/**
 * git backend for the version-control capability set.
 *
 * Delegates every operation to the user's installed `git` binary, inheriting
 * their credentials and transport configuration. Calls block until git exits;
 * no timeout is imposed here. A non-zero exit becomes a TransportError that
 * carries git's own output unparsed.
 */

import { execFileSync } from 'node:child_process';
import { dirname, resolve } from 'node:path';

import type { ErrorCategory, VersionControlClient } from './types.js';
import { TransportError } from './types.js';

/** Output of ls-tree on a large repo can exceed the 1 MiB default. */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/** Troubleshooting hints shown under a failed git command, by category. */
const GIT_SUGGESTIONS: Partial<Record<ErrorCategory, string[]>> = {
  authentication: [
    'Check the credentials git uses for this remote (credential helper or SSH key).',
    'Try `git fetch` in the agents directory to see the full prompt.',
  ],
  network: ['Check your network connection and that the remote host is reachable.'],
  not_found: [
    'Check the repository URL (--repo or AGENT_REPO_URL).',
    'The remote must have a main or master branch.',
  ],
};

export class GitClient implements VersionControlClient {
  private readonly cwd: string;
  private readonly binary: string;

  constructor(cwd: string, binary = 'git') {
    this.cwd = cwd;
    this.binary = binary;
  }

  // A failing exec surfaces as a rejection, never a synchronous throw.

  async clone(url: string, destination: string): Promise<void> {
    const target = resolve(destination);
    this.exec(['clone', url, target], 'clone', dirname(target));
  }

  async fetch(remoteName: string): Promise<void> {
    this.exec(['fetch', remoteName], 'fetch');
  }

  async pull(remoteName: string, branch: string): Promise<void> {
    this.exec(['pull', remoteName, branch], 'pull');
  }

  async stash(message: string): Promise<void> {
    this.exec(['stash', 'push', '-m', message], 'stash');
  }

  async statusPorcelain(): Promise<string[]> {
    return splitLines(this.exec(['status', '--porcelain'], 'status'));
  }

  async listTrackedFiles(): Promise<Set<string>> {
    return new Set(splitLines(this.exec(['ls-tree', '-r', 'HEAD', '--name-only'], 'ls-tree')));
  }

  async revListCount(range: string): Promise<number> {
    const output = this.exec(['rev-list', '--count', range], 'rev-list').trim();
    const count = Number.parseInt(output, 10);
    if (Number.isNaN(count)) {
      throw new TransportError(`git rev-list returned a non-numeric count: ${JSON.stringify(output)}`);
    }
    return count;
  }

  private exec(args: string[], operation: string, cwd = this.cwd): string {
    try {
      const result = execFileSync(this.binary, args, {
        cwd,
        stdio: ['pipe', 'pipe', 'pipe'],
        maxBuffer: MAX_OUTPUT_BYTES,
      });
      return result.toString();
    } catch (err) {
      const execError = err as {
        status?: number | null;
        stdout?: Buffer;
        stderr?: Buffer;
        code?: string;
      };

      if (execError.code === 'ENOENT') {
        throw new TransportError(
          `${this.binary} not found. Ensure it is installed and in your PATH.`,
          'not_found',
          undefined,
          ['Install git from https://git-scm.com/downloads'],
        );
      }

      const exitCode = execError.status ?? 1;
      const stderr = execError.stderr?.toString().trim() ?? '';
      const stdout = execError.stdout?.toString().trim() ?? '';
      const details = [stdout, stderr].filter(Boolean).join('\n');

      const category = categorizeGitError(stderr);
      throw new TransportError(
        `git ${operation} failed (exit ${exitCode}): git ${args.join(' ')}${details ? `\n${details}` : ''}`,
        category,
        exitCode,
        GIT_SUGGESTIONS[category],
      );
    }
  }
}

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => line.trim().length > 0);
}

/** Best-effort classification of git's stderr; selects the hints attached to the error. */
export function categorizeGitError(stderr: string): ErrorCategory {
  const lower = stderr.toLowerCase();
  if (
    lower.includes('authentication failed') ||
    lower.includes('permission denied (publickey)') ||
    lower.includes('could not read username') ||
    lower.includes('403')
  ) {
    return 'authentication';
  }
  if (
    lower.includes('could not resolve host') ||
    lower.includes('connection') ||
    lower.includes('timed out') ||
    lower.includes('network')
  ) {
    return 'network';
  }
  if (
    lower.includes("couldn't find remote ref") ||
    lower.includes('not found') ||
    lower.includes('does not exist') ||
    lower.includes('unknown revision')
  ) {
    return 'not_found';
  }
  return 'transport';
}
