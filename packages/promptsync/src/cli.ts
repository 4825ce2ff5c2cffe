#!/usr/bin/env node

/**
 * CLI entry point for promptsync.
 *
 * Commander.js-based CLI: sync, status, list, get, backup and export, with
 * global overrides for the remote URL and local directory.
 */

import { Command, Option } from 'commander';

import type { ExportCommandOptions } from './commands.js';
import {
  EXIT_FAILURE,
  createContext,
  getGlobalOpts,
  handleBackup,
  handleExport,
  handleGet,
  handleList,
  handleStatus,
  handleSync,
} from './commands.js';
import { formatError } from './format.js';
import { PromptSyncError } from './types.js';

function createProgram(): Command {
  const program = new Command();

  program
    .name('promptsync')
    .description('Keep a local directory of agent prompts in sync with a git repository.')
    .version(getVersion(), '--version', 'Show version number')
    .helpOption('-h, --help', 'Display help for command')
    .option('--repo <url>', 'Remote repository URL (default: $AGENT_REPO_URL)')
    .option('--dir <path>', 'Local agents directory (default: $AGENTS_DIR or ~/agents)')
    .option('--config <path>', 'Config file (default: ~/.promptsync.yml)')
    .addOption(new Option('--quiet', 'Suppress all output except errors').preset(true))
    .addOption(new Option('--verbose', 'Detailed progress output').preset(true))
    .addOption(
      new Option('--color <mode>', 'Color output')
        .choices(['auto', 'always', 'never'])
        .default('auto'),
    )
    .configureHelp({ helpWidth: 80, showGlobalOptions: false })
    .addHelpText(
      'after',
      [
        '',
        'Get started:',
        '  export AGENT_REPO_URL=https://example.com/you/agents.git',
        '  promptsync sync',
        '  promptsync list',
        '',
      ].join('\n'),
    );

  program
    .command('sync')
    .description('Pull the latest prompts from the remote repository')
    .option('--force', 'Back up and stash local changes instead of refusing to sync')
    .action(
      wrapAction(async (opts: { force?: boolean }, cmd: Command) => {
        const { manager } = await createContext(getGlobalOpts(cmd));
        return handleSync(manager, Boolean(opts.force));
      }),
    );

  program
    .command('status')
    .description('Show repository status, last sync and pending updates')
    .action(
      wrapAction(async (_opts: Record<string, unknown>, cmd: Command) => {
        const { manager } = await createContext(getGlobalOpts(cmd));
        return handleStatus(manager);
      }),
    );

  program
    .command('list')
    .description('List available agents with their roles')
    .action(
      wrapAction(async (_opts: Record<string, unknown>, cmd: Command) => {
        const { manager } = await createContext(getGlobalOpts(cmd));
        return handleList(manager);
      }),
    );

  program
    .command('get')
    .description('Print the content of one agent')
    .argument('<name>', 'Agent name, with or without the .md extension')
    .action(
      wrapAction(async (name: string, _opts: Record<string, unknown>, cmd: Command) => {
        const { manager } = await createContext(getGlobalOpts(cmd));
        return handleGet(manager, name);
      }),
    );

  program
    .command('backup')
    .description('Snapshot the agent files into .backups/ (keeps the last 5)')
    .action(
      wrapAction(async (_opts: Record<string, unknown>, cmd: Command) => {
        const { manager } = await createContext(getGlobalOpts(cmd));
        return handleBackup(manager);
      }),
    );

  program
    .command('export')
    .description('Copy agents into a tool agent directory, adding YAML frontmatter')
    .argument('[target]', 'Target directory (default: ~/.claude/agents)')
    .option('--clean', 'Remove existing .md files from the target first')
    .option('--dry-run', 'Show what would be written without writing')
    .action(
      wrapAction(
        async (
          target: string | undefined,
          opts: Omit<ExportCommandOptions, 'target'>,
          cmd: Command,
        ) => {
          const context = await createContext(getGlobalOpts(cmd));
          return handleExport(context, { ...opts, target });
        },
      ),
    );

  return program;
}

function getVersion(): string {
  return '0.1.0';
}

/**
 * Wrap a command action with error handling. The handler's return value
 * becomes the process exit code.
 */
function wrapAction<A extends unknown[]>(
  handler: (...args: A) => Promise<number>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      process.exitCode = await handler(...args);
    } catch (err) {
      if (err instanceof PromptSyncError) {
        console.error(formatError(err));
        process.exitCode = err.exitCode;
      } else {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = EXIT_FAILURE;
      }
    }
  };
}

// --- Main ---

export async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = EXIT_FAILURE;
});
