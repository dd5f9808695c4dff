#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { errorMessage } from './errors.js';
import { updateCommand } from './cli/commands/update.js';
import { statusCommand } from './cli/commands/status.js';
import { pruneCommand } from './cli/commands/prune.js';

async function printVersion(): Promise<void> {
  const require = createRequire(import.meta.url);
  const pkg = require('../package.json') as { version: string; name: string };

  let tsVersion = 'unknown';
  try {
    const tsPkg = require('typescript/package.json') as { version: string };
    tsVersion = tsPkg.version;
  } catch {
    tsVersion = 'not installed';
  }

  console.log(`guidance-updater  v${pkg.version}`);
  console.log(`Node.js           ${process.version}`);
  console.log(`TypeScript        ${tsVersion}`);
  console.log(`Platform          ${process.platform} ${process.arch}`);
}

function showHelp(): void {
  console.log(`
guidance-updater - keep agent guidance documents in step with session history

Usage:
  guidance-updater [update] [options]    Refresh guidance (default command)
  guidance-updater status [options]      Show tracked sessions and patterns
  guidance-updater prune <id>...         Remove discovered patterns
  guidance-updater --version             Show version information
  guidance-updater --help                Show this message

Run "guidance-updater <command> --help" for command options.

Examples:
  guidance-updater --dry-run                    # Preview the Codex document
  guidance-updater update --agent all --skip-git
  guidance-updater status --agent claude --json
  guidance-updater prune dynamic-use-jq

Files:
  Codex:  ~/.codex/history.jsonl -> .codex/AGENTS.md, .codex/automation_state.json
  Claude: ~/.claude/projects     -> .claude/CLAUDE.md, .claude/automation_state.json
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V') {
    await printVersion();
    return;
  }

  let exitCode: number;
  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      return;

    case 'status':
    case 'st':
      exitCode = await statusCommand(args.slice(1));
      break;

    case 'prune':
      exitCode = await pruneCommand(args.slice(1));
      break;

    case 'update':
    case 'u':
      exitCode = await updateCommand(args.slice(1));
      break;

    default:
      if (command !== undefined && !command.startsWith('-')) {
        p.log.error(`Unknown command: ${command}`);
        showHelp();
        process.exit(1);
      }
      // Bare flags run an update.
      exitCode = await updateCommand(args);
  }

  if (exitCode !== 0) process.exit(exitCode);
}

main().catch((err: unknown) => {
  p.log.error(errorMessage(err));
  process.exit(1);
});
