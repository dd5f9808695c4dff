/**
 * prune command - drop discovered patterns an operator no longer wants.
 *
 * Usage:
 *   guidance-updater prune dynamic-use-jq
 *   guidance-updater prune --agent claude dynamic-a dynamic-b
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { loadSettings } from '../../config/settings.js';
import { ConfigError, errorMessage } from '../../errors.js';
import { loadStaticCatalog } from '../../patterns/static-catalog.js';
import { prunePatterns } from '../../pipeline/maintenance.js';
import { parseCliFlags } from '../flags.js';
import { commandContext, profilesFromFlags } from './shared.js';
import type { CommandOptions } from './shared.js';

const HELP_TEXT = `
Usage: guidance-updater prune [options] <identifier>...

Remove dynamic patterns from the state and regenerate the guidance
document. Static categories come from the catalog and cannot be pruned.
Run status to list identifiers.

Options:
  --agent <codex|claude>      Agent whose patterns to prune (default: codex)
  --config <path>             Settings file (default: .guidance-updater.json)
  --state, --codex <path>     Codex state and document paths
  --claude-state, --claude-output <path>
  --help, -h                  Show this help message
`;

/**
 * Prune command entry point.
 *
 * @param args - Command-line arguments after 'prune'
 * @returns Exit code (0 when every identifier was removed, 1 otherwise)
 */
export async function pruneCommand(args: string[], options?: CommandOptions): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  const context = commandContext(options);

  try {
    const flags = parseCliFlags(args);
    if (flags.positionals.length === 0) {
      throw new ConfigError('prune needs at least one pattern identifier');
    }
    if (flags.agents.length !== 1) {
      throw new ConfigError('prune works on one agent at a time');
    }

    const { settings } = await loadSettings({
      configPath: flags.configPath,
      cwd: context.cwd,
      env: context.env,
      requireCredential: false,
    });
    const catalog = await loadStaticCatalog();
    const [profile] = profilesFromFlags(flags, context);

    p.intro(pc.bgCyan(pc.black(' Prune Patterns ')));
    const result = await prunePatterns(profile, flags.positionals, catalog, settings.quote_length);

    for (const id of result.removed) {
      p.log.success(`Removed ${id}`);
    }
    for (const id of result.refused) {
      p.log.warn(`${id} is a static category and cannot be pruned`);
    }
    for (const id of result.notFound) {
      p.log.warn(`No pattern named ${id}`);
    }
    if (result.documentWritten) {
      p.log.info(`Regenerated ${profile.paths.output}`);
    }

    const clean = result.refused.length === 0 && result.notFound.length === 0;
    p.outro(clean ? 'Done.' : pc.yellow('Some identifiers were not removed.'));
    return clean ? 0 : 1;
  } catch (err) {
    p.log.error(errorMessage(err));
    return 1;
  }
}
