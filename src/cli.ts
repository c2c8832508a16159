#!/usr/bin/env node

// Set process title for easy identification in ps/pgrep/pkill
process.title = 'wit-sim';

import { loadConfiguration } from './core/configuration.js';
import { parseRunArgs, runCommand } from './cli/commands/run.js';
import { showHelp } from './cli/commands/help.js';
import * as ui from './cli/ui.js';

// CLI with subcommand pattern
const args = process.argv.slice(2);
const mainCommand = args[0];

function main(): number {
  if (!mainCommand || mainCommand === 'help' || mainCommand === '--help' || mainCommand === '-h') {
    showHelp(loadConfiguration().toolName);
    return 0;
  }

  if (mainCommand === 'run') {
    const options = parseRunArgs(args.slice(1));
    if (!options.ok) {
      ui.error(options.error);
      return 2;
    }

    const result = runCommand(options.value);
    if (!result.ok) {
      ui.error(result.error.message);
      return 1;
    }
    return result.value;
  }

  ui.error(`Unknown command: ${mainCommand}`);
  ui.info('Run "wit-sim help" for usage');
  return 2;
}

// exitCode instead of exit() lets piped stdout drain
process.exitCode = main();
