import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { DIAGNOSTIC_PREFIX, TOOL_NAME, TOOL_VERSION } from '../config/constants';
import { handleUnknownError } from '../errors/index';
import { error, result, warn } from '../output/logger';
import { applyQuietOption, registerCheckCommand, type CheckCommandDeps } from './check-command';

// Commander exits these after printing; they are not queries, so no answer line follows.
const INFORMATIONAL_EXIT_CODES = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

export function createProgram(deps: CheckCommandDeps = {}): Command {
  const program = new Command();
  program
    .name(TOOL_NAME)
    .description('Print whether a package in build metadata produces a library target')
    .version(TOOL_VERSION)
    .exitOverride()
    .configureOutput({
      writeErr: (str) => {
        applyQuietOption(program);
        warn(str.trimEnd());
      },
    });

  registerCheckCommand(program, deps);
  return program;
}

export interface RunOptions extends CheckCommandDeps {
  from?: 'node' | 'user';
}

/**
 * Parse argv and answer the query. Never throws and never sets a failing
 * exit status: anything that goes wrong ends as a "false" line.
 */
export function runCli(argv: string[], options: RunOptions = {}): void {
  const { from = 'node', ...deps } = options;
  const program = createProgram(deps);
  try {
    program.parse(argv, { from });
  } catch (e: unknown) {
    if (e instanceof CommanderError) {
      if (!INFORMATIONAL_EXIT_CODES.has(e.code)) {
        result('false');
      }
      return;
    }
    const err = handleUnknownError(e, 'Running command');
    error(`${DIAGNOSTIC_PREFIX} ${chalk.red('Error')}: ${err.message}`);
    result('false');
  }
}
