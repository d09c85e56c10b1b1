import type { Command } from 'commander';
import chalk from 'chalk';
import { parseCheckOptions } from '../boundaries/cli-parser';
import { parseEnvironment } from '../boundaries/env-parser';
import { resolveCheckRequest } from '../boundaries/input-resolver';
import { loadMetadata, readProcessStdin, type StdinReader } from '../boundaries/metadata-loader';
import { DIAGNOSTIC_PREFIX, LIB_TARGET_KIND } from '../config/constants';
import { HasLibTargetError, MissingInputError, handleUnknownError } from '../errors/index';
import { hasTargetKind } from '../metadata/lookup';
import { error, result, setSilentMode, warn } from '../output/logger';

export const CHECK_USAGE = '[options] <metadata-path> <package-name>';

export interface CheckCommandDeps {
  readStdin?: StdinReader;
}

/*
 * Registers the check as the program's default action.
 * Every invocation that reaches the action prints exactly one true/false line.
 */
export function registerCheckCommand(program: Command, deps: CheckCommandDeps = {}): void {
  const readStdin = deps.readStdin ?? readProcessStdin;

  program
    .usage(CHECK_USAGE)
    .option('--kind <kind>', 'Target kind to look for', LIB_TARGET_KIND)
    .option('-q, --quiet', 'Suppress diagnostics on stderr')
    .argument('[metadata-path]', `metadata JSON file, or "-" to read stdin`)
    .argument('[package-name]', 'package to look up')
    .allowExcessArguments(true)
    .action((metadataPath: string | undefined, packageName: string | undefined, rawOptions: unknown) => {
      applyQuietOption(program);
      let answer = false;
      try {
        answer = executeCheck([metadataPath, packageName], rawOptions, readStdin);
      } catch (e: unknown) {
        reportFailure(e, `Usage: ${program.name()} ${CHECK_USAGE}`);
      }
      result(String(answer));
    });
}

/**
 * Silence diagnostics from the raw --quiet value, before any option
 * validation can fail. Commander stores known options even when it goes on
 * to reject an unknown one.
 */
export function applyQuietOption(program: Command): void {
  setSilentMode(program.getOptionValue('quiet') === true);
}

export function executeCheck(
  args: ReadonlyArray<string | undefined>,
  rawOptions: unknown,
  readStdin: StdinReader
): boolean {
  const options = parseCheckOptions(rawOptions);

  const env = parseEnvironment();
  const request = resolveCheckRequest(args, env);
  const document = loadMetadata(request.source, readStdin);
  return hasTargetKind(document, request.packageName, options.kind);
}

function reportFailure(e: unknown, usage: string): void {
  if (e instanceof HasLibTargetError) {
    warn(`${DIAGNOSTIC_PREFIX} ${chalk.yellow('Warning')}: ${e.message}`);
    if (e instanceof MissingInputError) {
      warn(usage);
    }
    return;
  }
  const err = handleUnknownError(e, 'Checking for target');
  error(`${DIAGNOSTIC_PREFIX} ${chalk.red('Error')}: ${err.message}`);
}
