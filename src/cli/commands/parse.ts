/**
 * Parse Command
 *
 * Resolves a single relative-time string, e.g. `comment-window parse "3 weeks ago"`.
 *
 * @module cli/commands/parse
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { parseRelativeTime, type RelativeTimeParseResult } from '../../dates/relative-time.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand } from '../base-command.js';
import { failCommand, parseReferenceInstant } from './options.js';

/**
 * Options for the parse command.
 */
export interface ParseCommandOptions {
  /** Reference instant (ISO8601); defaults to now */
  reference?: string;
  /** Output format */
  format?: 'text' | 'json';
}

/**
 * Register the parse command.
 */
export function registerParseCommand(program: Command): void {
  program
    .command('parse <text>')
    .description('Resolve a relative time string such as "3 days ago" to an absolute time')
    .option('--reference <timestamp>', 'Reference time (ISO8601, default: now)')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action((text: string, options: ParseCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent);

      let result: RelativeTimeParseResult;
      try {
        result = handleParse(text, options, base);
      } catch (error) {
        failCommand(base, error);
      }

      if (!result.success) {
        base.exitWith(EXIT_CODES.ERROR);
      }
    });
}

/**
 * Handle the parse command.
 *
 * @returns The parse result; failures are printed, not thrown
 * @throws UsageError if --reference is not a timestamp
 */
export function handleParse(
  text: string,
  options: ParseCommandOptions,
  base: BaseCommand
): RelativeTimeParseResult {
  const reference = parseReferenceInstant(options.reference);
  const result = parseRelativeTime(text, reference);

  if (options.format === 'json') {
    base.json(
      result.success
        ? {
            input: text,
            reference: reference.toISOString(),
            instant: result.instant.toISOString(),
            quantity: result.quantity,
            unit: result.unit,
          }
        : {
            input: text,
            reference: reference.toISOString(),
            error: { reason: result.error.reason, message: result.error.message },
          }
    );
    return result;
  }

  if (result.success) {
    base.keyValue('Input', text);
    base.keyValue('Reference', reference.toISOString());
    base.keyValue('Resolved', chalk.bold(result.instant.toISOString()));
  } else {
    base.fail(result.error.message);
  }

  return result;
}

export default registerParseCommand;
