/**
 * Timezone Command
 *
 * Shows the timezone a region code resolves to, or the whole table.
 *
 * @module cli/commands/timezone
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { config } from '../../config/index.js';
import { isKnownRegion, listRegionTimezones, resolveRegionTimezone } from '../../dates/timezones.js';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { failCommand } from './options.js';

/**
 * Options for the timezone command.
 */
export interface TimezoneCommandOptions {
  /** List every known region */
  list?: boolean;
  /** Output format */
  format?: 'text' | 'json';
}

/**
 * Resolved region, as printed in JSON mode.
 */
export interface TimezoneLookup {
  region: string;
  timezone: string;
  known: boolean;
}

/**
 * Register the timezone command.
 */
export function registerTimezoneCommand(program: Command): void {
  program
    .command('timezone [region]')
    .description('Show the timezone used for a region code')
    .option('-l, --list', 'List all known regions')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action((region: string | undefined, options: TimezoneCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent);

      try {
        handleTimezone(region, options, base);
      } catch (error) {
        failCommand(base, error);
      }
    });
}

/**
 * Handle the timezone command.
 *
 * @param region - Region code; the configured default when omitted
 * @returns The lookups that were printed
 */
export function handleTimezone(
  region: string | undefined,
  options: TimezoneCommandOptions,
  base: BaseCommand
): TimezoneLookup[] {
  const lookups: TimezoneLookup[] = options.list
    ? listRegionTimezones().map((entry) => ({ ...entry, known: true }))
    : [lookupRegion(region ?? config.defaultRegion)];

  if (options.format === 'json') {
    base.json(options.list ? lookups : lookups[0]);
    return lookups;
  }

  for (const lookup of lookups) {
    const suffix = lookup.known ? '' : chalk.yellow(' (unknown region, using UTC)');
    base.keyValue(lookup.region, `${lookup.timezone}${suffix}`);
  }

  return lookups;
}

function lookupRegion(region: string): TimezoneLookup {
  return {
    region: region.trim().toUpperCase(),
    timezone: resolveRegionTimezone(region),
    known: isKnownRegion(region),
  };
}

export default registerTimezoneCommand;
