/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - filter: Filter a comment file by calendar date range
 * - parse: Resolve a single relative time string
 * - timezone: Show the timezone for a region code
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerFilterCommand } from './filter.js';
import { registerParseCommand } from './parse.js';
import { registerTimezoneCommand } from './timezone.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerFilterCommand(program);
  registerParseCommand(program);
  registerTimezoneCommand(program);
}

/**
 * Get help text for all available commands.
 *
 * @returns Array of command names and descriptions
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'filter <file>', description: 'Filter comments in a JSON file by calendar date range' },
    { name: 'parse <text>', description: 'Resolve a relative time string to an absolute time' },
    { name: 'timezone [region]', description: 'Show the timezone used for a region code' },
  ];
}

// Re-export individual command registrations and handlers for testing
export { registerFilterCommand, handleFilter } from './filter.js';
export { registerParseCommand, handleParse } from './parse.js';
export { registerTimezoneCommand, handleTimezone } from './timezone.js';
