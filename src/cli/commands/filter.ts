/**
 * Filter Command
 *
 * Reads comments grouped by video from a JSON file, resolves each comment's
 * relative timestamp and keeps those inside an inclusive calendar date range
 * interpreted in the region's timezone.
 *
 * Input is either normalized records (`commentId` + `relativeTimeText`) or,
 * with --raw, comment payloads as returned by the search API.
 *
 * @module cli/commands/filter
 */

import type { Command } from 'commander';
import { config, resolveOutputPath } from '../../config/index.js';
import { normalizeCommentsByVideo, type NormalizationStats } from '../../comments/normalize.js';
import { validateDateRange, type DateRange } from '../../dates/date-range.js';
import { resolveRegionTimezone } from '../../dates/timezones.js';
import {
  filterCommentsByDateRange,
  type FilterStatistics,
} from '../../filter/comment-date-filter.js';
import { summarizeFilterStatistics } from '../../filter/summary.js';
import {
  CommentsByVideoSchema,
  RawCommentsByVideoSchema,
} from '../../schemas/comment.js';
import { FilterRequestSchema, hasDateRange } from '../../schemas/filter-request.js';
import { atomicWriteJson, readJson } from '../../storage/atomic.js';
import type { CommentRecord } from '../../types/index.js';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { createSpinner, formatFilterReport, formatNormalizationLine } from '../formatters/index.js';
import { failCommand, formatZodIssues, parseReferenceInstant } from './options.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the filter command.
 */
export interface FilterCommandOptions {
  /** Start date (YYYY-MM-DD) */
  start?: string;
  /** End date (YYYY-MM-DD) */
  end?: string;
  /** Region code used to pick the timezone */
  region?: string;
  /** Reference instant (ISO8601); defaults to now */
  reference?: string;
  /** Input holds raw search API comment payloads */
  raw?: boolean;
  /** Keep comments flagged as spam when normalizing raw input */
  keepSpam?: boolean;
  /** Write the result JSON to this file */
  output?: string;
  /** Output format */
  format?: 'text' | 'json';
}

/**
 * Everything the filter command produces.
 */
export interface FilterCommandOutput {
  /** Reference instant used for all comments */
  reference: string;
  region: string;
  /** Resolved timezone, or null when no date range was given */
  timezone: string | null;
  commentsByVideo: Record<string, CommentRecord[]>;
  /** Filter statistics, or null when no date range was given */
  stats: FilterStatistics | null;
  /** Plain-text summary of the statistics, or null when no date range was given */
  summary: string | null;
  /** Present for --raw input */
  normalization?: NormalizationStats;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the filter command.
 *
 * @param program - Root commander program
 */
export function registerFilterCommand(program: Command): void {
  program
    .command('filter <file>')
    .description('Filter comments in a JSON file by calendar date range')
    .option('-s, --start <date>', 'Start date (YYYY-MM-DD)')
    .option('-e, --end <date>', 'End date (YYYY-MM-DD)')
    .option('-r, --region <code>', 'Region code used to pick the timezone (e.g., US, GB, JP)')
    .option('--reference <timestamp>', 'Reference time for relative dates (ISO8601, default: now)')
    .option('--raw', 'Input contains raw search API comment payloads')
    .option('--keep-spam', 'Keep comments flagged as likely spam (with --raw)')
    .option('-o, --output <file>', 'Write the filtered result as JSON')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action(async (file: string, options: FilterCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent);

      try {
        await handleFilter(file, options, base);
      } catch (error) {
        failCommand(base, error);
      }
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle the filter command.
 *
 * @param file - Path to the input JSON file
 * @param options - Command options
 * @param base - Base command for output and logging
 * @returns The filtered collection and statistics
 * @throws ZodError or DateRangeValidationError on invalid options
 * @throws FileNotFoundError if the input file does not exist
 */
export async function handleFilter(
  file: string,
  options: FilterCommandOptions,
  base: BaseCommand
): Promise<FilterCommandOutput> {
  const request = FilterRequestSchema.parse({
    startDate: options.start,
    endDate: options.end,
    region: options.region ?? config.defaultRegion,
  });
  const reference = parseReferenceInstant(options.reference);

  let range: DateRange | null = null;
  if (hasDateRange(request)) {
    const timezone = resolveRegionTimezone(request.region, base);
    range = validateDateRange(request.startDate, request.endDate, timezone);
  }

  base.debug(`Reference time: ${reference.toISOString()}`);

  const spinner = createSpinner(`Reading ${file}...`, { silent: base.isQuiet() }).start();
  let commentsByVideo: Record<string, CommentRecord[]>;
  let normalization: NormalizationStats | undefined;

  try {
    const data = await readJson(file);

    if (options.raw) {
      const rawByVideo = RawCommentsByVideoSchema.safeParse(data);
      if (!rawByVideo.success) {
        throw new Error(`Invalid comment file ${file}: ${formatZodIssues(rawByVideo.error)}`);
      }
      const normalized = normalizeCommentsByVideo(rawByVideo.data, {
        dropSpam: options.keepSpam !== true,
        logger: base,
      });
      commentsByVideo = normalized.commentsByVideo;
      normalization = normalized.stats;
    } else {
      const parsed = CommentsByVideoSchema.safeParse(data);
      if (!parsed.success) {
        throw new Error(`Invalid comment file ${file}: ${formatZodIssues(parsed.error)}`);
      }
      commentsByVideo = parsed.data;
    }
  } catch (error) {
    spinner.fail(`Could not read ${file}`);
    throw error;
  }

  spinner.succeed(`Loaded ${Object.keys(commentsByVideo).length} videos from ${file}`);

  let output: FilterCommandOutput;

  if (range) {
    const result = filterCommentsByDateRange(commentsByVideo, range, reference, { logger: base });

    output = {
      reference: reference.toISOString(),
      region: request.region.toUpperCase(),
      timezone: range.timezone,
      commentsByVideo: result.commentsByVideo,
      stats: result.stats,
      summary: summarizeFilterStatistics(result.stats),
      normalization,
    };
  } else {
    base.info('No date range given; comments are returned unfiltered.');
    output = {
      reference: reference.toISOString(),
      region: request.region.toUpperCase(),
      timezone: null,
      commentsByVideo,
      stats: null,
      summary: null,
      normalization,
    };
  }

  if (options.output) {
    const outputPath = resolveOutputPath(options.output);
    await atomicWriteJson(outputPath, output);
    base.debug(`Wrote result to ${outputPath}`);
  }

  if (options.format === 'json') {
    base.json(output);
  } else {
    printFilterOutput(output, base);
  }

  return output;
}

/**
 * Print the text form of a filter result.
 */
function printFilterOutput(output: FilterCommandOutput, base: BaseCommand): void {
  base.section('Comment Date Filter');
  base.keyValue('Reference', output.reference);
  base.keyValue('Region', output.region);

  if (output.normalization) {
    base.info(formatNormalizationLine(output.normalization));
  }

  if (output.stats) {
    base.blank();
    for (const line of formatFilterReport(output.stats)) {
      base.info(line);
    }
  }

  base.blank();
  for (const [videoId, comments] of Object.entries(output.commentsByVideo)) {
    base.keyValue(videoId, `${comments.length} comments`);
  }
}

export default registerFilterCommand;
