/**
 * Region Timezone Resolver
 *
 * Maps ISO-3166 region codes to one representative IANA timezone.
 * Multi-zone countries get a single zone (US → America/New_York,
 * AU → Australia/Sydney).
 *
 * The table is loaded once from region-timezones.json into a read-only map.
 *
 * @module dates/timezones
 */

import { z } from 'zod';
import type { Logger } from '../types/index.js';
import regionTimezoneTable from './region-timezones.json';

// ============================================================================
// Constants
// ============================================================================

/** Zone used for unknown or empty region codes */
export const FALLBACK_TIMEZONE = 'UTC';

const RegionTimezoneTableSchema = z.record(
  z.string().regex(/^[A-Z]{2,5}$/, 'Region codes must be 2-5 uppercase letters'),
  z.string().min(1)
);

const REGION_TIMEZONES: ReadonlyMap<string, string> = new Map(
  Object.entries(RegionTimezoneTableSchema.parse(regionTimezoneTable))
);

// ============================================================================
// Resolution
// ============================================================================

/**
 * Get the timezone for a region code.
 *
 * Lookup is case-insensitive. Unknown or empty codes resolve to UTC;
 * this never fails.
 *
 * @example
 * ```typescript
 * resolveRegionTimezone('US'); // 'America/New_York'
 * resolveRegionTimezone('jp'); // 'Asia/Tokyo'
 * resolveRegionTimezone('zz'); // 'UTC'
 * ```
 */
export function resolveRegionTimezone(regionCode: string, logger?: Logger): string {
  const timezone = REGION_TIMEZONES.get(normalizeRegionCode(regionCode));

  if (timezone === undefined) {
    logger?.warn(`Unknown region code '${regionCode}', using ${FALLBACK_TIMEZONE} timezone`);
    return FALLBACK_TIMEZONE;
  }

  logger?.debug(`Mapped region '${regionCode}' to timezone '${timezone}'`);
  return timezone;
}

/**
 * Check whether a region code has an entry in the table.
 */
export function isKnownRegion(regionCode: string): boolean {
  return REGION_TIMEZONES.has(normalizeRegionCode(regionCode));
}

/**
 * List every region → timezone pair, sorted by region code.
 */
export function listRegionTimezones(): Array<{ region: string; timezone: string }> {
  return [...REGION_TIMEZONES.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([region, timezone]) => ({ region, timezone }));
}

function normalizeRegionCode(regionCode: string): string {
  return regionCode.trim().toUpperCase();
}
