/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export {
  ProgressSpinner,
  formatDuration,
  createSpinner,
  type SpinnerOptions,
} from './progress.js';

export { formatFilterReport, formatNormalizationLine } from './filter-report.js';
