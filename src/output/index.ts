/**
 * Output exports.
 *
 * @module output
 */

export {
  sortImporters,
  formatCount,
  formatImporterTable,
  formatImporterJson,
  isSortOrder,
  isOutputFormat,
  SORT_ORDERS,
  OUTPUT_FORMATS,
  type SortOrder,
  type OutputFormat,
} from './format.js';
