/**
 * Count extractor exports.
 *
 * @module extractor
 */

export { extractImporterCount, MAX_BODY_BYTES } from './count.js';
