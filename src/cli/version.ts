/**
 * CLI Version Information
 *
 * Synchronized with package.json version.
 *
 * @module cli/version
 */

/**
 * Current CLI version.
 */
export const VERSION = '1.0.0';

/**
 * Get version information for display.
 *
 * @returns Formatted version string
 */
export function getVersionInfo(): string {
  return `pkgimporters v${VERSION}`;
}
