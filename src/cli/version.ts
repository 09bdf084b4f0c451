/**
 * CLI Version Information
 *
 * Synchronized with package.json version.
 *
 * @module cli/version
 */

export const VERSION = '0.1.0';

/**
 * Get version information for display.
 */
export function getVersionInfo(): string {
  return `Creator Signals v${VERSION}`;
}
