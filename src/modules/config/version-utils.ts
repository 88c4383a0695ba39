/**
 * Version utility functions for config format versioning.
 */

/**
 * Check whether a version string is in a list of supported versions.
 */
export function isVersionSupported(version: string, supported: readonly string[]): boolean {
  return supported.includes(version)
}

/**
 * Format the standard "unsupported version" error message.
 *
 * @param version - The unsupported version string found
 * @param supported - List of supported version strings
 */
export function formatUnsupportedVersionError(version: string, supported: readonly string[]): string {
  return (
    `Configuration format version "${version}" is not supported. ` +
    `This tool supports: ${supported.join(', ')}. ` +
    `Upgrade tribunal or set config_format_version to a supported value.`
  )
}
