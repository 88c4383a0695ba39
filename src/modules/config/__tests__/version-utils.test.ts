/**
 * Unit tests for version-utils.ts
 */

import { describe, it, expect } from 'vitest'
import { isVersionSupported, formatUnsupportedVersionError } from '../version-utils.js'

describe('isVersionSupported', () => {
  const supported = ['1', '2'] as const

  it('returns true for a listed version', () => {
    expect(isVersionSupported('2', supported)).toBe(true)
  })

  it('returns false for an unlisted version', () => {
    expect(isVersionSupported('3', supported)).toBe(false)
  })

  it('returns false for an empty list', () => {
    expect(isVersionSupported('1', [])).toBe(false)
  })
})

describe('formatUnsupportedVersionError', () => {
  it('names the version found and the versions supported', () => {
    expect(formatUnsupportedVersionError('7', ['1', '2'])).toBe(
      'Configuration format version "7" is not supported. ' +
        'This tool supports: 1, 2. ' +
        'Upgrade tribunal or set config_format_version to a supported value.',
    )
  })
})
