/**
 * Credential masking utilities for CLI output and Pino logger redaction.
 *
 * Keeps generator credentials (bearer tokens for a proxied model host) out of
 * logs, config display and error messages.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify credential values embedded in free text.
 */
export const API_KEY_PATTERNS: RegExp[] = [
  // Authorization header values
  /Bearer\s+[A-Za-z0-9._~+/-]+=*/g,
  // OpenAI-compatible keys: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
]

/**
 * Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  'authorization',
  '*.apiKey',
  '*.api_key',
  '*.authorization',
  'headers.authorization',
  'generator.api_key_env',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known credential patterns in a string with `***`.
 *
 * Used on log messages and error strings.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

const CREDENTIAL_FIELDS = new Set([
  'api_key',
  'apiKey',
  'api_key_env',
  'token',
  'secret',
  'password',
])

/**
 * Deep-clone a plain-object tree and replace known credential fields with `***`.
 * Only operates on plain objects and arrays; primitives are returned as-is.
 */
export function deepMask<T>(value: T): T
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map((item: unknown) => deepMask(item))
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      if (CREDENTIAL_FIELDS.has(k) && v !== undefined) {
        masked[k] = MASKED_VALUE
      } else {
        masked[k] = deepMask(v)
      }
    }
    return masked
  }
  return value
}
