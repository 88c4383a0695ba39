/**
 * General utility helpers for Tribunal
 */

import { randomUUID } from 'crypto'
import { InvalidConfigError } from '../core/errors.js'

/** Largest delay setTimeout honours; Node fires longer delays after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

/**
 * Sleep for a given number of milliseconds
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Generate a unique identifier using crypto.randomUUID()
 * @param prefix - Optional prefix for the ID
 */
export function generateId(prefix = ''): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Normalize an unknown thrown value into an Error instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

/**
 * Check that a timeout is a positive integer a timer can actually wait for.
 *
 * @throws {InvalidConfigError} for zero, negative, fractional or oversized values
 */
export function validateTimeoutMs(value: number, name: string): number {
  if (!Number.isInteger(value) || value <= 0 || value > MAX_TIMER_DELAY_MS) {
    throw new InvalidConfigError(
      `${name} must be an integer between 1 and ${String(MAX_TIMER_DELAY_MS)}, got ${String(value)}`,
      { [name]: value },
    )
  }
  return value
}
