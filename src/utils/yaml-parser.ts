/**
 * YAML extraction and parsing for model output.
 *
 * Models are asked to end their answer with a YAML block. This module
 * extracts and validates that block regardless of surrounding narrative,
 * reasoning, or code fences.
 *
 * Extraction strategy:
 * 1. Look for fenced YAML blocks (```yaml...```) containing an anchor key
 * 2. Fall back to unfenced lines starting at the last anchor key
 * 3. If multiple blocks exist, take the LAST one
 * 4. Parse with js-yaml and validate with a Zod schema
 */

import yaml from 'js-yaml'
import type { ZodType, ZodTypeDef } from 'zod'

// ---------------------------------------------------------------------------
// extractYamlBlock
// ---------------------------------------------------------------------------

/**
 * Extract the trailing YAML block from model output.
 *
 * @param output - Raw text returned by the model
 * @param anchorKeys - Top-level keys (with trailing colon) that open the block, e.g. `verdict:`
 * @returns The raw YAML string, or null if no block is found
 */
export function extractYamlBlock(output: string, anchorKeys: readonly string[]): string | null {
  if (!output || output.trim() === '') {
    return null
  }

  // Fenced blocks first; the last one wins
  const fencedResult = extractLastFencedYaml(output, anchorKeys)
  if (fencedResult !== null) {
    return fencedResult
  }

  // Fall back to unfenced YAML starting with a known anchor key
  return extractUnfencedYaml(output, anchorKeys)
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function extractLastFencedYaml(output: string, anchorKeys: readonly string[]): string | null {
  // ```yaml\n...\n``` or ```\n...\n```
  const fencePattern = /```(?:ya?ml)?[ \t]*\r?\n([\s\S]*?)```/g

  let lastMatch: string | null = null
  let match: RegExpExecArray | null

  while ((match = fencePattern.exec(output)) !== null) {
    const content = match[1]
    if (content !== undefined && content.trim() !== '' && containsAnchorKey(content, anchorKeys)) {
      lastMatch = content.trim()
    }
  }

  return lastMatch
}

/**
 * Collect every line from the last anchor line to the end of the output.
 */
function extractUnfencedYaml(output: string, anchorKeys: readonly string[]): string | null {
  const lines = output.split('\n')

  let anchorLineIdx = -1
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i]
    if (line !== undefined && isAnchorLine(line, anchorKeys)) {
      anchorLineIdx = i
      break
    }
  }

  if (anchorLineIdx === -1) {
    return null
  }

  const yamlText = lines.slice(anchorLineIdx).join('\n').trim()
  return yamlText !== '' ? yamlText : null
}

function isAnchorLine(line: string, anchorKeys: readonly string[]): boolean {
  // Anchors are top-level keys: no indentation
  return anchorKeys.some((key) => line.startsWith(key))
}

function containsAnchorKey(content: string, anchorKeys: readonly string[]): boolean {
  return content.split('\n').some((line) => isAnchorLine(line, anchorKeys))
}

// ---------------------------------------------------------------------------
// parseYamlResult
// ---------------------------------------------------------------------------

/**
 * Parse a YAML string and validate it against a Zod schema.
 *
 * @returns Object with parsed result and optional error
 */
export function parseYamlResult<T, I = T>(
  yamlText: string,
  schema: ZodType<T, ZodTypeDef, I>,
): { parsed: T | null; error: string | null } {
  let raw: unknown

  try {
    raw = yaml.load(yamlText)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return { parsed: null, error: `YAML parse error: ${message}` }
  }

  if (raw === null || raw === undefined) {
    return { parsed: null, error: 'YAML parsed to null or undefined' }
  }

  const result = schema.safeParse(raw)
  if (result.success) {
    return { parsed: result.data, error: null }
  }

  const issues = result.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ')
  return { parsed: null, error: `Schema validation error: ${issues}` }
}
