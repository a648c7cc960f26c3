import type { RawContent } from "../../ports/document"

const COUNTER_PATTERN = /^-?\d+$/

/**
 * Parse a counter's stored text. `undefined` when it is not a base-10 safe integer.
 */
export function parseCounter(content: RawContent): number | undefined {
  if (!COUNTER_PATTERN.test(content)) return undefined
  const value = Number(content)
  return Number.isSafeInteger(value) ? value : undefined
}

export function formatCounter(value: number): RawContent {
  return String(value)
}
