/**
 * Field extractor: runs one pattern entry's field patterns over one block.
 *
 * Only the block's own lines are searched, so a value can never leak in from
 * a neighbouring form. Fields come out in pattern-table order; a field with
 * no matching line is left out rather than reported as zero.
 */

import type { ExtractedField, FormBlock, PatternEntry } from '../model/types.ts'
import { scoreConfidence } from './confidence.ts'

const NUMERIC = /^-?\d+(?:\.\d+)?$/

/** Drop currency symbols, thousands separators and whitespace. */
export function cleanValue(raw: string): string {
  return raw.replace(/[$,\s]/g, '')
}

/** Numeric value of a cleaned string, or null when it is not a plain number. */
export function parseAmount(value: string): number | null {
  if (!NUMERIC.test(value)) return null
  const n = Number(value)
  return Number.isFinite(n) ? n : null
}

export function extractFields(block: FormBlock, entry: PatternEntry): ExtractedField[] {
  const out: ExtractedField[] = []

  for (const [name, pattern] of entry.fields) {
    if (!pattern) continue

    for (const line of block.lines) {
      const match = pattern.exec(line)
      if (!match) continue

      const rawValue = cleanValue(match[1] ?? '')
      out.push({
        name,
        rawValue,
        numericValue: parseAmount(rawValue),
        sourceLine: line,
        confidenceScore: scoreConfidence(name, rawValue, entry.reliability),
        patternUsed: pattern.source,
        extractionMethod: 'regex',
      })
      break
    }
  }

  return out
}
