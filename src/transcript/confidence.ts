/**
 * Extraction confidence.
 *
 * A field's score blends three factors, each in [0, 1]:
 *   - what the field name says (money and identifier terms score higher)
 *   - the shape of the captured value (clean decimal > id-shaped > other)
 *   - how reliably the form type extracts (the pattern entry's reliability)
 *
 * The weights are policy and may be tuned; the score is monotonic in every
 * factor, clamped to [0, 1], and a clean decimal never scores below 0.7.
 */

import type { ConfidenceLevel } from '../model/types.ts'
import { roundTo } from '../model/rounding.ts'

export const CONFIDENCE_WEIGHTS = { name: 0.4, value: 0.3, form: 0.3 } as const

const MONEY_TERMS = ['income', 'wages', 'compensation', 'dividends', 'interest', 'proceeds', 'benefits']
const WITHHOLDING_TERMS = ['withholding', 'withheld', 'tax']
const IDENTIFIER_TERMS = ['ein', 'fin', 'identification']

const CLEAN_DECIMAL = /^-?\d+(?:\.\d+)?$/
const ID_SHAPED = /^[\dX]{2,}(?:-[\dX]+)+$|^X+\d+$/

const CLEAN_DECIMAL_FLOOR = 0.7

function nameFactor(fieldName: string): number {
  const terms = fieldName.toLowerCase().split('_')
  if (terms.some((t) => MONEY_TERMS.includes(t) || WITHHOLDING_TERMS.includes(t))) return 0.8
  if (terms.some((t) => IDENTIFIER_TERMS.includes(t))) return 0.7
  return 0.6
}

function valueFactor(value: string): number {
  if (value === '') return 0
  if (CLEAN_DECIMAL.test(value)) return 0.9
  if (ID_SHAPED.test(value)) return 0.8
  return 0.7
}

export function isCleanDecimal(value: string): boolean {
  return CLEAN_DECIMAL.test(value)
}

export function scoreConfidence(fieldName: string, value: string, formReliability: number): number {
  const blended =
    nameFactor(fieldName) * CONFIDENCE_WEIGHTS.name +
    valueFactor(value) * CONFIDENCE_WEIGHTS.value +
    formReliability * CONFIDENCE_WEIGHTS.form
  const floored = isCleanDecimal(value) ? Math.max(blended, CLEAN_DECIMAL_FLOOR) : blended
  return roundTo(Math.min(1, Math.max(0, floored)), 3)
}

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= 0.8) return 'high'
  if (score >= 0.6) return 'medium'
  if (score >= 0.3) return 'low'
  return 'unknown'
}

/** Mean of field scores; 0 for a form with no fields. */
export function formConfidence(scores: readonly number[]): number {
  if (scores.length === 0) return 0
  return roundTo(scores.reduce((a, b) => a + b, 0) / scores.length, 3)
}

export interface ConfidenceSummary {
  total_extractions: number
  average_confidence: number
  min_confidence: number
  max_confidence: number
  confidence_distribution: Record<ConfidenceLevel, number>
  high_confidence_rate: number
}

/** Roll field scores of many forms up into one report. */
export function summarizeConfidence(
  forms: ReadonlyArray<{ fields: ReadonlyMap<string, { confidenceScore: number }> }>,
): ConfidenceSummary {
  const scores = forms.flatMap((form) => [...form.fields.values()].map((f) => f.confidenceScore))
  const distribution: Record<ConfidenceLevel, number> = { high: 0, medium: 0, low: 0, unknown: 0 }
  for (const score of scores) distribution[confidenceLevel(score)]++

  if (scores.length === 0) {
    return {
      total_extractions: 0,
      average_confidence: 0,
      min_confidence: 0,
      max_confidence: 0,
      confidence_distribution: distribution,
      high_confidence_rate: 0,
    }
  }

  return {
    total_extractions: scores.length,
    average_confidence: roundTo(scores.reduce((a, b) => a + b, 0) / scores.length, 3),
    min_confidence: roundTo(Math.min(...scores), 3),
    max_confidence: roundTo(Math.max(...scores), 3),
    confidence_distribution: distribution,
    high_confidence_rate: roundTo(distribution.high / scores.length, 3),
  }
}
