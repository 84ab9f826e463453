/**
 * Form aggregator: turns one block's extracted fields into a FormRecord.
 */

import type {
  ExtractedField,
  FormBlock,
  FormRecord,
  NumericFields,
  Owner,
  PatternEntry,
  RawFields,
} from '../model/types.ts'
import { formConfidence } from './confidence.ts'

/** Fields read directly when a form has no calculation rule, first present wins. */
export const CONVENTIONAL_INCOME_FIELDS = ['wages', 'nonemployee_compensation'] as const
export const CONVENTIONAL_WITHHOLDING_FIELDS = ['federal_withholding'] as const

const BLURB_LABEL = /^\s*(?:Employer|Payer|Issuer\/Provider|Issuer|Filer|Creditor)\s*:\s*$/i
const BLURB_STOP = /^\s*(?:Employee|Recipient|Submission)\b/i
const BLURB_MAX_LINES = 4

export interface FormContext {
  owner: Owner
  sourceFile: string
}

/** Non-numeric values read as absent. */
export function numericFields(fields: Iterable<ExtractedField>): NumericFields {
  const out = new Map<string, number>()
  for (const field of fields) {
    if (field.numericValue !== null) out.set(field.name, field.numericValue)
  }
  return out
}

export function rawFields(fields: Iterable<ExtractedField>): RawFields {
  const out = new Map<string, string>()
  for (const field of fields) out.set(field.name, field.rawValue)
  return out
}

function firstPresent(fields: NumericFields, names: readonly string[]): number {
  for (const name of names) {
    const value = fields.get(name)
    if (value !== undefined) return value
  }
  return 0
}

export function computeIncome(entry: PatternEntry, fields: NumericFields, raw: RawFields = new Map()): number {
  return entry.calculation
    ? entry.calculation.income(fields, raw)
    : firstPresent(fields, CONVENTIONAL_INCOME_FIELDS)
}

export function computeWithholding(entry: PatternEntry, fields: NumericFields, raw: RawFields = new Map()): number {
  return entry.calculation
    ? entry.calculation.withholding(fields, raw)
    : firstPresent(fields, CONVENTIONAL_WITHHOLDING_FIELDS)
}

/**
 * The issuer's name-and-address lines: what follows the Employer:/Payer:
 * label, up to four lines, stopping at the recipient section.
 */
export function extractPayerBlurb(lines: readonly string[]): string | null {
  const start = lines.findIndex((line) => BLURB_LABEL.test(line))
  if (start === -1) return null

  const out: string[] = []
  for (const line of lines.slice(start + 1)) {
    const trimmed = line.trim()
    if (trimmed === '' || BLURB_STOP.test(trimmed) || out.length === BLURB_MAX_LINES) break
    out.push(trimmed)
  }
  return out.length > 0 ? out.join('\n') : null
}

export function buildFormRecord(
  block: FormBlock,
  fields: readonly ExtractedField[],
  entry: PatternEntry,
  context: FormContext,
): FormRecord {
  const byName = new Map(fields.map((f) => [f.name, f]))
  const numeric = numericFields(fields)
  const raw = rawFields(fields)

  let uniqueId: string | null = null
  if (entry.idField) uniqueId = byName.get(entry.idField)?.rawValue ?? 'UNKNOWN'

  return {
    formType: block.formType,
    canonicalFormCode: entry.formCode,
    owner: context.owner,
    fields: byName,
    income: computeIncome(entry, numeric, raw),
    withholding: computeWithholding(entry, numeric, raw),
    category: entry.category,
    uniqueId,
    label: entry.label,
    payerBlurb: extractPayerBlurb(block.lines),
    sourceFile: context.sourceFile,
    formConfidence: formConfidence(fields.map((f) => f.confidenceScore)),
  }
}
