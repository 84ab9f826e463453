/**
 * Reconciliation self-check.
 *
 * Re-derives each year's bucket totals without going through the aggregator
 * or buildYearSummaries: the bucket comes from the pattern table entry for
 * the form code, the amounts from the form's extracted fields. The record's
 * own `income` and `withholding` are never read. A disagreement of 1e-6 or
 * more with the summary is reported as `match: false`; it never throws.
 */

import type { FormRecord, FormsByYear, IncomeCategory, PatternEntry, YearSummary } from '../model/types.ts'
import { PATTERN_TABLE } from '../patterns/patternTable.ts'
import type { PatternTable } from '../patterns/patternTable.ts'
import { CONVENTIONAL_INCOME_FIELDS, CONVENTIONAL_WITHHOLDING_FIELDS } from '../transcript/formAggregator.ts'

export const RECONCILIATION_TOLERANCE = 1e-6

export type IncomeBucket = 'se_income' | 'non_se_income' | 'other_income'

export type BucketTotals = Record<IncomeBucket, number>

export interface TroubleshootLine {
  form: string
  uniqueId: string | null
  category: IncomeCategory
  /** Numeric, non-zero fields the income was computed from. */
  fieldsUsed: Record<string, number>
  incomeContribution: number
  withholdingContribution: number
  bucket: IncomeBucket
}

export interface YearTroubleshoot {
  lines: TroubleshootLine[]
  bucketTotals: BucketTotals
  summaryTotals: BucketTotals
  match: boolean
}

const BUCKETS: readonly IncomeBucket[] = ['se_income', 'non_se_income', 'other_income']

function bucketFor(category: IncomeCategory): IncomeBucket {
  if (category === 'SE') return 'se_income'
  if (category === 'NonSE') return 'non_se_income'
  return 'other_income'
}

function firstOf(numeric: ReadonlyMap<string, number>, names: readonly string[]): number {
  for (const name of names) {
    const value = numeric.get(name)
    if (value !== undefined) return value
  }
  return 0
}

/** Income and withholding straight from the fields, by the entry's rule or the conventional fields. */
function contributions(form: FormRecord, entry: PatternEntry | null): { income: number; withholding: number } {
  const numeric = new Map<string, number>()
  const raw = new Map<string, string>()
  for (const field of form.fields.values()) {
    raw.set(field.name, field.rawValue)
    if (field.numericValue !== null) numeric.set(field.name, field.numericValue)
  }

  if (entry?.calculation) {
    return {
      income: entry.calculation.income(numeric, raw),
      withholding: entry.calculation.withholding(numeric, raw),
    }
  }
  return {
    income: firstOf(numeric, CONVENTIONAL_INCOME_FIELDS),
    withholding: firstOf(numeric, CONVENTIONAL_WITHHOLDING_FIELDS),
  }
}

function troubleshootLine(form: FormRecord, table: PatternTable): TroubleshootLine {
  const entry = form.canonicalFormCode === null ? null : table.byCode(form.canonicalFormCode)
  const category = entry?.category ?? 'Other'
  const { income, withholding } = contributions(form, entry)

  const fieldsUsed: Record<string, number> = {}
  for (const field of form.fields.values()) {
    if (field.numericValue !== null && field.numericValue !== 0) fieldsUsed[field.name] = field.numericValue
  }

  return {
    form: form.canonicalFormCode ?? form.formType,
    uniqueId: form.uniqueId,
    category,
    fieldsUsed,
    incomeContribution: income,
    withholdingContribution: withholding,
    bucket: bucketFor(category),
  }
}

export function buildTroubleshoot(
  formsByYear: FormsByYear,
  summaries: ReadonlyMap<string, YearSummary>,
  table: PatternTable = PATTERN_TABLE,
): Map<string, YearTroubleshoot> {
  const out = new Map<string, YearTroubleshoot>()

  for (const [year, forms] of formsByYear) {
    const lines = forms.map((form) => troubleshootLine(form, table))

    const bucketTotals: BucketTotals = { se_income: 0, non_se_income: 0, other_income: 0 }
    for (const line of lines) bucketTotals[line.bucket] += line.incomeContribution

    const summary = summaries.get(year)
    const summaryTotals: BucketTotals = {
      se_income: summary?.seIncome ?? 0,
      non_se_income: summary?.nonSeIncome ?? 0,
      other_income: summary?.otherIncome ?? 0,
    }

    const match = BUCKETS.every(
      (k) => Math.abs(bucketTotals[k] - summaryTotals[k]) < RECONCILIATION_TOLERANCE,
    )
    out.set(year, { lines, bucketTotals, summaryTotals, match })
  }

  return out
}
