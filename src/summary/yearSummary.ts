/**
 * Per-year roll-up of form records into SE / Non-SE / Other buckets.
 */

import type { FormRecord, FormsByYear, OverallTotals, YearSummary } from '../model/types.ts'
import { roundCents } from '../model/rounding.ts'

/** Employer-equivalent half of SE tax, deducted from income for the AGI estimate. */
export const SE_TAX_ADJUSTMENT_RATE = 0.0765

export function estimateAgi(totalIncome: number, seIncome: number): number {
  return roundCents(totalIncome - seIncome * SE_TAX_ADJUSTMENT_RATE)
}

/** Group records by tax year, keeping first-seen order within a year. */
export function groupFormsByYear(entries: Iterable<{ taxYear: string; forms: readonly FormRecord[] }>): Map<string, FormRecord[]> {
  const byYear = new Map<string, FormRecord[]>()
  for (const { taxYear, forms } of entries) {
    const list = byYear.get(taxYear) ?? []
    list.push(...forms)
    byYear.set(taxYear, list)
  }
  return byYear
}

function summarizeYear(taxYear: string, forms: readonly FormRecord[]): YearSummary {
  let seIncome = 0
  let nonSeIncome = 0
  let otherIncome = 0
  let seWithholding = 0
  let nonSeWithholding = 0
  let otherWithholding = 0

  for (const form of forms) {
    switch (form.category) {
      case 'SE':
        seIncome += form.income
        seWithholding += form.withholding
        break
      case 'NonSE':
        nonSeIncome += form.income
        nonSeWithholding += form.withholding
        break
      case 'Other':
        otherIncome += form.income
        otherWithholding += form.withholding
        break
    }
  }

  const totalIncome = seIncome + nonSeIncome + otherIncome
  return {
    taxYear,
    forms,
    seIncome,
    nonSeIncome,
    otherIncome,
    seWithholding,
    nonSeWithholding,
    otherWithholding,
    totalIncome,
    totalWithholding: seWithholding + nonSeWithholding + otherWithholding,
    estimatedAgi: estimateAgi(totalIncome, seIncome),
  }
}

/** Summaries keyed by year, newest year first. */
export function buildYearSummaries(formsByYear: FormsByYear): Map<string, YearSummary> {
  const years = [...formsByYear.keys()].sort().reverse()
  const summaries = new Map<string, YearSummary>()
  for (const year of years) {
    summaries.set(year, summarizeYear(year, formsByYear.get(year) ?? []))
  }
  return summaries
}

export function buildOverallTotals(summaries: ReadonlyMap<string, YearSummary>): OverallTotals {
  let totalSeIncome = 0
  let totalNonSeIncome = 0
  let totalOtherIncome = 0
  let totalWithholding = 0

  for (const summary of summaries.values()) {
    totalSeIncome += summary.seIncome
    totalNonSeIncome += summary.nonSeIncome
    totalOtherIncome += summary.otherIncome
    totalWithholding += summary.totalWithholding
  }

  const totalIncome = totalSeIncome + totalNonSeIncome + totalOtherIncome
  return {
    totalSeIncome,
    totalNonSeIncome,
    totalOtherIncome,
    totalIncome,
    totalWithholding,
    estimatedAgi: estimateAgi(totalIncome, totalSeIncome),
  }
}
