/**
 * Taxpayer / spouse attribution.
 *
 * Ownership comes from the file name alone (the back office names uploads
 * "WI 19 TP", "WI S 19", "AT 23 E.pdf" and so on). Per-owner totals then
 * feed the missing-spouse advisories, which are hints for a human reviewer
 * and never fail a request.
 */

import type {
  AccountOwnerBucket,
  AccountOwnerTotals,
  AccountRecord,
  FormsByYear,
  Owner,
  OwnerAnalysis,
  OwnerBucket,
  OwnerTotals,
} from '../model/types.ts'

// ── Owner from file name ─────────────────────────────────────────

/** Tried in order; the first rule that matches decides. */
const OWNER_RULES: ReadonlyArray<{ pattern: RegExp; owner: Owner }> = [
  { pattern: /\bS\b|\bSPOUSE\b/, owner: 'S' },
  // Account transcripts mark the spouse's copy with a trailing E
  { pattern: /AT\s+\d{2}\s+E/, owner: 'S' },
  { pattern: /\bTP\b/, owner: 'TP' },
  { pattern: /\b(?:COMBINED|JOINT)\b/, owner: null },
]

/** Word-boundary match against the upper-cased name; defaults to the taxpayer. */
export function resolveOwner(fileName: string): Owner {
  const name = fileName.toUpperCase().trim()
  if (name === '') return 'TP'
  for (const rule of OWNER_RULES) {
    if (rule.pattern.test(name)) return rule.owner
  }
  return 'TP'
}

// ── Filing status ────────────────────────────────────────────────

const MARRIED_STATUSES = new Set(['MARRIED FILING JOINTLY', 'MARRIED FILING SEPARATELY', 'MFJ', 'MFS'])

export function isMarriedFiler(filingStatus: string | null | undefined): boolean {
  if (!filingStatus) return false
  return MARRIED_STATUSES.has(filingStatus.trim().toUpperCase())
}

// ── Wage & income roll-up ────────────────────────────────────────

function emptyBucket(): OwnerBucket {
  return { income: 0, withholding: 0, seIncome: 0, nonSeIncome: 0 }
}

function ownerBucketKey(owner: Owner): 'taxpayer' | 'spouse' | 'joint' {
  if (owner === 'S') return 'spouse'
  if (owner === null) return 'joint'
  return 'taxpayer'
}

export function aggregateByOwner(formsByYear: FormsByYear): Map<string, OwnerTotals> {
  const totals = new Map<string, OwnerTotals>()

  for (const [year, forms] of formsByYear) {
    const yearTotals: OwnerTotals = {
      taxpayer: emptyBucket(),
      spouse: emptyBucket(),
      joint: emptyBucket(),
      combined: emptyBucket(),
    }

    for (const form of forms) {
      for (const bucket of [yearTotals[ownerBucketKey(form.owner)], yearTotals.combined]) {
        bucket.income += form.income
        bucket.withholding += form.withholding
        if (form.category === 'SE') bucket.seIncome += form.income
        else if (form.category === 'NonSE') bucket.nonSeIncome += form.income
      }
    }

    totals.set(year, yearTotals)
  }

  return totals
}

export function detectMissingSpouseData(
  totals: ReadonlyMap<string, OwnerTotals>,
  filingStatus: string | null | undefined,
): string[] {
  if (!isMarriedFiler(filingStatus)) return []

  const recommendations: string[] = []
  for (const [year, yearTotals] of totals) {
    const tp = yearTotals.taxpayer.income
    const s = yearTotals.spouse.income
    if (tp > 0 && s === 0) {
      recommendations.push(`Year ${year}: Consider checking for spouse income - only taxpayer income found`)
    } else if (tp === 0 && s > 0) {
      recommendations.push(`Year ${year}: Consider checking for taxpayer income - only spouse income found`)
    } else if (tp === 0 && s === 0) {
      recommendations.push(`Year ${year}: No income found for either spouse - verify transcript completeness`)
    }
  }
  return recommendations
}

// ── Account transcript roll-up ───────────────────────────────────

function emptyAccountBucket(): AccountOwnerBucket {
  return { records: 0, transactions: 0, accountBalance: 0 }
}

export function aggregateAccountByOwner(records: readonly AccountRecord[]): Map<string, AccountOwnerTotals> {
  const totals = new Map<string, AccountOwnerTotals>()

  for (const record of records) {
    let yearTotals = totals.get(record.taxYear)
    if (!yearTotals) {
      yearTotals = { taxpayer: emptyAccountBucket(), spouse: emptyAccountBucket(), combined: emptyAccountBucket() }
      totals.set(record.taxYear, yearTotals)
    }

    const own = record.owner === 'S' ? yearTotals.spouse : yearTotals.taxpayer
    for (const bucket of [own, yearTotals.combined]) {
      bucket.records += 1
      bucket.transactions += record.transactions.length
      bucket.accountBalance += record.accountBalance
    }
  }

  return totals
}

export function detectMissingSpouseAccountData(
  totals: ReadonlyMap<string, AccountOwnerTotals>,
  filingStatus: string | null | undefined,
): string[] {
  if (!isMarriedFiler(filingStatus)) return []

  const recommendations: string[] = []
  for (const [year, yearTotals] of totals) {
    const tp = yearTotals.taxpayer.records
    const s = yearTotals.spouse.records
    if (tp > 0 && s === 0) {
      recommendations.push(`Year ${year}: Consider checking for spouse AT transcript - only taxpayer records found`)
    } else if (tp === 0 && s > 0) {
      recommendations.push(`Year ${year}: Consider checking for taxpayer AT transcript - only spouse records found`)
    } else if (tp === 0 && s === 0) {
      recommendations.push(`Year ${year}: No AT records found for either spouse - verify transcript availability`)
    }
  }
  return recommendations
}

// ── Combined analysis ────────────────────────────────────────────

export interface OwnerAnalysisInput {
  formsByYear?: FormsByYear | null
  accountRecords?: readonly AccountRecord[] | null
  filingStatus?: string | null
}

export function buildOwnerAnalysis(input: OwnerAnalysisInput): OwnerAnalysis {
  const filingStatus = input.filingStatus ?? null
  const recommendations: string[] = []
  const years = new Set<string>()
  let hasTaxpayerData = false
  let hasSpouseData = false

  let wiTotals: Map<string, OwnerTotals> | null = null
  if (input.formsByYear && input.formsByYear.size > 0) {
    wiTotals = aggregateByOwner(input.formsByYear)
    recommendations.push(...detectMissingSpouseData(wiTotals, filingStatus))
    for (const [year, t] of wiTotals) {
      years.add(year)
      hasTaxpayerData ||= t.taxpayer.income > 0
      hasSpouseData ||= t.spouse.income > 0
    }
  }

  let atTotals: Map<string, AccountOwnerTotals> | null = null
  if (input.accountRecords && input.accountRecords.length > 0) {
    atTotals = aggregateAccountByOwner(input.accountRecords)
    recommendations.push(...detectMissingSpouseAccountData(atTotals, filingStatus))
    for (const [year, t] of atTotals) {
      years.add(year)
      hasTaxpayerData ||= t.taxpayer.records > 0
      hasSpouseData ||= t.spouse.records > 0
    }
  }

  return {
    filingStatus,
    missingDataRecommendations: recommendations,
    wiTotalsByYear: wiTotals,
    atTotalsByYear: atTotals,
    hasWiData: input.formsByYear != null,
    hasAtData: input.accountRecords != null,
    yearsAnalyzed: [...years].sort().reverse(),
    hasTaxpayerData,
    hasSpouseData,
  }
}
