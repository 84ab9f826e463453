/**
 * JSON shapes for case results.
 *
 * The analysis types hold Maps and camelCase names; the HTTP API and the
 * persisted analyses use plain objects with snake_case keys.
 */

import type { AccountCaseAnalysis, WageIncomeCaseAnalysis } from '../case/caseAnalysis.ts'
import type { BucketTotals, TroubleshootLine, YearTroubleshoot } from '../summary/troubleshoot.ts'
import type { ConfidenceSummary } from '../transcript/confidence.ts'
import type {
  AccountOwnerBucket,
  AccountOwnerTotals,
  AccountRecord,
  FormRecord,
  IncomeCategory,
  IssuerLabel,
  OverallTotals,
  Owner,
  OwnerAnalysis,
  OwnerBucket,
  OwnerTotals,
  YearSummary,
} from './types.ts'

export interface SerializedField {
  value: string
  numeric_value: number | null
  confidence_score: number
  source_line: string
}

export interface SerializedFormRecord {
  form: string | null
  form_type: string
  unique_id: string | null
  label: IssuerLabel | null
  owner: Owner
  category: IncomeCategory
  income: number
  withholding: number
  payer_blurb: string | null
  source_file: string
  form_confidence: number
  fields: Record<string, SerializedField>
}

export interface SerializedYearSummary {
  se_income: number
  non_se_income: number
  other_income: number
  se_withholding: number
  non_se_withholding: number
  other_withholding: number
  total_income: number
  total_withholding: number
  estimated_agi: number
  number_of_forms: number
  match: boolean
}

export interface SerializedTroubleshootLine {
  form: string
  unique_id: string | null
  category: IncomeCategory
  fields_used: Record<string, number>
  income_contribution: number
  withholding_contribution: number
  bucket: string
}

export interface SerializedYear {
  summary: SerializedYearSummary
  forms: SerializedFormRecord[]
  troubleshoot: {
    lines: SerializedTroubleshootLine[]
    bucket_totals: BucketTotals
    summary_totals: BucketTotals
  }
}

export interface SerializedOverallTotals {
  total_se_income: number
  total_non_se_income: number
  total_other_income: number
  total_income: number
  total_withholding: number
  estimated_agi: number
}

type SerializedOwnerBucket = { income: number; withholding: number; se_income: number; non_se_income: number }
type SerializedAccountBucket = { records: number; transactions: number; account_balance: number }

export interface SerializedOwnerAnalysis {
  filing_status: string | null
  missing_data_recommendations: string[]
  wi_totals_by_year?: Record<string, Record<keyof OwnerTotals, SerializedOwnerBucket>>
  at_totals_by_year?: Record<string, Record<keyof AccountOwnerTotals, SerializedAccountBucket>>
  analysis_metadata: {
    has_wi_data: boolean
    has_at_data: boolean
    years_analyzed: string[]
    has_taxpayer_data: boolean
    has_spouse_data: boolean
  }
}

export interface SerializedWageIncomeCase {
  case_id: string
  years_analyzed: string[]
  years: Record<string, SerializedYear>
  overall_totals: SerializedOverallTotals
  confidence_summary: ConfidenceSummary
  documents: Array<{
    file_name: string
    tax_year: string
    owner: Owner
    tracking_number: string | null
    forms_found: number
  }>
  tps_analysis?: SerializedOwnerAnalysis
}

export interface SerializedAccountRecord {
  tax_year: string
  account_balance: number
  accrued_interest: number
  accrued_penalty: number
  total_balance: number
  adjusted_gross_income: number
  taxable_income: number
  tax_per_return: number
  se_taxable_income_taxpayer: number
  se_taxable_income_spouse: number
  total_se_tax: number
  filing_status: string
  processing_date: string | null
  owner: Owner
  source_file: string
  transactions: Array<{
    code: string
    description: string
    meaning: string | null
    cycle_date: string
    date: string
    amount: number
  }>
}

export interface SerializedAccountCase {
  case_id: string
  records: SerializedAccountRecord[]
  tps_analysis?: SerializedOwnerAnalysis
}

// ── Forms and years ──────────────────────────────────────────────

export function serializeFormRecord(form: FormRecord): SerializedFormRecord {
  const fields: Record<string, SerializedField> = {}
  for (const [name, field] of form.fields) {
    fields[name] = {
      value: field.rawValue,
      numeric_value: field.numericValue,
      confidence_score: field.confidenceScore,
      source_line: field.sourceLine,
    }
  }
  return {
    form: form.canonicalFormCode,
    form_type: form.formType,
    unique_id: form.uniqueId,
    label: form.label,
    owner: form.owner,
    category: form.category,
    income: form.income,
    withholding: form.withholding,
    payer_blurb: form.payerBlurb,
    source_file: form.sourceFile,
    form_confidence: form.formConfidence,
    fields,
  }
}

function serializeTroubleshootLine(line: TroubleshootLine): SerializedTroubleshootLine {
  return {
    form: line.form,
    unique_id: line.uniqueId,
    category: line.category,
    fields_used: line.fieldsUsed,
    income_contribution: line.incomeContribution,
    withholding_contribution: line.withholdingContribution,
    bucket: line.bucket,
  }
}

function serializeYear(summary: YearSummary, troubleshoot: YearTroubleshoot | undefined): SerializedYear {
  return {
    summary: {
      se_income: summary.seIncome,
      non_se_income: summary.nonSeIncome,
      other_income: summary.otherIncome,
      se_withholding: summary.seWithholding,
      non_se_withholding: summary.nonSeWithholding,
      other_withholding: summary.otherWithholding,
      total_income: summary.totalIncome,
      total_withholding: summary.totalWithholding,
      estimated_agi: summary.estimatedAgi,
      number_of_forms: summary.forms.length,
      match: troubleshoot?.match ?? false,
    },
    forms: summary.forms.map(serializeFormRecord),
    troubleshoot: {
      lines: troubleshoot?.lines.map(serializeTroubleshootLine) ?? [],
      bucket_totals: troubleshoot?.bucketTotals ?? { se_income: 0, non_se_income: 0, other_income: 0 },
      summary_totals: troubleshoot?.summaryTotals ?? { se_income: 0, non_se_income: 0, other_income: 0 },
    },
  }
}

export function serializeOverallTotals(totals: OverallTotals): SerializedOverallTotals {
  return {
    total_se_income: totals.totalSeIncome,
    total_non_se_income: totals.totalNonSeIncome,
    total_other_income: totals.totalOtherIncome,
    total_income: totals.totalIncome,
    total_withholding: totals.totalWithholding,
    estimated_agi: totals.estimatedAgi,
  }
}

// ── Owner analysis ───────────────────────────────────────────────

function ownerBucket(b: OwnerBucket): SerializedOwnerBucket {
  return { income: b.income, withholding: b.withholding, se_income: b.seIncome, non_se_income: b.nonSeIncome }
}

function accountBucket(b: AccountOwnerBucket): SerializedAccountBucket {
  return { records: b.records, transactions: b.transactions, account_balance: b.accountBalance }
}

export function serializeOwnerAnalysis(analysis: OwnerAnalysis): SerializedOwnerAnalysis {
  const out: SerializedOwnerAnalysis = {
    filing_status: analysis.filingStatus,
    missing_data_recommendations: analysis.missingDataRecommendations,
    analysis_metadata: {
      has_wi_data: analysis.hasWiData,
      has_at_data: analysis.hasAtData,
      years_analyzed: analysis.yearsAnalyzed,
      has_taxpayer_data: analysis.hasTaxpayerData,
      has_spouse_data: analysis.hasSpouseData,
    },
  }

  if (analysis.wiTotalsByYear) {
    const wi: Record<string, Record<keyof OwnerTotals, SerializedOwnerBucket>> = {}
    for (const [year, t] of analysis.wiTotalsByYear) {
      wi[year] = {
        taxpayer: ownerBucket(t.taxpayer),
        spouse: ownerBucket(t.spouse),
        joint: ownerBucket(t.joint),
        combined: ownerBucket(t.combined),
      }
    }
    out.wi_totals_by_year = wi
  }

  if (analysis.atTotalsByYear) {
    const at: Record<string, Record<keyof AccountOwnerTotals, SerializedAccountBucket>> = {}
    for (const [year, t] of analysis.atTotalsByYear) {
      at[year] = {
        taxpayer: accountBucket(t.taxpayer),
        spouse: accountBucket(t.spouse),
        combined: accountBucket(t.combined),
      }
    }
    out.at_totals_by_year = at
  }

  return out
}

// ── Cases ────────────────────────────────────────────────────────

export function serializeWageIncomeCase(analysis: WageIncomeCaseAnalysis): SerializedWageIncomeCase {
  const years: Record<string, SerializedYear> = {}
  for (const [year, summary] of analysis.aggregate.years) {
    years[year] = serializeYear(summary, analysis.troubleshoot.get(year))
  }

  const out: SerializedWageIncomeCase = {
    case_id: analysis.aggregate.caseId,
    years_analyzed: [...analysis.aggregate.years.keys()],
    years,
    overall_totals: serializeOverallTotals(analysis.aggregate.overallTotals),
    confidence_summary: analysis.confidence,
    documents: analysis.documents.map((d) => ({
      file_name: d.fileName,
      tax_year: d.taxYear,
      owner: d.owner,
      tracking_number: d.trackingNumber,
      forms_found: d.formsFound,
    })),
  }
  if (analysis.ownerAnalysis) out.tps_analysis = serializeOwnerAnalysis(analysis.ownerAnalysis)
  return out
}

export function serializeAccountRecord(record: AccountRecord): SerializedAccountRecord {
  return {
    tax_year: record.taxYear,
    account_balance: record.accountBalance,
    accrued_interest: record.accruedInterest,
    accrued_penalty: record.accruedPenalty,
    total_balance: record.totalBalance,
    adjusted_gross_income: record.adjustedGrossIncome,
    taxable_income: record.taxableIncome,
    tax_per_return: record.taxPerReturn,
    se_taxable_income_taxpayer: record.seTaxableIncomeTaxpayer,
    se_taxable_income_spouse: record.seTaxableIncomeSpouse,
    total_se_tax: record.totalSeTax,
    filing_status: record.filingStatus,
    processing_date: record.processingDate,
    owner: record.owner,
    source_file: record.sourceFile,
    transactions: record.transactions.map((t) => ({
      code: t.code,
      description: t.description,
      meaning: t.meaning,
      cycle_date: t.cycleDate,
      date: t.date,
      amount: t.amount,
    })),
  }
}

export function serializeAccountCase(analysis: AccountCaseAnalysis): SerializedAccountCase {
  const out: SerializedAccountCase = {
    case_id: analysis.caseId,
    records: analysis.records.map(serializeAccountRecord),
  }
  if (analysis.ownerAnalysis) out.tps_analysis = serializeOwnerAnalysis(analysis.ownerAnalysis)
  return out
}
