/**
 * Canonical transcript model: the shapes every parser stage produces.
 *
 * Monetary values are plain dollars (floats) as printed on the transcript.
 * Everything here is owned by a single parse invocation except the
 * pattern table, which is read-only and shared.
 */

// ── Categories and owners ──────────────────────────────────────

/** Income bucket used for disposable-income work. */
export type IncomeCategory = 'SE' | 'NonSE' | 'Other'

/** TP = taxpayer, S = spouse, null = joint (not attributable to one party). */
export type Owner = 'TP' | 'S' | null

export type ConfidenceLevel = 'high' | 'medium' | 'low' | 'unknown'

/** E = employer-issued form (W-2), P = payer-issued form (1099 family). */
export type IssuerLabel = 'E' | 'P'

// ── Pattern table ──────────────────────────────────────────────

/** Numeric view of a form's fields handed to calculation rules. */
export type NumericFields = ReadonlyMap<string, number>

/** Cleaned raw values, for rules that read codes rather than amounts. */
export type RawFields = ReadonlyMap<string, string>

export interface CalculationRule {
  income: (fields: NumericFields, raw: RawFields) => number
  withholding: (fields: NumericFields, raw: RawFields) => number
}

export interface PatternEntry {
  formCode: string
  headerPattern: RegExp
  /** Insertion order is the output order of extracted fields. */
  fields: ReadonlyMap<string, RegExp | null>
  category: IncomeCategory
  calculation: CalculationRule | null
  /** Field holding the EIN/FIN that identifies the issuer, if any. */
  idField: string | null
  label: IssuerLabel | null
  /** Tunable reliability factor used by confidence scoring. */
  reliability: number
}

// ── Segmentation ───────────────────────────────────────────────

export interface FormBlock {
  /** Raw header line as it appears in the transcript. */
  formType: string
  canonicalFormCode: string | null
  /** Body lines, header excluded. */
  lines: readonly string[]
  /** Offset of the header line in the source text. */
  startOffset: number
  /** Offset one past the last character of the block. */
  endOffset: number
}

// ── Extraction ─────────────────────────────────────────────────

export interface ExtractedField {
  name: string
  rawValue: string
  numericValue: number | null
  sourceLine: string
  confidenceScore: number
  patternUsed: string
  extractionMethod: 'regex'
}

// ── Aggregation ────────────────────────────────────────────────

export interface FormRecord {
  formType: string
  canonicalFormCode: string | null
  owner: Owner
  fields: ReadonlyMap<string, ExtractedField>
  income: number
  withholding: number
  category: IncomeCategory
  uniqueId: string | null
  label: IssuerLabel | null
  payerBlurb: string | null
  sourceFile: string
  formConfidence: number
}

/** Form records grouped by tax year, in first-seen order. */
export type FormsByYear = ReadonlyMap<string, readonly FormRecord[]>

export interface YearSummary {
  taxYear: string
  forms: readonly FormRecord[]
  seIncome: number
  nonSeIncome: number
  otherIncome: number
  seWithholding: number
  nonSeWithholding: number
  otherWithholding: number
  totalIncome: number
  totalWithholding: number
  estimatedAgi: number
}

export interface OverallTotals {
  totalSeIncome: number
  totalNonSeIncome: number
  totalOtherIncome: number
  totalIncome: number
  totalWithholding: number
  estimatedAgi: number
}

export interface CaseAggregate {
  caseId: string
  years: ReadonlyMap<string, YearSummary>
  overallTotals: OverallTotals
}

// ── Owner roll-up ──────────────────────────────────────────────

export interface OwnerBucket {
  income: number
  withholding: number
  seIncome: number
  nonSeIncome: number
}

export interface OwnerTotals {
  taxpayer: OwnerBucket
  spouse: OwnerBucket
  joint: OwnerBucket
  combined: OwnerBucket
}

export interface AccountOwnerBucket {
  records: number
  transactions: number
  accountBalance: number
}

/** Joint account records count toward the taxpayer. */
export interface AccountOwnerTotals {
  taxpayer: AccountOwnerBucket
  spouse: AccountOwnerBucket
  combined: AccountOwnerBucket
}

export interface OwnerAnalysis {
  filingStatus: string | null
  missingDataRecommendations: string[]
  wiTotalsByYear: ReadonlyMap<string, OwnerTotals> | null
  atTotalsByYear: ReadonlyMap<string, AccountOwnerTotals> | null
  hasWiData: boolean
  hasAtData: boolean
  /** Newest first. */
  yearsAnalyzed: string[]
  hasTaxpayerData: boolean
  hasSpouseData: boolean
}

// ── Account transcripts ────────────────────────────────────────

export interface AccountTransaction {
  code: string
  description: string
  /** Meaning from the transaction-code table, null for unknown codes. */
  meaning: string | null
  cycleDate: string
  date: string
  amount: number
}

export interface AccountRecord {
  taxYear: string
  accountBalance: number
  accruedInterest: number
  accruedPenalty: number
  totalBalance: number
  adjustedGrossIncome: number
  taxableIncome: number
  taxPerReturn: number
  seTaxableIncomeTaxpayer: number
  seTaxableIncomeSpouse: number
  totalSeTax: number
  filingStatus: string
  processingDate: string | null
  transactions: AccountTransaction[]
  owner: Owner
  sourceFile: string
}

// ── Inputs ─────────────────────────────────────────────────────

/** One document's extracted text, as handed over by the text provider. */
export interface TranscriptDocument {
  fileName: string
  text: string
}
