/**
 * Account Transcript (AT) parser.
 *
 * Reads the account summary figures, filing status, processing date and the
 * transaction history of one AT. Figures that are missing read as 0; the
 * parser never throws on text input.
 */

import { readFileSync } from 'node:fs'
import type { AccountRecord, AccountTransaction } from '../model/types.ts'
import { atCodeTableSchema } from '../model/schemas.ts'
import { roundCents } from '../model/rounding.ts'
import { resolveOwner } from '../owner/ownerResolver.ts'

// ── Transaction code table ───────────────────────────────────────

function loadCodeTable(): ReadonlyMap<string, string> {
  const raw = readFileSync(new URL('./atCodes.json', import.meta.url), 'utf-8')
  return new Map(Object.entries(atCodeTableSchema.parse(JSON.parse(raw)).codes))
}

const AT_CODES = loadCodeTable()

export function transactionMeaning(code: string): string | null {
  return AT_CODES.get(code) ?? null
}

// ── Header fields ────────────────────────────────────────────────

const TAX_YEAR_PATTERNS = [
  /Report\s+for\s+Tax\s+Period\s+Ending:\s*\d{2}-\d{2}-(\d{4})/i,
  /TAX\s+PERIOD:\s*Dec\.?\s*31,\s*(\d{4})/i,
  /TAX\s+PERIOD:\s*[A-Za-z]+\.?\s*\d{1,2},?\s*(\d{4})/i,
  /\b((?:19|20)\d{2})\b/,
]

const AMOUNT = String.raw`[:\s]*\$?(-?[\d,]*\.?\d+)`

const FINANCIAL_PATTERNS = {
  accountBalance: new RegExp(`ACCOUNT\\s+BALANCE${AMOUNT}`, 'i'),
  accruedInterest: new RegExp(`ACCRUED\\s+INTEREST${AMOUNT}`, 'i'),
  accruedPenalty: new RegExp(`ACCRUED\\s+PENALTY${AMOUNT}`, 'i'),
  adjustedGrossIncome: new RegExp(`ADJUSTED\\s+GROSS\\s+INCOME${AMOUNT}`, 'i'),
  taxableIncome: new RegExp(`(?<!SE\\s)TAXABLE\\s+INCOME${AMOUNT}`, 'i'),
  taxPerReturn: new RegExp(`TAX\\s+PER\\s+RETURN${AMOUNT}`, 'i'),
  seTaxableIncomeTaxpayer: new RegExp(`SE\\s+TAXABLE\\s+INCOME\\s+TAXPAYER${AMOUNT}`, 'i'),
  seTaxableIncomeSpouse: new RegExp(`SE\\s+TAXABLE\\s+INCOME\\s+SPOUSE${AMOUNT}`, 'i'),
  totalSeTax: new RegExp(`TOTAL\\s+SELF\\s+EMPLOYMENT\\s+TAX${AMOUNT}`, 'i'),
} as const

type FinancialField = keyof typeof FINANCIAL_PATTERNS

const FILING_STATUS = /FILING\s+STATUS[:\s]*([^,\n]+)/i
const PROCESSING_DATE = /PROCESSING\s+DATE[:\s]*([A-Za-z]+\.?\s+\d{1,2},?\s*\d{4})/i

export function parseMoney(raw: string): number {
  const n = Number(raw.replace(/[$,\s]/g, ''))
  return Number.isFinite(n) ? n : 0
}

export function accountTaxYear(text: string): string {
  for (const pattern of TAX_YEAR_PATTERNS) {
    const match = pattern.exec(text)
    if (match) return match[1]
  }
  return 'Unknown'
}

function financialFigure(text: string, field: FinancialField): number {
  const match = FINANCIAL_PATTERNS[field].exec(text)
  return match ? parseMoney(match[1]) : 0
}

// ── Transactions ─────────────────────────────────────────────────

const COMPACT_ROW = /^(\d{3}|n\/a)([^\d\n]+?)(\d{8})\s+(\d{2}-\d{2}-\d{4})\s+(-?\$?[\d,]+\.\d{2})/gm
const SPACED_ROW = /^(\d{3}|n\/a)\s*([^\n]+)\n(?:[\w ]*\n)?(\d{2}-\d{2}-\d{4})\s*\n(-?\$?[\d,]+\.\d{2})/gm
const NO_RETURN_FILED = /no tax return filed/i

/** MM-DD-YYYY to ISO; anything that is not a calendar date is returned unchanged. */
export function toIsoDate(usDate: string): string {
  const match = /^(\d{2})-(\d{2})-(\d{4})$/.exec(usDate)
  if (!match) return usDate
  const [, mm, dd, yyyy] = match
  const month = Number(mm)
  const day = Number(dd)
  if (month < 1 || month > 12 || day < 1 || day > 31) return usDate
  return `${yyyy}-${mm}-${dd}`
}

/** Eight-digit cycle (YYYYMMDD) as YYYY-MM-DD. */
function cycleToDate(cycle: string): string {
  return `${cycle.slice(0, 4)}-${cycle.slice(4, 6)}-${cycle.slice(6, 8)}`
}

function transaction(code: string, description: string, cycleDate: string, date: string, amount: number): AccountTransaction {
  const trimmed = code.trim()
  return {
    code: trimmed,
    description: description.trim(),
    meaning: transactionMeaning(trimmed),
    cycleDate,
    date,
    amount,
  }
}

/**
 * Rows after the TRANSACTIONS marker. The one-line compact layout is tried
 * first; the two-column layout and "No tax return filed" notices only when
 * no compact row is found.
 */
export function extractAccountTransactions(text: string): AccountTransaction[] {
  const idx = text.indexOf('TRANSACTIONS')
  if (idx < 0) return []
  const section = text.slice(idx)

  const out: AccountTransaction[] = []
  for (const m of section.matchAll(COMPACT_ROW)) {
    out.push(transaction(m[1], m[2], cycleToDate(m[3]), toIsoDate(m[4]), parseMoney(m[5])))
  }
  if (out.length > 0) return out

  for (const line of section.split('\n')) {
    if (NO_RETURN_FILED.test(line)) out.push(transaction('n/a', 'No tax return filed', '', '', 0))
  }
  for (const m of section.matchAll(SPACED_ROW)) {
    out.push(transaction(m[1], m[2], '', toIsoDate(m[3]), parseMoney(m[4])))
  }
  return out
}

// ── Record ───────────────────────────────────────────────────────

export function parseAccountTranscript(text: string, fileName: string): AccountRecord {
  const accountBalance = financialFigure(text, 'accountBalance')
  const accruedInterest = financialFigure(text, 'accruedInterest')
  const accruedPenalty = financialFigure(text, 'accruedPenalty')

  return {
    taxYear: accountTaxYear(text),
    accountBalance,
    accruedInterest,
    accruedPenalty,
    totalBalance: roundCents(accountBalance + accruedInterest + accruedPenalty),
    adjustedGrossIncome: financialFigure(text, 'adjustedGrossIncome'),
    taxableIncome: financialFigure(text, 'taxableIncome'),
    taxPerReturn: financialFigure(text, 'taxPerReturn'),
    seTaxableIncomeTaxpayer: financialFigure(text, 'seTaxableIncomeTaxpayer'),
    seTaxableIncomeSpouse: financialFigure(text, 'seTaxableIncomeSpouse'),
    totalSeTax: financialFigure(text, 'totalSeTax'),
    filingStatus: FILING_STATUS.exec(text)?.[1].trim() || 'Unknown',
    processingDate: PROCESSING_DATE.exec(text)?.[1].trim() ?? null,
    transactions: extractAccountTransactions(text),
    owner: resolveOwner(fileName),
    sourceFile: fileName,
  }
}
