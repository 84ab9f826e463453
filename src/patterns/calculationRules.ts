/**
 * Derived income / withholding rules, keyed by canonical form code.
 *
 * Every rule is a pure function of the form's numeric fields (and, where a
 * code rather than an amount matters, their raw text). A field that
 * was not found (or did not parse as a number) reads as 0. Forms without an
 * entry here fall back to the conventional fields in formAggregator.ts.
 */

import type { CalculationRule, NumericFields, RawFields } from '../model/types.ts'

// ── Building blocks ──────────────────────────────────────────────

function field(fields: NumericFields, name: string): number {
  return fields.get(name) ?? 0
}

function sumOf(...names: string[]): (fields: NumericFields) => number {
  return (fields) => names.reduce((total, name) => total + field(fields, name), 0)
}

function noIncome(): number {
  return 0
}

const federalWithholding = sumOf('federal_withholding')

/** Informational forms: balances, deductible expenses, basis records. */
const informational: CalculationRule = { income: noIncome, withholding: noIncome }

// ── Form-specific rules ──────────────────────────────────────────

/** Leading digit of a distribution code; combined codes such as "7D" read as 7. */
function distributionCode(fields: NumericFields, raw: RawFields): number | null {
  const text = raw.get('distribution_code')
  if (text === undefined) return fields.get('distribution_code') ?? null
  const digit = /^\d/.exec(text)
  return digit ? Number(digit[0]) : null
}

/** Taxable amount wins; otherwise the gross distribution counts only under codes 1-8. */
function retirementDistribution(fields: NumericFields, raw: RawFields): number {
  const taxable = fields.get('taxable_amount')
  if (taxable !== undefined && taxable !== 0) return taxable
  const code = distributionCode(fields, raw)
  if (code !== null && code >= 1 && code <= 8) return field(fields, 'gross_distribution')
  return 0
}

function securitiesGain(fields: NumericFields): number {
  return field(fields, 'proceeds') - field(fields, 'cost_basis')
}

/** Up to 85% of benefits are taxable; the top rate is assumed. */
const SSA_TAXABLE_SHARE = 0.85

function socialSecurityBenefits(fields: NumericFields): number {
  return field(fields, 'total_benefits') * SSA_TAXABLE_SHARE
}

/** Savings bond interest under this amount is left out of income. */
const SAVINGS_BOND_THRESHOLD = 1000

function interestIncome(fields: NumericFields): number {
  const bonds = field(fields, 'savings_bonds')
  return field(fields, 'interest') + (bonds >= SAVINGS_BOND_THRESHOLD ? bonds : 0)
}

// ── Registry ─────────────────────────────────────────────────────

export const CALCULATION_RULES: ReadonlyMap<string, CalculationRule> = new Map<string, CalculationRule>([
  ['1099-MISC', {
    income: sumOf(
      'nonemployee_compensation', 'medical_payments', 'fishing_income', 'rents',
      'royalties', 'attorney_fees', 'other_income', 'substitute_dividends',
    ),
    withholding: federalWithholding,
  }],
  ['1099-K', { income: sumOf('gross_amount'), withholding: federalWithholding }],
  ['1099-PATR', {
    income: sumOf('patronage_dividends', 'nonpatronage_distributions', 'retained_allocations', 'redemption_amount'),
    withholding: federalWithholding,
  }],
  ['1042-S', { income: sumOf('gross_income'), withholding: federalWithholding }],
  ['K-1 1065', {
    income: sumOf('royalties', 'ordinary_income', 'real_estate', 'other_rental', 'guaranteed_payments'),
    withholding: noIncome,
  }],
  ['K-1 1041', { income: sumOf('net_rental_real_estate_income', 'other_rental_income'), withholding: noIncome }],
  ['W-2G', { income: sumOf('gross_winnings'), withholding: federalWithholding }],
  ['1099-R', { income: retirementDistribution, withholding: federalWithholding }],
  ['1099-B', { income: securitiesGain, withholding: federalWithholding }],
  ['SSA-1099', { income: socialSecurityBenefits, withholding: federalWithholding }],
  ['1099-DIV', {
    income: sumOf('qualified_dividends', 'cash_liquidation_distribution', 'capital_gains'),
    withholding: federalWithholding,
  }],
  ['1099-INT', { income: interestIncome, withholding: federalWithholding }],
  ['1099-G', {
    income: sumOf('unemployment_compensation', 'agricultural_subsidies', 'taxable_grants'),
    withholding: federalWithholding,
  }],
  ['1099-S', { income: sumOf('gross_proceeds'), withholding: noIncome }],
  ['1099-LTC', informational],
  ['3922', informational],
  ['K-1 1120S', {
    income: sumOf('dividends', 'interest', 'royalties', 'ordinary_income', 'real_estate', 'other_rental'),
    withholding: noIncome,
  }],
  ['1099-OID', { income: sumOf('original_issue_discount', 'interest'), withholding: federalWithholding }],
  ['5498-SA', informational],
  ['5498', informational],
  ['1098-E', informational],
  ['1098-T', informational],
  ['1098', informational],
  ['1099-C', { income: sumOf('debt_discharged'), withholding: noIncome }],
  ['1099-Q', informational],
  ['1099-SA', informational],
])
