import { describe, it, expect } from 'vitest'
import {
  PATTERN_TABLE,
  PatternTableError,
  captureGroupCount,
  compilePatternTable,
  expandPlaceholders,
  isFormHeader,
  lookupPattern,
} from '../../src/patterns/patternTable.ts'

function tableWith(fields: Record<string, string | null>, extra: Record<string, unknown> = {}) {
  return {
    version: 1,
    forms: [{
      formCode: 'TEST-1',
      header: '^Form TEST-1\\b',
      category: 'Other',
      reliability: 0.5,
      label: null,
      idField: null,
      fields,
      ...extra,
    }],
  }
}

describe('shipped pattern table', () => {
  it('loads every form', () => {
    expect(PATTERN_TABLE.entries).toHaveLength(28)
  })

  it('has unique form codes', () => {
    const codes = PATTERN_TABLE.entries.map((e) => e.formCode)
    expect(new Set(codes).size).toBe(codes.length)
  })

  it('compiles every field pattern with exactly one capture group', () => {
    for (const entry of PATTERN_TABLE.entries) {
      for (const pattern of entry.fields.values()) {
        if (pattern) expect(captureGroupCount(pattern.source)).toBe(1)
      }
    }
  })

  it('attaches calculation rules to derived-income forms only', () => {
    expect(PATTERN_TABLE.byCode('1099-R')?.calculation).not.toBeNull()
    expect(PATTERN_TABLE.byCode('W-2')?.calculation).toBeNull()
    expect(PATTERN_TABLE.byCode('1099-NEC')?.calculation).toBeNull()
  })

  it('carries issuer metadata for W-2 and 1099-NEC', () => {
    const w2 = PATTERN_TABLE.byCode('W-2')
    expect(w2?.label).toBe('E')
    expect(w2?.idField).toBe('employer_ein')
    expect(w2?.category).toBe('NonSE')
    expect(w2?.reliability).toBe(0.9)

    const nec = PATTERN_TABLE.byCode('1099-NEC')
    expect(nec?.label).toBe('P')
    expect(nec?.idField).toBe('payer_fin')
    expect(nec?.category).toBe('SE')
  })
})

describe('lookupPattern', () => {
  it.each([
    ['Form W-2 Wage and Tax Statement', 'W-2'],
    ['Form W-2G Certain Gambling Winnings', 'W-2G'],
    ['Form 1099-NEC Nonemployee Compensation', '1099-NEC'],
    ['Form 1099-MISC Miscellaneous Information', '1099-MISC'],
    ['Form 1099-R Distributions From Pensions', '1099-R'],
    ['Form 1098 Mortgage Interest Statement', '1098'],
    ['Form 1098-E Student Loan Interest Statement', '1098-E'],
    ['Form 1098-T Tuition Statement', '1098-T'],
    ['Form 5498 IRA Contribution Information', '5498'],
    ['Form 5498-SA HSA, Archer MSA', '5498-SA'],
    ['Form SSA-1099 Social Security Benefit Statement', 'SSA-1099'],
  ])('resolves "%s" to %s', (header, code) => {
    expect(lookupPattern(header)?.formCode).toBe(code)
  })

  it('returns null for an unknown form', () => {
    expect(lookupPattern('Form 8888 Allocation of Refund')).toBeNull()
  })

  it('returns null for ordinary body lines', () => {
    expect(lookupPattern('Wages, Tips and Other Compensation: $38,233.00')).toBeNull()
  })
})

describe('isFormHeader', () => {
  it('accepts recognised and unrecognised form headers', () => {
    expect(isFormHeader('Form W-2 Wage and Tax Statement')).toBe(true)
    expect(isFormHeader('Form 8888 Allocation of Refund')).toBe(true)
  })

  it('rejects body lines', () => {
    expect(isFormHeader('Employer:')).toBe(false)
    expect(isFormHeader('Federal Income Tax Withheld: $4,120.50')).toBe(false)
  })
})

describe('expandPlaceholders', () => {
  it('replaces every placeholder occurrence', () => {
    const out = expandPlaceholders('A{amount}B{amount}')
    expect(out).not.toContain('{amount}')
    expect(captureGroupCount(out)).toBe(2)
  })

  it('leaves a source without placeholders untouched', () => {
    expect(expandPlaceholders('Rents')).toBe('Rents')
  })
})

describe('compilePatternTable', () => {
  it('compiles a minimal table and keeps field order', () => {
    const table = compilePatternTable(tableWith({ second_amount: 'Second{amount}', first_amount: 'First{amount}' }))
    expect([...table.entries[0].fields.keys()]).toEqual(['second_amount', 'first_amount'])
    expect(table.lookup('Form TEST-1 heading')?.formCode).toBe('TEST-1')
    expect(table.byCode('NOPE')).toBeNull()
  })

  it('compiles patterns case-insensitively', () => {
    const table = compilePatternTable(tableWith({ rents: 'Rents{amount}' }))
    expect(table.entries[0].fields.get('rents')?.flags).toBe('i')
  })

  it('keeps declared-but-unprinted fields as null', () => {
    const table = compilePatternTable(tableWith({ federal_withholding: null }))
    expect(table.entries[0].fields.get('federal_withholding')).toBeNull()
  })

  it('rejects a field pattern without a capture group', () => {
    expect(() => compilePatternTable(tableWith({ rents: 'Rents' }))).toThrow(PatternTableError)
    expect(() => compilePatternTable(tableWith({ rents: 'Rents' }))).toThrow(
      'TEST-1.rents: expected exactly one capture group, found 0',
    )
  })

  it('rejects an invalid regular expression', () => {
    expect(() => compilePatternTable(tableWith({ rents: 'Rents(' }))).toThrow(PatternTableError)
  })

  it('rejects non-snake_case field names', () => {
    expect(() => compilePatternTable(tableWith({ Rents: 'Rents{amount}' }))).toThrow(PatternTableError)
  })

  it('rejects an idField without a pattern', () => {
    expect(() => compilePatternTable(tableWith({ payer_fin: null }, { idField: 'payer_fin' }))).toThrow(
      'idField must name a field with a pattern',
    )
  })

  it('rejects duplicate form codes', () => {
    const one = tableWith({ rents: 'Rents{amount}' })
    const data = { version: 1, forms: [...one.forms, ...one.forms] }
    expect(() => compilePatternTable(data)).toThrow('Duplicate form code TEST-1')
  })
})
