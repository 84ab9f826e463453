import { describe, it, expect } from 'vitest'
import {
  accountTaxYear,
  extractAccountTransactions,
  parseAccountTranscript,
  parseMoney,
  toIsoDate,
  transactionMeaning,
} from '../../src/account/accountTranscript.ts'
import { AT_2022 } from '../fixtures/transcripts.ts'

describe('parseAccountTranscript', () => {
  it('reads the account summary', () => {
    const record = parseAccountTranscript(AT_2022, 'AT 22 E.pdf')

    expect(record.taxYear).toBe('2022')
    expect(record.accountBalance).toBe(1500)
    expect(record.accruedInterest).toBe(45.1)
    expect(record.accruedPenalty).toBe(30.25)
    expect(record.totalBalance).toBe(1575.35)
    expect(record.adjustedGrossIncome).toBe(52000)
    expect(record.taxableIncome).toBe(38150)
    expect(record.taxPerReturn).toBe(4310)
    expect(record.seTaxableIncomeTaxpayer).toBe(12000)
    expect(record.seTaxableIncomeSpouse).toBe(0)
    expect(record.totalSeTax).toBe(1695)
    expect(record.filingStatus).toBe('Married Filing Jointly')
    expect(record.processingDate).toBe('Apr. 25, 2023')
    expect(record.owner).toBe('S')
    expect(record.sourceFile).toBe('AT 22 E.pdf')
  })

  it('reads compact transaction rows with code meanings', () => {
    const { transactions } = parseAccountTranscript(AT_2022, 'AT 22.pdf')
    expect(transactions).toEqual([
      {
        code: '150',
        description: 'Tax return filed',
        meaning: 'Return filed / tax assessed OR indicator that a return is still missing',
        cycleDate: '2023-17-05',
        date: '2023-04-25',
        amount: 4310,
      },
      {
        code: '806',
        description: 'Credit for withholding',
        meaning: 'Credit for federal tax withheld',
        cycleDate: '2023-17-05',
        date: '2023-04-15',
        amount: -2000,
      },
    ])
  })

  it('falls back to zeros and Unknown for empty text', () => {
    const record = parseAccountTranscript('', 'AT.pdf')
    expect(record.taxYear).toBe('Unknown')
    expect(record.accountBalance).toBe(0)
    expect(record.totalBalance).toBe(0)
    expect(record.filingStatus).toBe('Unknown')
    expect(record.processingDate).toBeNull()
    expect(record.transactions).toEqual([])
    expect(record.owner).toBe('TP')
  })

  it('does not read SE taxable income as taxable income', () => {
    expect(parseAccountTranscript('SE TAXABLE INCOME TAXPAYER: $900.00', 'AT.pdf').taxableIncome).toBe(0)
  })
})

describe('accountTaxYear', () => {
  it.each([
    ['Report for Tax Period Ending: 12-31-2020', '2020'],
    ['TAX PERIOD: Dec. 31, 2019', '2019'],
    ['TAX PERIOD: June 30, 2018', '2018'],
    ['Printed in 2017', '2017'],
  ])('%j -> %s', (text, year) => {
    expect(accountTaxYear(text)).toBe(year)
  })
})

describe('extractAccountTransactions', () => {
  it('returns nothing without a TRANSACTIONS section', () => {
    expect(extractAccountTransactions('ACCOUNT BALANCE: $0.00')).toEqual([])
  })

  it('records a missing return notice', () => {
    expect(extractAccountTransactions('TRANSACTIONS\nNo tax return filed')).toEqual([
      { code: 'n/a', description: 'No tax return filed', meaning: null, cycleDate: '', date: '', amount: 0 },
    ])
  })

  it('reads the spaced two-column layout', () => {
    const text = ['TRANSACTIONS', '971 Notice issued', '03-01-2021', '$0.00'].join('\n')
    expect(extractAccountTransactions(text)).toEqual([
      { code: '971', description: 'Notice issued', meaning: null, cycleDate: '', date: '2021-03-01', amount: 0 },
    ])
  })
})

describe('helpers', () => {
  it('parses money leniently', () => {
    expect(parseMoney('$1,234.56')).toBe(1234.56)
    expect(parseMoney('-$20.00')).toBe(-20)
    expect(parseMoney('n/a')).toBe(0)
  })

  it('converts US dates to ISO and leaves anything else alone', () => {
    expect(toIsoDate('04-25-2023')).toBe('2023-04-25')
    expect(toIsoDate('13-01-2023')).toBe('13-01-2023')
    expect(toIsoDate('pending')).toBe('pending')
  })

  it('looks up transaction codes', () => {
    expect(transactionMeaning('846')).toBe('Refund issued')
    expect(transactionMeaning('999')).toBeNull()
  })
})
