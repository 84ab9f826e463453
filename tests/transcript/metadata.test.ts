import { describe, it, expect } from 'vitest'
import { documentTaxYear, resolveTaxYear, scanTranscriptMetadata, taxYearFromFileName } from '../../src/transcript/metadata.ts'
import { WI_TAXPAYER_2021 } from '../fixtures/transcripts.ts'

describe('scanTranscriptMetadata', () => {
  it('reads the transcript preamble', () => {
    expect(scanTranscriptMetadata(WI_TAXPAYER_2021)).toEqual({
      trackingNumber: '123456789',
      ssnProvided: 'XXX-XX-0000',
      requestDate: '03-15-2024',
      responseDate: '03-15-2024',
      taxPeriod: 'December, 2021',
      taxYear: '2021',
    })
  })

  it('returns nulls for text without a preamble', () => {
    expect(scanTranscriptMetadata('Form W-2')).toEqual({
      trackingNumber: null,
      ssnProvided: null,
      requestDate: null,
      responseDate: null,
      taxPeriod: null,
      taxYear: null,
    })
  })

  it('reads a bare year as the tax period', () => {
    expect(scanTranscriptMetadata('Tax Period Requested: 2019').taxYear).toBe('2019')
  })
})

describe('taxYearFromFileName', () => {
  it.each([
    ['WI 19 TP.pdf', '2019'],
    ['WI 50.pdf', '2050'],
    ['WI 99 S.pdf', '1999'],
    ['wi 21 combined.pdf', '2021'],
    ['transcript-2022.pdf', '2022'],
    ['WI 2019.pdf', '2019'],
  ])('%s -> %s', (fileName, year) => {
    expect(taxYearFromFileName(fileName)).toBe(year)
  })

  it('returns null when the name carries no year', () => {
    expect(taxYearFromFileName('WI S.pdf')).toBeNull()
  })
})

describe('resolveTaxYear', () => {
  it('prefers the file name', () => {
    expect(resolveTaxYear('WI 20 TP.pdf', WI_TAXPAYER_2021)).toBe('2020')
  })

  it('falls back to the tax period, then any year in the text', () => {
    expect(resolveTaxYear('WI S.pdf', WI_TAXPAYER_2021)).toBe('2021')
    expect(resolveTaxYear('upload.pdf', 'Printed 2023 copy')).toBe('2023')
  })

  it('is Unknown when nothing names a year', () => {
    expect(resolveTaxYear('upload.pdf', '')).toBe('Unknown')
  })

  it('reads a four-digit year after WI whole', () => {
    expect(resolveTaxYear('WI 2019.pdf', '')).toBe('2019')
  })

  it('reuses an already scanned preamble', () => {
    const metadata = scanTranscriptMetadata('Tax Period Requested: December, 2018')
    expect(resolveTaxYear('upload.pdf', '', metadata)).toBe('2018')
  })
})

describe('documentTaxYear', () => {
  it('is null when nothing names a year', () => {
    expect(documentTaxYear('upload.pdf', '')).toBeNull()
  })
})
