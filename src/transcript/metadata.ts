/**
 * Transcript preamble scan.
 *
 * The lines above the first form header carry request metadata (tracking
 * number, SSN on file, request/response dates, tax period). They are read
 * once per document here and never treated as a form block.
 */

export interface TranscriptMetadata {
  trackingNumber: string | null
  ssnProvided: string | null
  requestDate: string | null
  responseDate: string | null
  /** Raw "Tax Period Requested" value, e.g. "December, 2023". */
  taxPeriod: string | null
  taxYear: string | null
}

const TRACKING_NUMBER = /Tracking\s*Number[:\s]*(\d+)/i
const SSN_PROVIDED = /SSN\s*Provided[:\s]*([\dX]{3}-[\dX]{2}-[\dX]{4}|[\dX]{9})/i
const REQUEST_DATE = /Request\s*Date[:\s]*(\d{2}-\d{2}-\d{4})/i
const RESPONSE_DATE = /Response\s*Date[:\s]*(\d{2}-\d{2}-\d{4})/i
const TAX_PERIOD = /Tax\s*Period\s*Requested[:\s]*([^\n]+)/i
const FOUR_DIGIT_YEAR = /\b((?:19|20)\d{2})\b/

const FILE_NAME_SHORT_YEAR = /\bWI\s+(\d{2})\b/i
const FILE_NAME_YEAR = /(20\d{2})/
const TEXT_YEAR = /(20\d{2})/

function capture(pattern: RegExp, text: string): string | null {
  const match = pattern.exec(text)
  return match ? match[1].trim() : null
}

export function scanTranscriptMetadata(text: string): TranscriptMetadata {
  const taxPeriod = capture(TAX_PERIOD, text)
  return {
    trackingNumber: capture(TRACKING_NUMBER, text),
    ssnProvided: capture(SSN_PROVIDED, text),
    requestDate: capture(REQUEST_DATE, text),
    responseDate: capture(RESPONSE_DATE, text),
    taxPeriod,
    taxYear: taxPeriod === null ? null : capture(FOUR_DIGIT_YEAR, taxPeriod),
  }
}

/**
 * Tax year from a file name such as "WI 19 TP.pdf". Two-digit years 00-50
 * map to 20xx, 51-99 to 19xx. Falls back to a literal 20xx in the name.
 */
export function taxYearFromFileName(fileName: string): string | null {
  const short = FILE_NAME_SHORT_YEAR.exec(fileName)
  if (short) {
    const suffix = short[1]
    return Number(suffix) <= 50 ? `20${suffix}` : `19${suffix}`
  }
  return capture(FILE_NAME_YEAR, fileName)
}

/**
 * A document's tax year: file name first, then the transcript's tax period,
 * then any 20xx in the text. Both the document result and the case roll-up
 * use this order. Pass `metadata` when the preamble has already been scanned.
 */
export function documentTaxYear(
  fileName: string,
  text: string,
  metadata: TranscriptMetadata = scanTranscriptMetadata(text),
): string | null {
  return taxYearFromFileName(fileName) ?? metadata.taxYear ?? capture(TEXT_YEAR, text)
}

export function resolveTaxYear(
  fileName: string,
  text: string,
  metadata: TranscriptMetadata = scanTranscriptMetadata(text),
): string {
  return documentTaxYear(fileName, text, metadata) ?? 'Unknown'
}
