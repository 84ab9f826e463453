/**
 * Scoped transcript parser: text in, per-form structured result out.
 *
 * Pure and synchronous. Each block is matched against the pattern table on
 * its own and its fields are extracted from its own lines only.
 */

import type { ExtractedField, FormBlock, FormRecord, Owner, PatternEntry } from '../model/types.ts'
import { roundTo } from '../model/rounding.ts'
import { PATTERN_TABLE } from '../patterns/patternTable.ts'
import type { PatternTable } from '../patterns/patternTable.ts'
import { formConfidence } from './confidence.ts'
import { extractFields } from './fieldExtractor.ts'
import { buildFormRecord } from './formAggregator.ts'
import { documentTaxYear, scanTranscriptMetadata } from './metadata.ts'
import { blockText, extractFormBlocks } from './segmenter.ts'

export interface ScopedForm {
  block: FormBlock
  /** null for a block whose header no entry recognises. */
  entry: PatternEntry | null
  fields: ExtractedField[]
}

export interface ParsedField {
  name: string
  value: string
  source_line: string
  confidence_score: number
  pattern_used: string
  extraction_method: 'regex'
}

export interface ParsedForm {
  form_type: string
  form_confidence: number
  block_text_length: number
  fields: ParsedField[]
}

export interface ScopedParseResult {
  file_name: string
  tracking_number: string | null
  tax_year: string | null
  parsing_metadata: {
    total_forms_found: number
    successful_extractions: number
    overall_confidence: number
  }
  forms: ParsedForm[]
}

export function scanForms(text: string, table: PatternTable = PATTERN_TABLE): ScopedForm[] {
  return extractFormBlocks(text, table).map((block) => {
    const entry = block.canonicalFormCode === null ? null : table.byCode(block.canonicalFormCode)
    return { block, entry, fields: entry ? extractFields(block, entry) : [] }
  })
}

function toParsedForm({ block, fields }: ScopedForm): ParsedForm {
  return {
    form_type: block.formType,
    form_confidence: formConfidence(fields.map((f) => f.confidenceScore)),
    block_text_length: blockText(block).length,
    fields: fields.map((f) => ({
      name: f.name,
      value: f.rawValue,
      source_line: f.sourceLine,
      confidence_score: f.confidenceScore,
      pattern_used: f.patternUsed,
      extraction_method: f.extractionMethod,
    })),
  }
}

export function parseTranscriptScoped(text: string, fileName: string): ScopedParseResult {
  const metadata = scanTranscriptMetadata(text)
  const forms = scanForms(text).map(toParsedForm)
  const confidences = forms.map((f) => f.form_confidence)

  return {
    file_name: fileName,
    tracking_number: metadata.trackingNumber,
    tax_year: documentTaxYear(fileName, text, metadata),
    parsing_metadata: {
      total_forms_found: forms.length,
      successful_extractions: forms.filter((f) => f.fields.length > 0).length,
      overall_confidence: confidences.length === 0
        ? 0
        : roundTo(confidences.reduce((a, b) => a + b, 0) / confidences.length, 3),
    },
    forms,
  }
}

/** FormRecords for every recognised block of one document. */
export function extractFormRecords(text: string, fileName: string, owner: Owner): FormRecord[] {
  const records: FormRecord[] = []
  for (const { block, entry, fields } of scanForms(text)) {
    if (!entry) continue
    records.push(buildFormRecord(block, fields, entry, { owner, sourceFile: fileName }))
  }
  return records
}
