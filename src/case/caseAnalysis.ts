/**
 * Case-level analysis: many transcripts of one case in, per-year roll-up out.
 */

import type {
  AccountRecord,
  CaseAggregate,
  FormRecord,
  OwnerAnalysis,
  Owner,
  TranscriptDocument,
} from '../model/types.ts'
import { parseAccountTranscript } from '../account/accountTranscript.ts'
import { buildOwnerAnalysis, resolveOwner } from '../owner/ownerResolver.ts'
import { buildTroubleshoot } from '../summary/troubleshoot.ts'
import type { YearTroubleshoot } from '../summary/troubleshoot.ts'
import { buildOverallTotals, buildYearSummaries, groupFormsByYear } from '../summary/yearSummary.ts'
import { summarizeConfidence } from '../transcript/confidence.ts'
import type { ConfidenceSummary } from '../transcript/confidence.ts'
import { resolveTaxYear, scanTranscriptMetadata } from '../transcript/metadata.ts'
import { extractFormRecords } from '../transcript/scopedParser.ts'

export interface CaseOptions {
  filingStatus?: string | null
  includeOwnerAnalysis?: boolean
}

export interface DocumentSummary {
  fileName: string
  taxYear: string
  owner: Owner
  trackingNumber: string | null
  formsFound: number
}

export interface WageIncomeCaseAnalysis {
  aggregate: CaseAggregate
  formsByYear: ReadonlyMap<string, readonly FormRecord[]>
  troubleshoot: ReadonlyMap<string, YearTroubleshoot>
  confidence: ConfidenceSummary
  documents: DocumentSummary[]
  ownerAnalysis: OwnerAnalysis | null
}

export interface AccountCaseAnalysis {
  caseId: string
  records: AccountRecord[]
  ownerAnalysis: OwnerAnalysis | null
}

export function analyzeWageIncomeCase(
  caseId: string,
  documents: readonly TranscriptDocument[],
  options: CaseOptions = {},
): WageIncomeCaseAnalysis {
  const parsed = documents.map((doc) => {
    const owner = resolveOwner(doc.fileName)
    const metadata = scanTranscriptMetadata(doc.text)
    return {
      doc,
      owner,
      metadata,
      taxYear: resolveTaxYear(doc.fileName, doc.text, metadata),
      forms: extractFormRecords(doc.text, doc.fileName, owner),
    }
  })

  const formsByYear = groupFormsByYear(parsed)
  const years = buildYearSummaries(formsByYear)
  const allForms = [...formsByYear.values()].flat()

  return {
    aggregate: { caseId, years, overallTotals: buildOverallTotals(years) },
    formsByYear,
    troubleshoot: buildTroubleshoot(formsByYear, years),
    confidence: summarizeConfidence(allForms),
    documents: parsed.map(({ doc, owner, metadata, taxYear, forms }) => ({
      fileName: doc.fileName,
      taxYear,
      owner,
      trackingNumber: metadata.trackingNumber,
      formsFound: forms.length,
    })),
    ownerAnalysis: options.includeOwnerAnalysis
      ? buildOwnerAnalysis({ formsByYear, filingStatus: options.filingStatus })
      : null,
  }
}

export function analyzeAccountCase(
  caseId: string,
  documents: readonly TranscriptDocument[],
  options: CaseOptions = {},
): AccountCaseAnalysis {
  const records = documents.map((doc) => parseAccountTranscript(doc.text, doc.fileName))
  return {
    caseId,
    records,
    ownerAnalysis: options.includeOwnerAnalysis
      ? buildOwnerAnalysis({ accountRecords: records, filingStatus: options.filingStatus })
      : null,
  }
}
