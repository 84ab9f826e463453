/**
 * TranscriptService: the operations the HTTP layer exposes, on top of the
 * pure engine in src/ and the optional TranscriptStore.
 *
 * Engine calls never fail on text input. Saving an analysis is best-effort;
 * a store error is logged and reported as `persisted: false`.
 */

import { analyzeAccountCase, analyzeWageIncomeCase } from '../../src/case/caseAnalysis.ts'
import type { CaseRequest, FeedbackRequest } from '../../src/model/schemas.ts'
import { serializeAccountCase, serializeWageIncomeCase } from '../../src/model/serialize.ts'
import type { SerializedAccountCase, SerializedWageIncomeCase } from '../../src/model/serialize.ts'
import type { Owner, TranscriptDocument } from '../../src/model/types.ts'
import { resolveOwner } from '../../src/owner/ownerResolver.ts'
import { PATTERN_TABLE } from '../../src/patterns/patternTable.ts'
import { parseTranscriptScoped } from '../../src/transcript/scopedParser.ts'
import type { ScopedParseResult } from '../../src/transcript/scopedParser.ts'
import { extractPdfText } from '../intake/pdfText.ts'
import { errorContext, logger } from '../utils/logger.ts'
import type { Log } from '../utils/logger.ts'
import type { AnalysisKind, FeedbackEntry, PatternStatistic, StoredAnalysis, TranscriptStore } from './TranscriptStore.ts'

const CASE_ID = /^[\w.-]{1,128}$/

/** A failure the HTTP layer reports with `status` and `{ error: code }`. */
export class TranscriptServiceError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message?: string,
  ) {
    super(message ?? code)
    this.name = 'TranscriptServiceError'
  }
}

export type Persisted<T> = T & { persisted: boolean }

export interface ExtractedText {
  file_name: string
  text: string
  characters: number
}

export class TranscriptService {
  private readonly log: Log

  constructor(
    private readonly store: TranscriptStore | null,
    log: Log = logger.child({ component: 'transcripts' }),
  ) {
    this.log = log
  }

  get patternCount(): number {
    return PATTERN_TABLE.entries.length
  }

  // ── Documents ──────────────────────────────────────────────────

  parseDocument(doc: TranscriptDocument): ScopedParseResult {
    const result = parseTranscriptScoped(doc.text, doc.fileName)
    this.log.debug('Transcript parsed', {
      fileName: doc.fileName,
      forms: result.parsing_metadata.total_forms_found,
    })
    return result
  }

  resolveOwner(fileName: string): Owner {
    return resolveOwner(fileName)
  }

  async extractText(fileName: string, pdfBase64: string): Promise<ExtractedText> {
    const bytes = Buffer.from(pdfBase64, 'base64')
    if (bytes.length === 0) throw new TranscriptServiceError(400, 'invalid_pdf', 'PDF payload is empty')

    const text = await extractPdfText(new Uint8Array(bytes), this.log.child({ fileName }))
    return { file_name: fileName, text, characters: text.length }
  }

  // ── Cases ──────────────────────────────────────────────────────

  analyzeWageIncome(caseId: string, request: CaseRequest): Persisted<SerializedWageIncomeCase> {
    assertCaseId(caseId)
    const analysis = analyzeWageIncomeCase(caseId, request.documents, request)
    const out = serializeWageIncomeCase(analysis)
    this.log.info('Wage & income case analyzed', {
      caseId,
      documents: request.documents.length,
      years: out.years_analyzed.length,
    })
    return { ...out, persisted: this.persist(caseId, 'wage-income', out) }
  }

  analyzeAccount(caseId: string, request: CaseRequest): Persisted<SerializedAccountCase> {
    assertCaseId(caseId)
    const out = serializeAccountCase(analyzeAccountCase(caseId, request.documents, request))
    this.log.info('Account case analyzed', { caseId, records: out.records.length })
    return { ...out, persisted: this.persist(caseId, 'account', out) }
  }

  listAnalyses(caseId: string): StoredAnalysis[] {
    assertCaseId(caseId)
    return this.requireStore().listAnalyses(caseId)
  }

  // ── Feedback ───────────────────────────────────────────────────

  recordFeedback(feedback: FeedbackRequest): FeedbackEntry {
    const entry = this.requireStore().recordFeedback(feedback)
    this.log.info('Extraction feedback recorded', {
      patternId: entry.patternId,
      isCorrect: entry.isCorrect,
    })
    return entry
  }

  patternStatistics(): PatternStatistic[] {
    return this.requireStore().patternStatistics()
  }

  // ── Internals ──────────────────────────────────────────────────

  private persist(caseId: string, kind: AnalysisKind, data: unknown): boolean {
    if (!this.store) return false
    try {
      this.store.saveAnalysis(caseId, kind, data)
      return true
    } catch (err) {
      this.log.error('Failed to persist analysis', { caseId, kind, ...errorContext(err) })
      return false
    }
  }

  private requireStore(): TranscriptStore {
    if (!this.store) throw new TranscriptServiceError(503, 'persistence_unavailable')
    return this.store
  }
}

function assertCaseId(caseId: string): void {
  if (!CASE_ID.test(caseId)) throw new TranscriptServiceError(400, 'invalid_case_id')
}
