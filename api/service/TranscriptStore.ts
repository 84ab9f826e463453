/**
 * TranscriptStore: append-only SQLite log of case analyses and extraction
 * feedback.
 *
 * Nothing here feeds back into parsing. Feedback is aggregated into per-pattern
 * accuracy for a human to act on; the pattern table itself is never edited.
 */

import { existsSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import Database from 'better-sqlite3'
import type BetterSqlite3 from 'better-sqlite3'
import { caseAnalysisRowSchema, feedbackRowSchema, patternStatsRowSchema } from '../../src/model/schemas.ts'
import type { FeedbackRequest, FeedbackRow } from '../../src/model/schemas.ts'
import { roundTo } from '../../src/model/rounding.ts'

export const DB_FILE = 'transcripts.db'

export type AnalysisKind = 'wage-income' | 'account'

export interface StoredAnalysis {
  id: number
  caseId: string
  kind: string
  createdAt: string
  data: unknown
}

export interface FeedbackEntry {
  id: number
  extractionId: string
  patternId: string
  isCorrect: boolean
  correctValue: string | null
  comments: string | null
  createdAt: string
}

export interface PatternStatistic {
  patternId: string
  attempts: number
  correct: number
  /** correct / attempts, 3 decimals. */
  accuracy: number
}

function toFeedbackEntry(row: FeedbackRow): FeedbackEntry {
  return {
    id: row.id,
    extractionId: row.extraction_id,
    patternId: row.pattern_id,
    isCorrect: row.is_correct === 1,
    correctValue: row.correct_value,
    comments: row.comments,
    createdAt: row.created_at,
  }
}

export class TranscriptStore {
  private db: BetterSqlite3.Database
  private insertAnalysisStmt: BetterSqlite3.Statement
  private selectAnalysesStmt: BetterSqlite3.Statement
  private insertFeedbackStmt: BetterSqlite3.Statement
  private selectFeedbackStmt: BetterSqlite3.Statement
  private patternStatsStmt: BetterSqlite3.Statement

  /** `workspace` is a directory; pass ':memory:' for a throwaway database. */
  constructor(workspace: string) {
    let dbPath = ':memory:'
    if (workspace !== ':memory:') {
      if (!existsSync(workspace)) mkdirSync(workspace, { recursive: true })
      dbPath = join(workspace, DB_FILE)
    }

    this.db = new Database(dbPath)
    this.db.pragma('journal_mode = WAL')

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS case_analyses (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        case_id    TEXT NOT NULL,
        kind       TEXT NOT NULL,
        data       TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
      CREATE INDEX IF NOT EXISTS idx_case_analyses_case ON case_analyses (case_id);

      CREATE TABLE IF NOT EXISTS extraction_feedback (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        extraction_id TEXT NOT NULL,
        pattern_id    TEXT NOT NULL,
        is_correct    INTEGER NOT NULL,
        correct_value TEXT,
        comments      TEXT,
        created_at    TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `)

    this.insertAnalysisStmt = this.db.prepare(
      'INSERT INTO case_analyses (case_id, kind, data) VALUES (?, ?, ?)',
    )
    this.selectAnalysesStmt = this.db.prepare(
      'SELECT id, case_id, kind, data, created_at FROM case_analyses WHERE case_id = ? ORDER BY id',
    )
    this.insertFeedbackStmt = this.db.prepare(`
      INSERT INTO extraction_feedback (extraction_id, pattern_id, is_correct, correct_value, comments)
      VALUES (?, ?, ?, ?, ?)
    `)
    this.selectFeedbackStmt = this.db.prepare(
      'SELECT id, extraction_id, pattern_id, is_correct, correct_value, comments, created_at FROM extraction_feedback WHERE id = ?',
    )
    this.patternStatsStmt = this.db.prepare(`
      SELECT pattern_id, COUNT(*) AS attempts, SUM(is_correct) AS correct
      FROM extraction_feedback
      GROUP BY pattern_id
      ORDER BY pattern_id
    `)
  }

  // ── Case analyses ───────────────────────────────────────────────

  saveAnalysis(caseId: string, kind: AnalysisKind, data: unknown): number {
    const info = this.insertAnalysisStmt.run(caseId, kind, JSON.stringify(data))
    return Number(info.lastInsertRowid)
  }

  listAnalyses(caseId: string): StoredAnalysis[] {
    return this.selectAnalysesStmt.all(caseId).map((raw) => {
      const row = caseAnalysisRowSchema.parse(raw)
      const data: unknown = JSON.parse(row.data)
      return { id: row.id, caseId: row.case_id, kind: row.kind, createdAt: row.created_at, data }
    })
  }

  // ── Feedback ────────────────────────────────────────────────────

  recordFeedback(feedback: FeedbackRequest): FeedbackEntry {
    const info = this.insertFeedbackStmt.run(
      feedback.extractionId,
      feedback.patternId,
      feedback.isCorrect ? 1 : 0,
      feedback.correctValue ?? null,
      feedback.comments ?? null,
    )
    const row = feedbackRowSchema.parse(this.selectFeedbackStmt.get(Number(info.lastInsertRowid)))
    return toFeedbackEntry(row)
  }

  patternStatistics(): PatternStatistic[] {
    return this.patternStatsStmt.all().map((raw) => {
      const row = patternStatsRowSchema.parse(raw)
      return {
        patternId: row.pattern_id,
        attempts: row.attempts,
        correct: row.correct,
        accuracy: row.attempts === 0 ? 0 : roundTo(row.correct / row.attempts, 3),
      }
    })
  }

  close(): void {
    this.db.close()
  }
}
