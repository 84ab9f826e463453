import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { DB_FILE, TranscriptStore } from '../../api/service/TranscriptStore.ts'

let store: TranscriptStore

beforeEach(() => {
  store = new TranscriptStore(':memory:')
})

afterEach(() => {
  store.close()
})

describe('case analyses', () => {
  it('saves and lists analyses per case in insertion order', () => {
    const first = store.saveAnalysis('case-1', 'wage-income', { case_id: 'case-1', years_analyzed: ['2021'] })
    const second = store.saveAnalysis('case-1', 'account', { case_id: 'case-1', records: [] })
    store.saveAnalysis('case-2', 'account', { case_id: 'case-2', records: [] })

    expect(second).toBeGreaterThan(first)

    const listed = store.listAnalyses('case-1')
    expect(listed.map((a) => [a.id, a.kind])).toEqual([[first, 'wage-income'], [second, 'account']])
    expect(listed[0].caseId).toBe('case-1')
    expect(listed[0].data).toEqual({ case_id: 'case-1', years_analyzed: ['2021'] })
    expect(listed[0].createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/)
  })

  it('returns nothing for an unknown case', () => {
    expect(store.listAnalyses('missing')).toEqual([])
  })
})

describe('feedback', () => {
  it('records an entry and reads it back', () => {
    const entry = store.recordFeedback({
      extractionId: 'ext-1',
      patternId: 'W-2.wages',
      isCorrect: false,
      correctValue: '38233.00',
      comments: 'dropped cents',
    })
    expect(entry).toMatchObject({
      extractionId: 'ext-1',
      patternId: 'W-2.wages',
      isCorrect: false,
      correctValue: '38233.00',
      comments: 'dropped cents',
    })
    expect(entry.id).toBe(1)
  })

  it('stores absent optional fields as null', () => {
    const entry = store.recordFeedback({ extractionId: 'ext-2', patternId: 'W-2.wages', isCorrect: true })
    expect(entry.isCorrect).toBe(true)
    expect(entry.correctValue).toBeNull()
    expect(entry.comments).toBeNull()
  })

  it('aggregates accuracy per pattern', () => {
    const record = (patternId: string, isCorrect: boolean): void => {
      store.recordFeedback({ extractionId: 'ext', patternId, isCorrect })
    }
    record('W-2.wages', true)
    record('W-2.wages', true)
    record('W-2.wages', false)
    record('1099-NEC.nonemployee_compensation', true)

    expect(store.patternStatistics()).toEqual([
      { patternId: '1099-NEC.nonemployee_compensation', attempts: 1, correct: 1, accuracy: 1 },
      { patternId: 'W-2.wages', attempts: 3, correct: 2, accuracy: 0.667 },
    ])
  })

  it('has no statistics before any feedback', () => {
    expect(store.patternStatistics()).toEqual([])
  })
})

describe('on disk', () => {
  it('creates the workspace and keeps data across instances', () => {
    const root = mkdtempSync(join(tmpdir(), 'transcripts-test-'))
    const workspace = join(root, 'nested')
    try {
      const onDisk = new TranscriptStore(workspace)
      onDisk.saveAnalysis('case-1', 'account', { records: [] })
      onDisk.close()
      expect(existsSync(join(workspace, DB_FILE))).toBe(true)

      const reopened = new TranscriptStore(workspace)
      expect(reopened.listAnalyses('case-1')).toHaveLength(1)
      reopened.close()
    } finally {
      rmSync(root, { recursive: true, force: true })
    }
  })
})
