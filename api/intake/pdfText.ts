/**
 * Raw text provider: reads the embedded text layer of a transcript PDF.
 *
 * Uses the legacy pdfjs-dist build, which runs in plain Node without a
 * browser worker. Text items are grouped into visual lines by their y
 * position and the lines are joined with newlines, which is the shape the
 * block segmenter expects. Scanned PDFs without a text layer yield "".
 */

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs'
import { errorContext, logger } from '../utils/logger.ts'
import type { Log } from '../utils/logger.ts'

const defaultLog = logger.child({ component: 'pdfText' })

export interface RawItem {
  str: string
  x: number
  y: number
  width: number
  page: number
}

export interface Line {
  items: RawItem[]
  /** Item strings, with one space where a column gap separates them. */
  text: string
  y: number
  page: number
}

// ── Extraction ────────────────────────────────────────────────

export async function extractItems(bytes: Uint8Array): Promise<RawItem[]> {
  // pdf.js takes ownership of the buffer it is given
  const task = getDocument({ data: new Uint8Array(bytes), isEvalSupported: false })
  try {
    const pdf = await task.promise
    const out: RawItem[] = []

    for (let p = 1; p <= pdf.numPages; p++) {
      const page = await pdf.getPage(p)
      const viewport = page.getViewport({ scale: 1 })
      const content = await page.getTextContent()

      for (const item of content.items) {
        if (!('str' in item) || !item.str.trim()) continue
        const [, , , , x, y]: number[] = item.transform
        out.push({
          str: item.str,
          x,
          // y grows downwards from the top of the page
          y: viewport.height - y,
          width: item.width,
          page: p,
        })
      }
    }
    return out
  } finally {
    await task.destroy()
  }
}

// ── Line grouping ─────────────────────────────────────────────

export function groupLines(items: readonly RawItem[], yTolerance = 4): Line[] {
  const sorted = [...items].sort((a, b) => {
    if (a.page !== b.page) return a.page - b.page
    if (Math.abs(a.y - b.y) > yTolerance) return a.y - b.y
    return a.x - b.x
  })

  const lines: Line[] = []
  let group: RawItem[] = []

  for (const item of sorted) {
    const prev = group.at(-1)
    if (!prev || (item.page === prev.page && Math.abs(item.y - prev.y) <= yTolerance)) {
      group.push(item)
    } else {
      lines.push(buildLine(group))
      group = [item]
    }
  }
  if (group.length > 0) lines.push(buildLine(group))
  return lines
}

/** `items` must not be empty. */
export function buildLine(items: readonly RawItem[]): Line {
  const sorted = [...items].sort((a, b) => a.x - b.x)
  const parts: string[] = []
  let prevRight = -Infinity

  for (const item of sorted) {
    if (prevRight > 0 && item.x > prevRight + 2) parts.push(' ')
    parts.push(item.str)
    prevRight = item.x + item.width
  }

  return {
    items: sorted,
    text: parts.join('').trim(),
    y: sorted[0].y,
    page: sorted[0].page,
  }
}

// ── Provider ──────────────────────────────────────────────────

/** Newline-joined text of every page. Never rejects: failures log and yield "". */
export async function extractPdfText(bytes: Uint8Array, log: Log = defaultLog): Promise<string> {
  try {
    const lines = groupLines(await extractItems(bytes))
    log.debug('PDF text extracted', { lines: lines.length })
    return lines.map((l) => l.text).join('\n')
  } catch (err) {
    log.warn('PDF text extraction failed', errorContext(err))
    return ''
  }
}
