/**
 * Block segmenter: splits one transcript's text into form blocks.
 *
 * A header line opens a block; every following line belongs to it until the
 * next header or end of text. Blocks are contiguous: each block ends where
 * the next one starts, and the last one ends at the end of the text. The
 * preamble before the first header is not a block.
 */

import type { FormBlock } from '../model/types.ts'
import { PATTERN_TABLE, isFormHeader } from '../patterns/patternTable.ts'
import type { PatternTable } from '../patterns/patternTable.ts'

interface OpenBlock {
  formType: string
  canonicalFormCode: string | null
  lines: string[]
  startOffset: number
}

function close(block: OpenBlock, endOffset: number): FormBlock {
  return {
    formType: block.formType,
    canonicalFormCode: block.canonicalFormCode,
    lines: block.lines,
    startOffset: block.startOffset,
    endOffset,
  }
}

export function extractFormBlocks(text: string, table: PatternTable = PATTERN_TABLE): FormBlock[] {
  const blocks: FormBlock[] = []
  let current: OpenBlock | null = null
  let offset = 0

  for (const rawLine of text.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine

    if (isFormHeader(line, table)) {
      if (current) blocks.push(close(current, offset))
      current = {
        formType: line.trim(),
        canonicalFormCode: table.lookup(line)?.formCode ?? null,
        lines: [],
        startOffset: offset,
      }
    } else if (current) {
      current.lines.push(line)
    }

    offset += rawLine.length + 1
  }

  if (current) blocks.push(close(current, text.length))
  return blocks
}

/** Body text of a block, header excluded. */
export function blockText(block: FormBlock): string {
  return block.lines.join('\n')
}
