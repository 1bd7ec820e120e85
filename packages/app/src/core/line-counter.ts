import { emptyFileStat } from "./file-stat.js"
import type { FileStat } from "./types.js"

// CHANGE: classify lines and count them incrementally over decoded chunks
// WHY: keep the line rule pure so chunked file reads only feed text in
// REF: req-classify-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t,k: finish(feed*(split(t,k))) = count(t) for any chunking k
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: each character is scanned once, whatever the line length
// COMPLEXITY: O(n) where n = text length

export type LineKind = "empty" | "non-empty"

const NEWLINE = "\n"

// Unicode White_Space: U+0085 is blank, U+FEFF is not.
const BLANK = /^\p{White_Space}*$/u

const isBlank = (text: string): boolean => BLANK.test(text)

export const classifyLine = (line: string): LineKind => isBlank(line) ? "empty" : "non-empty"

/**
 * Unterminated tail of the text fed so far.
 *
 * A line is blank exactly when every piece of it is, so only that flag is
 * carried between chunks, never the text itself.
 */
export interface PendingLine {
  readonly blank: boolean
}

export interface LineTally {
  readonly stat: FileStat
  readonly pending: PendingLine | undefined
}

export const initialLineTally: LineTally = { stat: emptyFileStat, pending: undefined }

const countLine = (stat: FileStat, blank: boolean): FileStat =>
  blank
    ? { nonEmptyLines: stat.nonEmptyLines, emptyLines: stat.emptyLines + 1 }
    : { nonEmptyLines: stat.nonEmptyLines + 1, emptyLines: stat.emptyLines }

const extendPending = (pending: PendingLine | undefined, piece: string): PendingLine =>
  ({ blank: (pending?.blank ?? true) && isBlank(piece) })

/**
 * Consume a chunk of decoded text.
 *
 * Complete lines are counted; the unterminated tail is carried in `pending`
 * until the next chunk or {@link finishLineTally}.
 *
 * @pure true
 * @complexity O(n) where n = chunk length
 */
export const feedLineTally = (tally: LineTally, text: string): LineTally => {
  let stat = tally.stat
  let pending = tally.pending
  let start = 0
  let index = text.indexOf(NEWLINE, start)
  while (index !== -1) {
    stat = countLine(stat, extendPending(pending, text.slice(start, index)).blank)
    pending = undefined
    start = index + 1
    index = text.indexOf(NEWLINE, start)
  }
  if (start < text.length) {
    pending = extendPending(pending, text.slice(start))
  }
  return { stat, pending }
}

export const finishLineTally = (tally: LineTally): FileStat =>
  tally.pending === undefined ? tally.stat : countLine(tally.stat, tally.pending.blank)

export const countLinesInText = (text: string): FileStat => finishLineTally(feedLineTally(initialLineTally, text))
