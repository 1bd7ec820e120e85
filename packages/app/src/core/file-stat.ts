import type { FileStat } from "./types.js"

// CHANGE: provide the FileStat monoid and percentage helper
// WHY: every aggregation path reduces through the same associative combine
// REF: req-file-stat-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b,c: combine(combine(a,b),c) = combine(a,combine(b,c)) ∧ combine(a,empty) = a
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: counts are additive
// COMPLEXITY: O(1)

export const emptyFileStat: FileStat = { nonEmptyLines: 0, emptyLines: 0 }

export const makeFileStat = (nonEmptyLines: number, emptyLines: number): FileStat => ({
  nonEmptyLines,
  emptyLines
})

/**
 * Combine two line statistics.
 *
 * @pure true
 * @invariant combine is associative and commutative, emptyFileStat is its identity
 * @complexity O(1)
 */
export const combineFileStats = (left: FileStat, right: FileStat): FileStat => ({
  nonEmptyLines: left.nonEmptyLines + right.nonEmptyLines,
  emptyLines: left.emptyLines + right.emptyLines
})

export const combineAllFileStats = (stats: ReadonlyArray<FileStat>): FileStat => {
  let merged = emptyFileStat
  for (const stat of stats) {
    merged = combineFileStats(merged, stat)
  }
  return merged
}

export const totalLines = (stat: FileStat): number => stat.nonEmptyLines + stat.emptyLines

/**
 * Share of empty lines, in percent.
 *
 * @returns 0 when the stat holds no lines at all.
 *
 * @pure true
 * @invariant 0 ≤ result ≤ 100
 * @complexity O(1)
 */
export const percentEmpty = (stat: FileStat): number => {
  const total = totalLines(stat)
  if (total === 0) {
    return 0
  }
  return (stat.emptyLines / total) * 100
}
