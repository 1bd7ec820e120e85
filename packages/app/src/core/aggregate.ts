import * as Arr from "effect/Array"

import { extensionOf } from "./extension.js"
import { combineAllFileStats, combineFileStats, emptyFileStat } from "./file-stat.js"
import type { AggregateResult, ExtensionKey, FileList, FileStat } from "./types.js"

// CHANGE: express both aggregation modes as one fold/merge contract
// WHY: the executor folds partitions locally and merges partials at join points
// REF: req-aggregate-1
// SOURCE: n/a
// FORMAT THEOREM: ∀xs, k: mergeAll(map(fold, partition(xs, k))) = fold(xs)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: merge is associative and commutative up to map iteration order
// COMPLEXITY: O(n) fold, O(k) merge where k = distinct extensions

export interface Aggregator<A> {
  readonly empty: A
  readonly fold: (entries: ReadonlyArray<readonly [string, FileStat]>) => A
  readonly merge: (left: A, right: A) => A
  readonly toResult: (accumulator: A) => AggregateResult
}

export type ExtensionStats = ReadonlyMap<ExtensionKey, FileStat>

const upsertExtension = (
  target: Map<ExtensionKey, FileStat>,
  extension: ExtensionKey,
  stat: FileStat
): void => {
  const existing = target.get(extension)
  target.set(extension, existing === undefined ? stat : combineFileStats(existing, stat))
}

export const globalAggregator: Aggregator<FileStat> = {
  empty: emptyFileStat,
  fold: (entries) => combineAllFileStats(entries.map(([, stat]) => stat)),
  merge: combineFileStats,
  toResult: (total) => ({ _tag: "Global", total })
}

export const byExtensionAggregator: Aggregator<ExtensionStats> = {
  empty: new Map<ExtensionKey, FileStat>(),
  // one map per fold, filled in place before it is handed out
  fold: (entries) => {
    const next = new Map<ExtensionKey, FileStat>()
    for (const [filePath, stat] of entries) {
      upsertExtension(next, extensionOf(filePath), stat)
    }
    return next
  },
  merge: (left, right) => {
    const next = new Map(left)
    for (const [extension, stat] of right) {
      upsertExtension(next, extension, stat)
    }
    return next
  },
  toResult: (byExtension) => ({ _tag: "ByExtension", byExtension })
}

/**
 * Split a file list into at most `parts` contiguous, non-empty partitions.
 *
 * @pure true
 * @invariant flatten(result) = files
 * @complexity O(n)
 */
export const partitionFiles = (
  files: FileList,
  parts: number
): ReadonlyArray<FileList> => {
  if (files.length === 0) {
    return []
  }
  const size = Math.ceil(files.length / Math.max(1, Math.floor(parts)))
  return Arr.chunksOf(files, size)
}

/**
 * Merge partial results pairwise, keeping partition order at every level.
 *
 * @pure true
 * @invariant mergePairwise([]) = aggregator.empty
 * @complexity O(k log k) merges for k partials
 */
export const mergePairwise = <A>(
  aggregator: Aggregator<A>,
  partials: ReadonlyArray<A>
): A => {
  let level = partials
  while (level.length > 1) {
    const next: Array<A> = []
    for (let index = 0; index < level.length; index += 2) {
      const left = level[index]
      const right = level[index + 1]
      if (left === undefined) {
        continue
      }
      next.push(right === undefined ? left : aggregator.merge(left, right))
    }
    level = next
  }
  return level[0] ?? aggregator.empty
}

/**
 * Sum of every entry of an aggregate result.
 *
 * @pure true
 * @invariant total(byExtension(xs)) = total(global(xs))
 * @complexity O(k)
 */
export const totalOf = (result: AggregateResult): FileStat => {
  if (result._tag === "Global") {
    return result.total
  }
  let total = emptyFileStat
  for (const stat of result.byExtension.values()) {
    total = combineFileStats(total, stat)
  }
  return total
}
