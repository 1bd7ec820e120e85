import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Match } from "effect"
import * as Effect from "effect/Effect"

import type { Aggregator } from "../core/aggregate.js"
import { byExtensionAggregator, globalAggregator, mergePairwise, partitionFiles } from "../core/aggregate.js"
import type { AppError } from "../core/errors.js"
import type { AggregateMode, AggregateResult, FileList } from "../core/types.js"
import { classifyFile } from "./classify.js"

// CHANGE: drive the classifier over a file list with bounded parallelism
// WHY: each worker folds its own partition; partials only meet at the join
// REF: req-executor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀files, j ≥ 1: count(files, mode, j) = count(files, mode, 1)
// PURITY: SHELL
// EFFECT: Effect<AggregateResult, AppError, FileSystem>
// INVARIANT: no accumulator is shared between fibers
// COMPLEXITY: O(n) classifications, O(j log j) merges

export interface CountSettings {
  readonly files: FileList
  readonly mode: AggregateMode
  readonly parallelism: number
}

const foldPartition = <A>(
  aggregator: Aggregator<A>,
  files: FileList
): Effect.Effect<A, AppError, FileSystemService> =>
  Effect.forEach(files, (filePath) => Effect.map(classifyFile(filePath), (stat) => [filePath, stat] as const)).pipe(
    Effect.map(aggregator.fold)
  )

const countWith = <A>(
  aggregator: Aggregator<A>,
  files: FileList,
  parallelism: number
): Effect.Effect<AggregateResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (parallelism <= 1) {
      const total = yield* _(foldPartition(aggregator, files))
      return aggregator.toResult(total)
    }
    const partitions = partitionFiles(files, parallelism)
    yield* _(
      Effect.logDebug(`Counting ${files.length} files in ${partitions.length} partitions, ${parallelism} workers`)
    )
    const partials = yield* _(
      Effect.forEach(partitions, (partition) => foldPartition(aggregator, partition), {
        concurrency: parallelism
      })
    )
    return aggregator.toResult(mergePairwise(aggregator, partials))
  })

/**
 * Count lines of every file and aggregate them.
 *
 * @param settings - File list, aggregation mode, and parallelism.
 * @returns Aggregated statistics; identical for every parallelism value.
 *
 * @pure false
 * @effect FileSystem
 * @invariant the first fatal error interrupts the remaining workers
 * @complexity O(n)
 */
export const countLines = (
  settings: CountSettings
): Effect.Effect<AggregateResult, AppError, FileSystemService> =>
  Match.value(settings.mode).pipe(
    Match.when("global", () => countWith(globalAggregator, settings.files, settings.parallelism)),
    Match.when("by-extension", () => countWith(byExtensionAggregator, settings.files, settings.parallelism)),
    Match.exhaustive
  )
