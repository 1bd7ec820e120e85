import { Match } from "effect"

import { percentEmpty } from "./file-stat.js"
import type { AggregateResult, ExtensionKey, FileStat } from "./types.js"

// CHANGE: render aggregate results as human-readable lines or JSON
// WHY: keep reporting pure and deterministic across aggregation modes
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: lines(render(r)) = 3 · |entries(r)|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: extensions are listed in sorted order
// COMPLEXITY: O(k log k) where k = distinct extensions

const compareStrings = (left: string, right: string): number => left.localeCompare(right)

export const sortedExtensions = (
  byExtension: ReadonlyMap<ExtensionKey, FileStat>
): ReadonlyArray<readonly [ExtensionKey, FileStat]> =>
  [...byExtension.entries()].toSorted(([left], [right]) => compareStrings(left, right))

const formatPercent = (stat: FileStat): string => percentEmpty(stat).toFixed(2)

const globalLines = (stat: FileStat): ReadonlyArray<string> => [
  `There are ${stat.nonEmptyLines} lines of code.`,
  `There are ${stat.emptyLines} empty lines.`,
  `${formatPercent(stat)}% of the lines are empty.`
]

const extensionLines = (extension: ExtensionKey, stat: FileStat): ReadonlyArray<string> => [
  `There are ${stat.nonEmptyLines} lines of code in "${extension}" files.`,
  `There are ${stat.emptyLines} empty lines in "${extension}" files.`,
  `${formatPercent(stat)}% of the lines in "${extension}" files are empty.`
]

/**
 * Render a human-readable report.
 *
 * @param result - Aggregated statistics.
 * @returns Multi-line string for stdout, empty when no extension was seen.
 *
 * @pure true
 * @complexity O(k log k)
 */
export const renderHumanReport = (result: AggregateResult): string =>
  Match.value(result).pipe(
    Match.tag("Global", (value) => globalLines(value.total).join("\n")),
    Match.tag("ByExtension", (value) =>
      sortedExtensions(value.byExtension)
        .flatMap(([extension, stat]) => extensionLines(extension, stat))
        .join("\n")),
    Match.exhaustive
  )

const statToJson = (stat: FileStat) => ({
  nonEmptyLines: stat.nonEmptyLines,
  emptyLines: stat.emptyLines,
  percentEmpty: percentEmpty(stat)
})

/**
 * Render the report as JSON text.
 *
 * @pure true
 * @invariant byExtension keys appear in sorted order
 * @complexity O(k log k)
 */
export const renderJsonReport = (result: AggregateResult): string =>
  JSON.stringify(
    Match.value(result).pipe(
      Match.tag("Global", (value) => ({ mode: "global", total: statToJson(value.total) })),
      Match.tag("ByExtension", (value) => ({
        mode: "by-extension",
        byExtension: Object.fromEntries(
          sortedExtensions(value.byExtension).map(([extension, stat]) => [extension, statToJson(stat)])
        )
      })),
      Match.exhaustive
    ),
    null,
    2
  )
