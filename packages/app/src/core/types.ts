// CHANGE: define core domain types for line statistics and aggregate results
// WHY: keep IO-free data structures reusable across the engine, CLI, and tests
// REF: req-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s ∈ FileStat: s.nonEmptyLines ∈ ℕ ∧ s.emptyLines ∈ ℕ
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: AggregateResult._tag ∈ {"Global","ByExtension"}
// COMPLEXITY: O(1)/O(1)

export interface FileStat {
  readonly nonEmptyLines: number
  readonly emptyLines: number
}

/** Substring after the final dot of a file name; "" when there is none. */
export type ExtensionKey = string

export type AggregateMode = "global" | "by-extension"

export type FileList = ReadonlyArray<string>

export interface GlobalResult {
  readonly _tag: "Global"
  readonly total: FileStat
}

export interface ByExtensionResult {
  readonly _tag: "ByExtension"
  readonly byExtension: ReadonlyMap<ExtensionKey, FileStat>
}

export type AggregateResult = GlobalResult | ByExtensionResult
