import type { CliArgs } from "./cli.js"
import type { AggregateMode } from "./types.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved threads is a non-negative integer
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly byExt?: boolean
  readonly threads?: number
  readonly json?: boolean
}

export interface ResolvedConfig {
  readonly directory: string
  readonly mode: AggregateMode
  readonly threads: number
  readonly json: boolean
}

export const defaultConfigPath = "./.loc-tally.json"

export const defaultThreads = 1

const resolveMode = (cli: CliArgs, fileConfig: FileConfig | undefined): AggregateMode =>
  (cli.byExt ?? fileConfig?.byExt ?? false) ? "by-extension" : "global"

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .loc-tally.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  directory: cli.directory,
  mode: resolveMode(cli, fileConfig),
  threads: cli.threads ?? fileConfig?.threads ?? defaultThreads,
  json: cli.json ?? fileConfig?.json ?? false
})
