import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the line counting tool
// WHY: provide typed fatal failures for program flow and exit codes
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every AppError aborts the run; mid-read failures are never AppErrors
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type DirectoryReadError = {
  readonly _tag: "DirectoryReadError"
  readonly path: string
  readonly message: string
}
export type FileOpenError = {
  readonly _tag: "FileOpenError"
  readonly path: string
  readonly message: string
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | DirectoryReadError
  | FileOpenError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const directoryReadError = (path: string, message: string): DirectoryReadError => ({
  _tag: "DirectoryReadError",
  path,
  message
})

export const fileOpenError = (path: string, message: string): FileOpenError => ({
  _tag: "FileOpenError",
  path,
  message
})

/**
 * Render an error as a single stderr line.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `error: ${value.message}`),
    Match.tag("ConfigError", (value) => `error: invalid config: ${value.message}`),
    Match.tag("FileError", (value) => `error: ${value.message}`),
    Match.tag("DirectoryReadError", (value) => `error: failed to read directory ${value.path}: ${value.message}`),
    Match.tag("FileOpenError", (value) => `error: unable to open file ${value.path}: ${value.message}`),
    Match.exhaustive
  )
