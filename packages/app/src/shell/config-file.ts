import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as Option from "effect/Option"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .loc-tally.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing implicit config yields undefined; any other read failure is a FileError
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    byExt: S.Boolean,
    threads: S.Int.pipe(S.nonNegative()),
    json: S.Boolean
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.byExt === undefined ? {} : { byExt: config.byExt }),
      ...(config.threads === undefined ? {} : { threads: config.threads }),
      ...(config.json === undefined ? {} : { json: config.json })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

const isNotFound = (error: PlatformError): boolean => error._tag === "SystemError" && error.reason === "NotFound"

const readConfigText = (path: string): Effect.Effect<Option.Option<string>, AppError, FileSystemService> =>
  pipe(
    Effect.flatMap(FileSystem, (fs) => fs.readFileString(path)),
    Effect.map(Option.some),
    Effect.catchIf(isNotFound, () => Effect.succeedNone),
    Effect.mapError((error) => fileError(`Unable to read config file ${path}: ${error.message}`))
  )

/**
 * Read and decode a config file.
 *
 * A missing file is only an error when the path was given explicitly.
 *
 * @pure false
 * @effect FileSystem
 */
export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.flatMap(
    readConfigText(path),
    Option.match({
      onNone: (): Effect.Effect<FileConfig | undefined, AppError> =>
        explicit ? Effect.fail(fileError(`Config file not found: ${path}`)) : Effect.succeed(undefined),
      onSome: (contents): Effect.Effect<FileConfig | undefined, AppError> =>
        Effect.zipRight(Effect.logDebug(`Loaded config file ${path}`), decodeConfig(contents))
    })
  )
