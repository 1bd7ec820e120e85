import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs, usage } from "../core/cli.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { renderHumanReport, renderJsonReport } from "../core/report.js"
import type { AggregateResult } from "../core/types.js"
import { loadConfigFile } from "../shell/config-file.js"
import { countLines } from "../shell/count.js"
import { discoverFiles } from "../shell/discover.js"
import { loggingLayer } from "../shell/logging.js"

// CHANGE: orchestrate discovery, counting, and reporting behind one entrypoint
// WHY: enforce functional core + imperative shell with typed errors
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) fails → stdout untouched
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: report emitted at most once, after the whole count succeeded
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly result: AggregateResult | undefined
  readonly output: string
}

type ProgramEnv = FileSystemService | PathService

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    if (payload.length > 0) {
      process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
    }
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const handleHelp: Effect.Effect<ProgramResult> = Effect.gen(function*(_) {
  yield* _(writeStdout(usage))
  return { result: undefined, output: usage }
})

const handleRun = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const configFile = yield* _(loadConfigFile(cli.configPath ?? defaultConfigPath, cli.configPathExplicit))
    const resolved = resolveConfig(cli, configFile)
    yield* _(
      Effect.logDebug(`Counting ${resolved.directory} (mode=${resolved.mode}, threads=${resolved.threads})`)
    )
    const files = yield* _(discoverFiles(resolved.directory))
    const result = yield* _(countLines({ files, mode: resolved.mode, parallelism: resolved.threads }))
    const output = resolved.json ? renderJsonReport(result) : renderHumanReport(result)
    yield* _(writeStdout(output))
    return { result, output }
  }).pipe(Effect.provide(loggingLayer(cli.verbose)))

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the aggregate and the rendered output.
 *
 * @pure false
 * @effect FileSystem, Path, Console
 * @invariant output is deterministic for a fixed tree regardless of --threads
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const invocation = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(
      Match.value(invocation).pipe(
        Match.tag("Help", () => handleHelp),
        Match.tag("Run", (value) => handleRun(value.args)),
        Match.exhaustive
      )
    )
  })
