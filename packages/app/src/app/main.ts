#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import * as Either from "effect/Either"

import { formatAppError } from "../core/errors.js"
import { stderrLogger } from "../shell/logging.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) exits 0 after the report, 1 on AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: a failed run writes to stderr only
// COMPLEXITY: O(1)

const main = Effect.gen(function*(_) {
  const outcome = yield* _(Effect.either(runCli(process.argv)))
  if (Either.isLeft(outcome)) {
    const message = formatAppError(outcome.left)
    yield* _(
      Effect.sync(() => {
        process.stderr.write(`${message}\n`)
        process.exitCode = 1
      })
    )
  }
})

NodeRuntime.runMain(Effect.provide(main, Layer.merge(NodeContext.layer, stderrLogger)))
