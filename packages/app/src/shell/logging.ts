import * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

// CHANGE: route diagnostics to stderr with a verbosity switch
// WHY: stdout carries only the report
// REF: req-logging-1
// SOURCE: n/a
// FORMAT THEOREM: ∀msg: level(msg) < min → msg is dropped
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: nothing is logged through console.log
// COMPLEXITY: O(1)

export const stderrLogger: Layer.Layer<never> = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.logfmtLogger)
)

export const loggingLayer = (verbose: boolean): Layer.Layer<never> =>
  Layer.merge(stderrLogger, Logger.minimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Info))
