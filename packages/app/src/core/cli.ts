import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for loc-tally
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(Run(args)) → args.directory is defined
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and extra positionals are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly directory: string
  readonly byExt: boolean | undefined
  readonly threads: number | undefined
  readonly json: boolean | undefined
  readonly verbose: boolean
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
}

export type CliInvocation =
  | { readonly _tag: "Help" }
  | { readonly _tag: "Run"; readonly args: CliArgs }

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const usage = [
  "Usage: loc-tally [options] <directory>",
  "",
  "Count empty and non-empty lines of every file under <directory>.",
  "",
  "Options:",
  "  -A, --by-ext          report per file extension",
  "  -j, --threads <n>     number of parallel workers (default: 1)",
  "      --json            print the report as JSON",
  "      --config <path>   config file (default: ./.loc-tally.json)",
  "  -v, --verbose         log debug details to stderr",
  "  -h, --help            print this help"
].join("\n")

interface ParseState {
  readonly directory: string | undefined
  readonly byExt: boolean | undefined
  readonly threads: number | undefined
  readonly json: boolean | undefined
  readonly verbose: boolean
  readonly configPath: string | undefined
  readonly help: boolean
}

const initialState: ParseState = {
  directory: undefined,
  byExt: undefined,
  threads: undefined,
  json: undefined,
  verbose: false,
  configPath: undefined,
  help: false
}

const isFlag = (value: string): boolean => value.startsWith("-") && value.length > 1

const parseThreads = (value: string): Either.Either<number, CliError> => {
  if (!/^\d+$/u.test(value)) {
    return Either.left(cliError(`Invalid value for --threads: ${value} (expected an unsigned integer)`))
  }
  const parsed = Number(value)
  if (!Number.isSafeInteger(parsed)) {
    return Either.left(cliError(`Invalid value for --threads: ${value} (too large)`))
  }
  return Either.right(parsed)
}

type ParsedFlag = Either.Either<{ readonly next: ParseState; readonly consumed: number }, CliError>

type FlagParser = (
  current: ParseState,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => ParsedFlag

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const switchFlag = (
  flagName: string,
  update: (state: ParseState) => ParseState
): FlagParser =>
(current, inlineValue) =>
  inlineValue === undefined
    ? Either.right({ next: update(current), consumed: 1 })
    : Either.left(cliError(`Flag --${flagName} does not take a value`))

const valueFlag = (
  flagName: string,
  update: (state: ParseState, value: string) => Either.Either<ParseState, CliError>
): FlagParser =>
(current, inlineValue, nextValue) =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const flagParsers: Readonly<Record<string, FlagParser | undefined>> = {
  "by-ext": switchFlag("by-ext", (state) => ({ ...state, byExt: true })),
  json: switchFlag("json", (state) => ({ ...state, json: true })),
  verbose: switchFlag("verbose", (state) => ({ ...state, verbose: true })),
  help: switchFlag("help", (state) => ({ ...state, help: true })),
  threads: valueFlag("threads", (state, value) => Either.map(parseThreads(value), (threads) => ({ ...state, threads }))),
  config: valueFlag("config", (state, value) => Either.right({ ...state, configPath: value }))
}

const shortAliases: Readonly<Record<string, string | undefined>> = {
  A: "by-ext",
  j: "threads",
  v: "verbose",
  h: "help"
}

const switchNames: ReadonlySet<string> = new Set(["by-ext", "json", "verbose", "help"])

const parseLongFlag = (
  raw: string,
  nextValue: string | undefined,
  current: ParseState
): ParsedFlag => {
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

// -Av -j4 -Aj4 -Aj 4: switches may be bundled, a value flag takes the rest.
const parseShortFlags = (
  raw: string,
  nextValue: string | undefined,
  current: ParseState
): ParsedFlag => {
  const name = shortAliases[raw.charAt(1)]
  const parser = name === undefined ? undefined : flagParsers[name]
  if (name === undefined || parser === undefined) {
    return Either.left(cliError(`Unknown flag: -${raw.charAt(1)}`))
  }
  const rest = raw.slice(2)
  if (rest.length === 0) {
    return parser(current, undefined, nextValue)
  }
  if (switchNames.has(name)) {
    return Either.flatMap(parser(current, undefined, nextValue), ({ next }) => parseShortFlags(`-${rest}`, nextValue, next))
  }
  return parser(current, rest, nextValue)
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: ParseState
): ParsedFlag => raw.startsWith("--") ? parseLongFlag(raw, nextValue, current) : parseShortFlags(raw, nextValue, current)

const acceptPositional = (state: ParseState, value: string): Either.Either<ParseState, CliError> =>
  state.directory === undefined
    ? Either.right({ ...state, directory: value })
    : Either.left(cliError(`Unexpected positional argument: ${value}`))

const parseTokens = (rawArgs: ReadonlyArray<string>): Either.Either<ParseState, CliError> => {
  let state = initialState
  let index = 0
  let flagsDone = false
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!flagsDone && current === "--") {
      flagsDone = true
      index += 1
      continue
    }
    if (flagsDone || !isFlag(current)) {
      const accepted = acceptPositional(state, current)
      if (Either.isLeft(accepted)) {
        return Either.left(accepted.left)
      }
      state = accepted.right
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], state)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    state = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(state)
}

/**
 * Parse CLI arguments into a typed invocation.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with the invocation or CliError.
 *
 * @pure true
 * @invariant --help wins over every other argument except a parse failure
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliInvocation, CliError> =>
  Either.flatMap(parseTokens(argv.slice(2)), (state): Either.Either<CliInvocation, CliError> => {
    if (state.help) {
      return Either.right({ _tag: "Help" })
    }
    if (state.directory === undefined) {
      return Either.left(cliError("Missing required argument: <directory>"))
    }
    return Either.right({
      _tag: "Run",
      args: {
        directory: state.directory,
        byExt: state.byExt,
        threads: state.threads,
        json: state.json,
        verbose: state.verbose,
        configPath: state.configPath,
        configPathExplicit: state.configPath !== undefined
      }
    })
  })
