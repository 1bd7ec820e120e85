import type { File } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"
import { TextDecoder } from "node:util"

import type { AppError } from "../core/errors.js"
import { fileOpenError } from "../core/errors.js"
import { emptyFileStat } from "../core/file-stat.js"
import { feedLineTally, finishLineTally, initialLineTally } from "../core/line-counter.js"
import type { FileStat } from "../core/types.js"

// CHANGE: count lines of one file through chunked reads and a fatal UTF-8 decoder
// WHY: an open failure aborts the run, a later read failure only voids this file
// REF: req-classify-2
// SOURCE: n/a
// FORMAT THEOREM: ∀p: open(p) fails → Left(FileOpenError); read(p) fails → Right({0,0})
// PURITY: SHELL
// EFFECT: Effect<FileStat, AppError, FileSystem>
// INVARIANT: file handle is released when the scope closes
// COMPLEXITY: O(n) where n = file size

const CHUNK_SIZE = 64 * 1024

interface ReadFailure {
  readonly _tag: "ReadFailure"
  readonly reason: string
}

const readFailure = (reason: string): ReadFailure => ({ _tag: "ReadFailure", reason })

const decodeChunk = (
  decoder: TextDecoder,
  bytes: Uint8Array | undefined
): Effect.Effect<string, ReadFailure> =>
  Effect.try({
    try: () => bytes === undefined ? decoder.decode() : decoder.decode(bytes, { stream: true }),
    catch: (error) => readFailure(String(error))
  })

const readChunk = (file: File): Effect.Effect<Option.Option<Uint8Array>, ReadFailure> =>
  file.readAlloc(CHUNK_SIZE).pipe(Effect.mapError((error) => readFailure(error.message)))

const countOpenFile = (file: File): Effect.Effect<FileStat, ReadFailure> =>
  Effect.gen(function*(_) {
    const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })
    let tally = initialLineTally
    let chunk = yield* _(readChunk(file))
    while (Option.isSome(chunk)) {
      tally = feedLineTally(tally, yield* _(decodeChunk(decoder, chunk.value)))
      chunk = yield* _(readChunk(file))
    }
    const tail = yield* _(decodeChunk(decoder, undefined))
    return finishLineTally(feedLineTally(tally, tail))
  })

/**
 * Count empty and non-empty lines of a file.
 *
 * Any failure after the file is open (I/O error, invalid UTF-8) discards
 * the lines already counted and yields the zero stat.
 *
 * @param filePath - File to read.
 * @returns Line statistics for the file.
 *
 * @pure false
 * @effect FileSystem
 * @invariant failing to open the file is the only error
 * @complexity O(n)
 */
export const classifyFile = (
  filePath: string
): Effect.Effect<FileStat, AppError, FileSystemService> =>
  Effect.scoped(
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const file = yield* _(
        fs.open(filePath, { flag: "r" }).pipe(
          Effect.mapError((error) => fileOpenError(filePath, error.message))
        )
      )
      const counted = yield* _(Effect.either(countOpenFile(file)))
      if (Either.isLeft(counted)) {
        yield* _(Effect.logDebug(`Discarding ${filePath}: ${counted.left.reason}`))
        return emptyFileStat
      }
      return counted.right
    })
  )
