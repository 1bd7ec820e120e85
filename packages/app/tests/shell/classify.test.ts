import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { classifyFile } from "../../src/shell/classify.js"
import { provideNodeContext, withTempDir, writeTree } from "../app/test-helpers.js"

const encoder = new TextEncoder()

const concatBytes = (...parts: ReadonlyArray<Uint8Array>): Uint8Array => {
  const total = parts.reduce((size, part) => size + part.length, 0)
  const result = new Uint8Array(total)
  let offset = 0
  for (const part of parts) {
    result.set(part, offset)
    offset += part.length
  }
  return result
}

describe("classifyFile", () => {
  it.effect("counts empty and non-empty lines", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const filePath = context.path.join(context.tempDir, "a.txt")
        yield* _(writeTree(context, context.tempDir, { "a.txt": "hello\n\n  \n" }))
        expect(yield* _(classifyFile(filePath))).toEqual({ nonEmptyLines: 1, emptyLines: 2 })
      })
    ).pipe(provideNodeContext))

  it.effect("gives the same stat when classifying twice", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const filePath = context.path.join(context.tempDir, "main.ts")
        yield* _(writeTree(context, context.tempDir, { "main.ts": "const a = 1\n\n\tfoo()\n   \n}" }))
        const first = yield* _(classifyFile(filePath))
        const second = yield* _(classifyFile(filePath))
        expect(first).toEqual({ nonEmptyLines: 3, emptyLines: 2 })
        expect(second).toEqual(first)
      })
    ).pipe(provideNodeContext))

  it.effect("returns the zero stat for an empty file", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const filePath = context.path.join(context.tempDir, "empty.txt")
        yield* _(writeTree(context, context.tempDir, { "empty.txt": "" }))
        expect(yield* _(classifyFile(filePath))).toEqual({ nonEmptyLines: 0, emptyLines: 0 })
      })
    ).pipe(provideNodeContext))

  it.effect("discards every counted line when decoding fails partway", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const filePath = context.path.join(context.tempDir, "corrupt.txt")
        const bytes = concatBytes(encoder.encode("one\ntwo\nthree\n"), new Uint8Array([0xff, 0xfe, 0x0a]))
        yield* _(writeTree(context, context.tempDir, { "corrupt.txt": bytes }))
        expect(yield* _(classifyFile(filePath))).toEqual({ nonEmptyLines: 0, emptyLines: 0 })
      })
    ).pipe(provideNodeContext))

  it.effect("discards a file whose invalid bytes sit beyond the first chunk", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const filePath = context.path.join(context.tempDir, "late.txt")
        const bytes = concatBytes(encoder.encode("line\n".repeat(20_000)), new Uint8Array([0xc3, 0x28, 0x0a]))
        yield* _(writeTree(context, context.tempDir, { "late.txt": bytes }))
        expect(yield* _(classifyFile(filePath))).toEqual({ nonEmptyLines: 0, emptyLines: 0 })
      })
    ).pipe(provideNodeContext))

  it.effect("counts files larger than one read chunk", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const filePath = context.path.join(context.tempDir, "big.txt")
        yield* _(writeTree(context, context.tempDir, { "big.txt": "line\n\n".repeat(50_000) }))
        expect(yield* _(classifyFile(filePath))).toEqual({ nonEmptyLines: 50_000, emptyLines: 50_000 })
      })
    ).pipe(provideNodeContext))

  it.effect("decodes a multi-byte character split across chunks", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const filePath = context.path.join(context.tempDir, "split.txt")
        yield* _(writeTree(context, context.tempDir, { "split.txt": `${"a".repeat(65_535)}é\n \n` }))
        expect(yield* _(classifyFile(filePath))).toEqual({ nonEmptyLines: 1, emptyLines: 1 })
      })
    ).pipe(provideNodeContext))

  it.effect("fails with FileOpenError when the file cannot be opened", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const filePath = path.join(tempDir, "missing.txt")
        const error = yield* _(Effect.flip(classifyFile(filePath)))
        expect(error._tag).toBe("FileOpenError")
        if (error._tag === "FileOpenError") {
          expect(error.path).toBe(filePath)
        }
      })
    ).pipe(provideNodeContext))
})
