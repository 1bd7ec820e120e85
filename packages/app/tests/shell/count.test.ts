import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { totalOf } from "../../src/core/aggregate.js"
import type { AggregateResult, FileStat } from "../../src/core/types.js"
import { countLines } from "../../src/shell/count.js"
import { discoverFiles } from "../../src/shell/discover.js"
import { provideNodeContext, withTempDir, writeTree } from "../app/test-helpers.js"

const fixture = {
  "a.txt": "hello\n\n  \n",
  "b.txt": "x\n",
  "README": "title\n\nbody\n",
  "src/index.ts": "export {}\n\n",
  "src/util.ts": "const a = 1\n\t\nconst b = 2\n",
  "src/deep/notes.md": "# notes\n\n\n- one\n",
  "src/deep/Upper.TS": "x\n",
  "docs/guide.md": "\n",
  "docs/.hidden": "secret\n"
}

const entriesOf = (result: AggregateResult): ReadonlyArray<readonly [string, FileStat]> =>
  result._tag === "ByExtension" ? [...result.byExtension.entries()] : [["*", result.total]]

describe("countLines", () => {
  it.effect("counts the two-file scenario in both modes", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeTree(context, context.tempDir, { "a.txt": "hello\n\n  \n", "b.txt": "x\n" }))
        const files = yield* _(discoverFiles(context.tempDir))

        const global = yield* _(countLines({ files, mode: "global", parallelism: 1 }))
        expect(global).toEqual({ _tag: "Global", total: { nonEmptyLines: 2, emptyLines: 2 } })

        const byExtension = yield* _(countLines({ files, mode: "by-extension", parallelism: 1 }))
        expect(entriesOf(byExtension)).toEqual([["txt", { nonEmptyLines: 2, emptyLines: 2 }]])
      })
    ).pipe(provideNodeContext))

  it.effect("gives identical results for 1, 2 and 8 workers", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeTree(context, context.tempDir, fixture))
        const files = yield* _(discoverFiles(context.tempDir))
        expect(files.length).toBe(9)

        const sequentialGlobal = yield* _(countLines({ files, mode: "global", parallelism: 1 }))
        const sequentialByExt = yield* _(countLines({ files, mode: "by-extension", parallelism: 1 }))
        expect(sequentialGlobal).toEqual({ _tag: "Global", total: { nonEmptyLines: 11, emptyLines: 8 } })

        for (const parallelism of [2, 8]) {
          const global = yield* _(countLines({ files, mode: "global", parallelism }))
          const byExt = yield* _(countLines({ files, mode: "by-extension", parallelism }))
          expect(global).toEqual(sequentialGlobal)
          expect(entriesOf(byExt)).toEqual(entriesOf(sequentialByExt))
        }
      })
    ).pipe(provideNodeContext))

  it.effect("partitions extensions so that they sum to the global total", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeTree(context, context.tempDir, fixture))
        const files = yield* _(discoverFiles(context.tempDir))
        const global = yield* _(countLines({ files, mode: "global", parallelism: 4 }))
        const byExtension = yield* _(countLines({ files, mode: "by-extension", parallelism: 4 }))

        expect(totalOf(byExtension)).toEqual(totalOf(global))
        expect(new Map(entriesOf(byExtension))).toEqual(
          new Map<string, FileStat>([
            ["txt", { nonEmptyLines: 2, emptyLines: 2 }],
            ["", { nonEmptyLines: 3, emptyLines: 1 }],
            ["ts", { nonEmptyLines: 3, emptyLines: 2 }],
            ["md", { nonEmptyLines: 2, emptyLines: 3 }],
            ["TS", { nonEmptyLines: 1, emptyLines: 0 }]
          ])
        )
      })
    ).pipe(provideNodeContext))

  it.effect("returns the identity for an empty file list", () =>
    Effect.gen(function*(_) {
      for (const parallelism of [1, 3]) {
        const global = yield* _(countLines({ files: [], mode: "global", parallelism }))
        const byExtension = yield* _(countLines({ files: [], mode: "by-extension", parallelism }))
        expect(global).toEqual({ _tag: "Global", total: { nonEmptyLines: 0, emptyLines: 0 } })
        expect(entriesOf(byExtension)).toEqual([])
      }
    }).pipe(provideNodeContext))

  it.effect("lets a corrupt file contribute nothing", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(
          writeTree(context, context.tempDir, {
            "good.txt": "a\n\nb\n",
            "bad.txt": new Uint8Array([0x61, 0x0a, 0x62, 0x0a, 0x63, 0x0a, 0xff, 0x0a])
          })
        )
        const files = yield* _(discoverFiles(context.tempDir))
        const global = yield* _(countLines({ files, mode: "global", parallelism: 2 }))
        expect(global).toEqual({ _tag: "Global", total: { nonEmptyLines: 2, emptyLines: 1 } })
      })
    ).pipe(provideNodeContext))

  it.effect("aborts when any file cannot be opened", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const { path, tempDir } = context
        yield* _(writeTree(context, tempDir, { "a.txt": "a\n", "b.txt": "b\n" }))
        const files = [path.join(tempDir, "a.txt"), path.join(tempDir, "gone.txt"), path.join(tempDir, "b.txt")]
        for (const parallelism of [1, 3]) {
          const error = yield* _(Effect.flip(countLines({ files, mode: "global", parallelism })))
          expect(error).toMatchObject({ _tag: "FileOpenError", path: path.join(tempDir, "gone.txt") })
        }
      })
    ).pipe(provideNodeContext))
})
