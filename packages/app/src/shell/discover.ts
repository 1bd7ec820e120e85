import type { PlatformError } from "@effect/platform/Error"
import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { directoryReadError } from "../core/errors.js"
import type { FileList } from "../core/types.js"

// CHANGE: enumerate regular files under a root with an explicit work stack
// WHY: deep trees must not hit a recursion limit while keeping depth-first order
// REF: req-discover-1
// SOURCE: n/a
// FORMAT THEOREM: ∀root: discover(root) = preorder non-directory leaves of tree(root)
// PURITY: SHELL
// EFFECT: Effect<FileList, AppError, FileSystem | Path>
// INVARIANT: an unreadable directory fails the whole walk
// COMPLEXITY: O(n) where n = directory entries

const isDirectory = (
  fs: FileSystemService,
  candidate: string
): Effect.Effect<boolean> =>
  fs.stat(candidate).pipe(
    Effect.map((info) => info.type === "Directory"),
    Effect.catchAll((error: PlatformError) =>
      Effect.as(Effect.logDebug(`Treating ${candidate} as a file: ${error.message}`), false)
    )
  )

const readChildren = (
  fs: FileSystemService,
  path: PathService,
  directory: string
): Effect.Effect<ReadonlyArray<string>, AppError> =>
  fs.readDirectory(directory).pipe(
    Effect.map((names) => names.map((name) => path.join(directory, name))),
    Effect.mapError((error) => directoryReadError(directory, error.message))
  )

const pushReversed = (stack: Array<string>, children: ReadonlyArray<string>): void => {
  for (let index = children.length - 1; index >= 0; index -= 1) {
    const child = children[index]
    if (child !== undefined) {
      stack.push(child)
    }
  }
}

/**
 * Recursively list every non-directory entry under `root`.
 *
 * A root that is not a directory yields an empty list. Entries are
 * classified through `stat`, so symlinks to directories are followed.
 *
 * @param root - Directory to walk.
 * @returns Paths in depth-first traversal order.
 *
 * @pure false
 * @effect FileSystem, Path
 * @invariant result contains no directories
 * @complexity O(n)
 */
export const discoverFiles = (
  root: string
): Effect.Effect<FileList, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)

    const rootIsDirectory = yield* _(isDirectory(fs, root))
    if (!rootIsDirectory) {
      yield* _(Effect.logWarning(`${root} is not a directory, nothing to count`))
      return []
    }

    const files: Array<string> = []
    const stack: Array<string> = []
    pushReversed(stack, yield* _(readChildren(fs, path, root)))
    let current = stack.pop()
    while (current !== undefined) {
      if (yield* _(isDirectory(fs, current))) {
        pushReversed(stack, yield* _(readChildren(fs, path, current)))
      } else {
        files.push(current)
      }
      current = stack.pop()
    }

    yield* _(Effect.logDebug(`Discovered ${files.length} files under ${root}`))
    return files
  })
