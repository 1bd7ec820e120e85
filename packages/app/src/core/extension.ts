import type { ExtensionKey } from "./types.js"

// CHANGE: centralize extension key extraction
// WHY: by-extension grouping must agree between sequential and parallel runs
// REF: req-extension-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: ext(p) = suffix of basename(p) after last "." (not leading), else ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: result never contains "." or a path separator
// COMPLEXITY: O(n)

const normalizeSlashes = (value: string): string => value.replaceAll("\\", "/")

const baseName = (filePath: string): string => {
  const normalized = normalizeSlashes(filePath)
  const trimmed = normalized.endsWith("/") ? normalized.slice(0, -1) : normalized
  const slash = trimmed.lastIndexOf("/")
  return slash === -1 ? trimmed : trimmed.slice(slash + 1)
}

/**
 * Extract the extension key of a path.
 *
 * A dot in first position marks a hidden file, not an extension, so
 * `.bashrc` has none. Case is kept as found.
 *
 * @pure true
 * @complexity O(n)
 */
export const extensionOf = (filePath: string): ExtensionKey => {
  const name = baseName(filePath)
  const dot = name.lastIndexOf(".")
  if (dot <= 0) {
    return ""
  }
  return name.slice(dot + 1)
}
