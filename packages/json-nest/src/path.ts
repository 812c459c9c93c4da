import { pathFailure } from "./error"
import type { Path } from "./json"
import { describeValue } from "./utils"

/**
 * What callers may pass wherever a path is expected:
 * a single key, a single index, or a sequence of these.
 */
export type PathLike = string | number | Path

/**
 * A path segment is a string key or a safe integer index.
 */
export function isPathSegment(segment: unknown): segment is string | number {
  return typeof segment === "string" || Number.isSafeInteger(segment)
}

/**
 * Normalizes a path-like into a frozen, non-empty segment list.
 * The result never aliases the caller's array.
 */
export function normalizePath(pathLike: unknown): Path {
  if (isPathSegment(pathLike)) {
    return Object.freeze([pathLike])
  }

  if (!Array.isArray(pathLike)) {
    pathFailure(pathLike, `invalid path: ${describeValue(pathLike)}`)
  }

  if (pathLike.length === 0) {
    pathFailure(pathLike, "empty path: []")
  }

  const path: (string | number)[] = []
  for (const segment of pathLike) {
    if (!isPathSegment(segment)) {
      pathFailure(
        pathLike,
        `path must contain only strings and integers: ${describeValue(pathLike)}`
      )
    }
    path.push(segment)
  }
  return Object.freeze(path)
}

/**
 * Checks that the first segment fits the kind of the root container.
 * A mismatch is a call-site error, not a data error.
 */
export function assertRootSegment(path: Path, root: "object" | "array"): void {
  const first = path[0]
  if (root === "object" && typeof first !== "string") {
    pathFailure(path, `object path must start with a string key: ${describeValue(path)}`)
  }
  if (root === "array" && typeof first !== "number") {
    pathFailure(path, `array path must start with an integer index: ${describeValue(path)}`)
  }
}

/**
 * Checks that the last segment is of the given kind, for operations
 * that only make sense on an object key or on an array index.
 */
export function assertLastSegment(path: Path, kind: "key" | "index"): void {
  const last = path[path.length - 1]
  if (kind === "key" && typeof last !== "string") {
    pathFailure(path, `path must lead to an object key: ${describeValue(path)}`)
  }
  if (kind === "index" && typeof last !== "number") {
    pathFailure(path, `path must lead to an array index: ${describeValue(path)}`)
  }
}
