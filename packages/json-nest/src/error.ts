import type { Path } from "./json"

/**
 * Renders a path for error messages, e.g. `["user","login",0]`.
 */
export function formatPath(path: Path): string {
  return JSON.stringify(path)
}

/**
 * Base class of every error thrown by json-nest.
 */
export class JsonNestError extends Error {
  constructor(msg: string) {
    super(msg)
    this.name = new.target.name

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Missing data: a key or index is absent somewhere along a path.
 * Recoverable; callers that supply defaults expect it.
 */
export class LookupError extends JsonNestError {
  constructor(
    readonly path: Path,
    msg: string = formatPath(path)
  ) {
    super(msg)
  }
}

/**
 * A key is absent from an object.
 */
export class KeyError extends LookupError {}

/**
 * An index is out of range for an array.
 */
export class IndexError extends LookupError {}

/**
 * Data does not match what the caller asked for.
 * Base class of InvalidStructureError and InvalidValueError.
 */
export class DataError extends JsonNestError {
  constructor(
    readonly path: Path,
    msg: string
  ) {
    super(msg)
  }
}

/**
 * An intermediate node is of the wrong container kind for the next path segment.
 */
export class InvalidStructureError extends DataError {
  constructor(
    path: Path,
    readonly subpath: Path,
    readonly expected: string,
    readonly actual: string
  ) {
    super(
      path,
      `expected ${expected}, got ${actual} at subpath ${formatPath(subpath)} of ${formatPath(path)}`
    )
  }
}

/**
 * A value fails its type specification or is not a JSON value at all.
 * `path` is the exact location of the offending value (empty for a bare value).
 * `expected` is the rendered type on a type mismatch, and undefined for a value
 * outside the JSON data model.
 */
export class InvalidValueError extends DataError {
  constructor(
    path: Path,
    readonly value: unknown,
    msg: string,
    readonly expected?: string
  ) {
    super(path, msg)
  }
}

/**
 * A malformed path. Indicates an incorrect call site.
 */
export class PathSyntaxError extends JsonNestError {
  constructor(
    readonly pathLike: unknown,
    msg: string
  ) {
    super(msg)
  }
}

/**
 * A malformed type descriptor. Indicates an incorrect call site.
 */
export class TypeSpecError extends JsonNestError {
  constructor(
    readonly descriptor: unknown,
    msg: string
  ) {
    super(msg)
  }
}

export function keyFailure(path: Path): never {
  throw new KeyError(path)
}

export function indexFailure(path: Path): never {
  throw new IndexError(path)
}

export function structureFailure(
  path: Path,
  depth: number,
  expected: string,
  actual: string
): never {
  throw new InvalidStructureError(path, path.slice(0, depth), expected, actual)
}

export function pathFailure(pathLike: unknown, message: string): never {
  throw new PathSyntaxError(pathLike, message)
}
