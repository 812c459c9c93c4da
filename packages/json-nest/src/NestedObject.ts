import { KeyError, LookupError, pathFailure } from "./error"
import type { JSONRecord, JSONValue, Path } from "./json"
import { assertLastSegment, assertRootSegment, normalizePath, type PathLike } from "./path"
import {
  cleanWriteValue,
  resolveContains,
  resolveDelete,
  resolveRead,
  resolveWrite,
} from "./traversal"
import {
  checkType,
  type Item,
  type ItemOf,
  resolveOptionalTypeSpec,
  resolveTypeSpec,
  type TypeDescriptor,
} from "./typeSpec"
import {
  assignKey,
  deepCloneRecord,
  deepEqual,
  describeValue,
  hasOwn,
  isPlainObject,
  shallowCopyRecord,
} from "./utils"
import { validateValue } from "./valueModel"
import { type CopyOptions, type Settable, toWriteValue, type WrapOptions, wrapItem } from "./wrap"

/**
 * Sources a NestedObject can be built from. Always copied and validated.
 */
export type ObjectSource =
  | JSONRecord
  | NestedObject
  | ReadonlyMap<string, unknown>
  | Iterable<readonly [string, unknown]>

/**
 * Validates every entry of `source` before anything is assigned.
 */
function collectEntries(source: ObjectSource): [string, JSONValue][] {
  if (source instanceof NestedObject) {
    const data = source.unwrap()
    return Object.keys(data).map((key): [string, JSONValue] => [key, data[key]])
  }

  const entries: [string, JSONValue][] = []
  if (isPlainObject(source)) {
    for (const key of Object.keys(source)) {
      entries.push([key, cleanWriteValue(toWriteValue(source[key]), [key])])
    }
    return entries
  }

  if (!(Symbol.iterator in source)) {
    throw new TypeError(`not an object or an iterable of entries: ${describeValue(source)}`)
  }
  for (const [key, value] of source) {
    if (typeof key !== "string") {
      pathFailure(key, `invalid object key: ${describeValue(key)}`)
    }
    entries.push([key, cleanWriteValue(toWriteValue(value), [key])])
  }
  return entries
}

/**
 * Object-like container with nested path lookups and type checking.
 *
 * Holds a reference to (not a copy of) a plain JSON object. Mutations act
 * on that object, so every other holder of it sees them.
 *
 * @example
 * ```ts
 * const doc = new NestedObject({ user: { login: "jdoe" } })
 * doc.get(["user", "login"], "string") // "jdoe"
 * doc.set(["user", "profile", "city"], "Lyon") // creates "profile"
 * doc.get(["user", "login"], "int") // throws InvalidValueError
 * ```
 */
export class NestedObject implements Iterable<string> {
  private _data: JSONRecord

  constructor(source?: ObjectSource) {
    this._data = {}
    if (source !== undefined) {
      this.update(source)
    }
  }

  /**
   * Builds a new NestedObject from a copy of `source`.
   */
  static from(source: ObjectSource): NestedObject {
    return new NestedObject(source)
  }

  /**
   * Builds a new NestedObject with every key set to the same value.
   */
  static fromKeys(keys: Iterable<string>, value: Settable = null): NestedObject {
    return new NestedObject(Array.from(keys, (key): [string, unknown] => [key, value]))
  }

  /**
   * Wraps an existing object without copying it.
   */
  static wrap(raw: JSONRecord | NestedObject, options: WrapOptions = {}): NestedObject {
    if (raw instanceof NestedObject) return raw
    if (!isPlainObject(raw)) {
      throw new TypeError(`not an object: ${describeValue(raw)}`)
    }
    if (options.check ?? true) {
      validateValue(raw)
    }
    const wrapped = new NestedObject()
    wrapped._data = raw
    return wrapped
  }

  /**
   * Returns the underlying object (no copy).
   */
  unwrap(): JSONRecord {
    return this._data
  }

  get size(): number {
    return Object.keys(this._data).length
  }

  private resolvePath(pathLike: PathLike): Path {
    const path = normalizePath(pathLike)
    assertRootSegment(path, "object")
    return path
  }

  /**
   * Reads the value at a key or path.
   * Throws KeyError/IndexError when it is missing and InvalidValueError when it does not match `type`.
   */
  get(pathLike: PathLike): Item
  get<const D extends TypeDescriptor>(pathLike: PathLike, type: D): ItemOf<D>
  get(pathLike: PathLike, type?: TypeDescriptor): Item {
    const spec = resolveOptionalTypeSpec(type)
    return wrapItem(resolveRead(this._data, this.resolvePath(pathLike), spec))
  }

  /**
   * Reads the value at a key or path, or returns `fallback` when it is missing.
   * A value that exists but does not match `type` still throws.
   */
  getOr<F>(pathLike: PathLike, fallback: F): Item | F
  getOr<const D extends TypeDescriptor, F>(pathLike: PathLike, fallback: F, type: D): ItemOf<D> | F
  getOr<F>(pathLike: PathLike, fallback: F, type?: TypeDescriptor): Item | F {
    const spec = resolveOptionalTypeSpec(type)
    const path = this.resolvePath(pathLike)
    let value: JSONValue
    try {
      value = resolveRead(this._data, path)
    } catch (error) {
      if (error instanceof LookupError) return fallback
      throw error
    }
    if (spec) checkType(value, spec, path)
    return wrapItem(value)
  }

  /**
   * Writes a value at a key or path, creating missing intermediate objects.
   * Arrays are never created or extended. A failed write changes nothing.
   */
  set(pathLike: PathLike, value: Settable, type?: TypeDescriptor): void {
    const spec = resolveOptionalTypeSpec(type)
    resolveWrite(this._data, this.resolvePath(pathLike), toWriteValue(value), spec)
  }

  /**
   * Returns the value at a key or path, first writing `fallback` there if it is missing.
   * `fallback` is validated (and type checked) even when a value already exists.
   */
  setDefault(pathLike: PathLike, fallback: Settable): Item
  setDefault<const D extends TypeDescriptor>(pathLike: PathLike, fallback: Settable, type: D): ItemOf<D>
  setDefault(pathLike: PathLike, fallback: Settable, type?: TypeDescriptor): Item {
    const spec = resolveOptionalTypeSpec(type)
    const path = this.resolvePath(pathLike)
    const input = toWriteValue(fallback)

    let existing: JSONValue
    try {
      existing = resolveRead(this._data, path)
    } catch (error) {
      if (!(error instanceof LookupError)) throw error
      resolveWrite(this._data, path, input, spec)
      return wrapItem(resolveRead(this._data, path))
    }

    if (spec) checkType(existing, spec, path)
    const cleanFallback = cleanWriteValue(input)
    if (spec) checkType(cleanFallback, spec)
    return wrapItem(existing)
  }

  /**
   * Removes the value at a key or path.
   * With `type`, the value must match before it is removed.
   */
  delete(pathLike: PathLike, type?: TypeDescriptor): void {
    const spec = resolveOptionalTypeSpec(type)
    resolveDelete(this._data, this.resolvePath(pathLike), spec)
  }

  /**
   * Tells whether a key or path leads to a value (of `type`, when given).
   * Never throws for missing or mismatching data.
   */
  has(pathLike: PathLike, type?: TypeDescriptor): boolean {
    const spec = resolveOptionalTypeSpec(type)
    return resolveContains(this._data, this.resolvePath(pathLike), spec)
  }

  /**
   * Copies entries from `source`, validating all of them before assigning any.
   */
  update(source: ObjectSource): void {
    for (const [key, value] of collectEntries(source)) {
      assignKey(this._data, key, value)
    }
  }

  /**
   * Removes the value at a key or path and returns it.
   * The path must end in an object key.
   */
  pop(pathLike: PathLike): Item
  pop<const D extends TypeDescriptor>(pathLike: PathLike, type: D): ItemOf<D>
  pop(pathLike: PathLike, type?: TypeDescriptor): Item {
    const spec = resolveOptionalTypeSpec(type)
    const path = this.resolvePath(pathLike)
    assertLastSegment(path, "key")
    return wrapItem(resolveDelete(this._data, path, spec))
  }

  /**
   * Like pop, but returns `fallback` when the value is missing.
   */
  popOr<F>(pathLike: PathLike, fallback: F): Item | F
  popOr<const D extends TypeDescriptor, F>(pathLike: PathLike, fallback: F, type: D): ItemOf<D> | F
  popOr<F>(pathLike: PathLike, fallback: F, type?: TypeDescriptor): Item | F {
    const spec = resolveOptionalTypeSpec(type)
    const path = this.resolvePath(pathLike)
    assertLastSegment(path, "key")
    try {
      return wrapItem(resolveDelete(this._data, path, spec))
    } catch (error) {
      if (error instanceof LookupError) return fallback
      throw error
    }
  }

  /**
   * Removes the first entry (in insertion order) and returns it.
   */
  popItem(type?: TypeDescriptor): [string, Item] {
    const spec = resolveOptionalTypeSpec(type)
    const keys = Object.keys(this._data)
    if (keys.length === 0) {
      throw new KeyError([], "object is empty")
    }
    const key = keys[0]
    return [key, wrapItem(resolveDelete(this._data, [key], spec))]
  }

  /**
   * Removes every key, in place.
   */
  clear(): void {
    for (const key of Object.keys(this._data)) {
      delete this._data[key]
    }
  }

  /**
   * Checks every value against `type`. Errors name the offending key.
   */
  checkTypes(type: TypeDescriptor): void {
    const spec = resolveTypeSpec(type)
    for (const key of Object.keys(this._data)) {
      checkType(this._data[key], spec, [key])
    }
  }

  *keys(): IterableIterator<string> {
    yield* Object.keys(this._data)
  }

  /**
   * Iterates over the values. With `type`, each value is checked right before
   * it is yielded, so iteration stops at the first mismatch.
   */
  values(): IterableIterator<Item>
  values<const D extends TypeDescriptor>(type: D): IterableIterator<ItemOf<D>>
  values(type?: TypeDescriptor): IterableIterator<Item> {
    const spec = resolveOptionalTypeSpec(type)
    const data = this._data
    return (function* () {
      for (const key of Object.keys(data)) {
        if (!hasOwn(data, key)) continue
        const value = data[key]
        if (spec) checkType(value, spec, [key])
        yield wrapItem(value)
      }
    })()
  }

  /**
   * Iterates over `[key, value]` pairs, checking values like `values()` does.
   */
  entries(): IterableIterator<[string, Item]>
  entries<const D extends TypeDescriptor>(type: D): IterableIterator<[string, ItemOf<D>]>
  entries(type?: TypeDescriptor): IterableIterator<[string, Item]> {
    const spec = resolveOptionalTypeSpec(type)
    const data = this._data
    return (function* (): IterableIterator<[string, Item]> {
      for (const key of Object.keys(data)) {
        if (!hasOwn(data, key)) continue
        const value = data[key]
        if (spec) checkType(value, spec, [key])
        yield [key, wrapItem(value)]
      }
    })()
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this.keys()
  }

  /**
   * Deep structural equality with another NestedObject or a plain object.
   */
  equals(other: unknown): boolean {
    if (other instanceof NestedObject) {
      return other._data === this._data || deepEqual(this._data, other._data)
    }
    return isPlainObject(other) && deepEqual(this._data, other)
  }

  /**
   * Copies into a new NestedObject. Shallow by default.
   */
  copy(options: CopyOptions = {}): NestedObject {
    const data = options.deep ? deepCloneRecord(this._data) : shallowCopyRecord(this._data)
    return NestedObject.wrap(data, { check: false })
  }

  toJSON(): JSONRecord {
    return this._data
  }

  toString(): string {
    return `NestedObject(${JSON.stringify(this._data)})`
  }
}
