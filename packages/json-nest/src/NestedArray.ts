import { InvalidValueError, LookupError, pathFailure } from "./error"
import type { JSONArray, JSONValue, Path } from "./json"
import { compareArrays, compareValues } from "./ordering"
import {
  assertLastSegment,
  assertRootSegment,
  isPathSegment,
  normalizePath,
  type PathLike,
} from "./path"
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
  type TypeSpec,
} from "./typeSpec"
import { deepCloneArray, deepEqual, describeValue } from "./utils"
import { validateValue } from "./valueModel"
import { type CopyOptions, type Settable, toWriteValue, type WrapOptions, wrapItem } from "./wrap"

/**
 * Array-like container with nested path lookups and type checking.
 *
 * Holds a reference to (not a copy of) a plain JSON array. Mutations act
 * on that array, so every other holder of it sees them.
 */
export class NestedArray implements Iterable<Item> {
  private _data: JSONArray

  constructor(source?: Iterable<Settable>) {
    this._data = []
    if (source !== undefined) {
      this.extend(source)
    }
  }

  /**
   * Builds a new NestedArray from a copy of `source`.
   */
  static from(source: Iterable<Settable>): NestedArray {
    return new NestedArray(source)
  }

  /**
   * Wraps an existing array without copying it.
   */
  static wrap(raw: JSONArray | NestedArray, options: WrapOptions = {}): NestedArray {
    if (raw instanceof NestedArray) return raw
    if (!Array.isArray(raw)) {
      throw new TypeError(`not an array: ${describeValue(raw)}`)
    }
    if (options.check ?? true) {
      validateValue(raw)
    }
    const wrapped = new NestedArray()
    wrapped._data = raw
    return wrapped
  }

  /**
   * Returns the underlying array (no copy).
   */
  unwrap(): JSONArray {
    return this._data
  }

  get length(): number {
    return this._data.length
  }

  private resolvePath(pathLike: PathLike): Path {
    const path = normalizePath(pathLike)
    assertRootSegment(path, "array")
    return path
  }

  /**
   * Validates (and type checks) a value that is about to be inserted or searched for.
   *
   * @param path - Index the value will land at, used in error messages.
   */
  private clean(value: unknown, spec: TypeSpec | undefined, path: Path = []): JSONValue {
    const clean = cleanWriteValue(toWriteValue(value), path)
    if (spec) checkType(clean, spec, path)
    return clean
  }

  /**
   * Reads the value at an index or path.
   * Throws KeyError/IndexError when it is missing and InvalidValueError when it does not match `type`.
   */
  get(pathLike: PathLike): Item
  get<const D extends TypeDescriptor>(pathLike: PathLike, type: D): ItemOf<D>
  get(pathLike: PathLike, type?: TypeDescriptor): Item {
    const spec = resolveOptionalTypeSpec(type)
    return wrapItem(resolveRead(this._data, this.resolvePath(pathLike), spec))
  }

  /**
   * Reads the value at an index or path, or returns `fallback` when it is missing.
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
   * Replaces the value at an index or path. The index must exist: arrays are never extended.
   * Missing objects below an existing element are created.
   */
  set(pathLike: PathLike, value: Settable, type?: TypeDescriptor): void {
    const spec = resolveOptionalTypeSpec(type)
    resolveWrite(this._data, this.resolvePath(pathLike), toWriteValue(value), spec)
  }

  /**
   * Removes the value at an index or path.
   * With `type`, the value must match before it is removed.
   */
  delete(pathLike: PathLike, type?: TypeDescriptor): void {
    const spec = resolveOptionalTypeSpec(type)
    resolveDelete(this._data, this.resolvePath(pathLike), spec)
  }

  /**
   * Tells whether an index or path leads to a value (of `type`, when given).
   * Never throws for missing or mismatching data.
   */
  has(pathLike: PathLike, type?: TypeDescriptor): boolean {
    const spec = resolveOptionalTypeSpec(type)
    return resolveContains(this._data, this.resolvePath(pathLike), spec)
  }

  /**
   * Checks every element against `type`. Errors name the offending index.
   */
  checkTypes(type: TypeDescriptor): void {
    const spec = resolveTypeSpec(type)
    for (let i = 0; i < this._data.length; i++) {
      checkType(this._data[i], spec, [i])
    }
  }

  /**
   * Iterates over the elements. With `type`, each element is checked right before
   * it is yielded, so iteration stops at the first mismatch.
   */
  iter(): IterableIterator<Item>
  iter<const D extends TypeDescriptor>(type: D): IterableIterator<ItemOf<D>>
  iter(type?: TypeDescriptor): IterableIterator<Item> {
    const spec = resolveOptionalTypeSpec(type)
    const data = this._data
    return (function* () {
      for (let i = 0; i < data.length; i++) {
        const value = data[i]
        if (spec) checkType(value, spec, [i])
        yield wrapItem(value)
      }
    })()
  }

  /**
   * Iterates from the last element to the first, checking elements like `iter()` does.
   */
  reversed(): IterableIterator<Item>
  reversed<const D extends TypeDescriptor>(type: D): IterableIterator<ItemOf<D>>
  reversed(type?: TypeDescriptor): IterableIterator<Item> {
    const spec = resolveOptionalTypeSpec(type)
    const data = this._data
    return (function* () {
      for (let i = data.length - 1; i >= 0; i--) {
        if (i >= data.length) continue
        const value = data[i]
        if (spec) checkType(value, spec, [i])
        yield wrapItem(value)
      }
    })()
  }

  [Symbol.iterator](): IterableIterator<Item> {
    return this.iter()
  }

  /**
   * Appends a value and returns the new length.
   */
  push(value: Settable, type?: TypeDescriptor): number {
    const spec = resolveOptionalTypeSpec(type)
    return this._data.push(this.clean(value, spec, [this._data.length]))
  }

  /**
   * Appends every value of `iterable`, validating all of them before appending any.
   */
  extend(iterable: Iterable<Settable>, type?: TypeDescriptor): void {
    if (typeof iterable === "string") {
      throw new TypeError("expected an iterable that is not a string")
    }
    const spec = resolveOptionalTypeSpec(type)
    const start = this._data.length
    const values = Array.from(iterable, (value, i) => this.clean(value, spec, [start + i]))
    for (const value of values) {
      this._data.push(value)
    }
  }

  /**
   * Inserts a value before `index`, clamping it like `Array.prototype.splice` does.
   * Errors name the index the value would have landed at.
   */
  insert(index: number, value: Settable, type?: TypeDescriptor): void {
    if (typeof index !== "number" || !isPathSegment(index)) {
      pathFailure(index, `invalid index: ${describeValue(index)}`)
    }
    const spec = resolveOptionalTypeSpec(type)
    const length = this._data.length
    const position = index < 0 ? Math.max(length + index, 0) : Math.min(index, length)
    this._data.splice(position, 0, this.clean(value, spec, [position]))
  }

  /**
   * Returns a new NestedArray with the elements of this one followed by those of `other`.
   */
  concat(other: NestedArray | Iterable<Settable>): NestedArray {
    const result = this.copy()
    result.extend(other)
    return result
  }

  /**
   * Returns a new NestedArray over a shallow copy of a range of elements.
   */
  slice(start?: number, end?: number): NestedArray {
    return NestedArray.wrap(this._data.slice(start, end), { check: false })
  }

  /**
   * Removes the element at an index or path (the last one by default) and returns it.
   * The path must end in an array index.
   */
  pop(pathLike?: PathLike): Item
  pop<const D extends TypeDescriptor>(pathLike: PathLike, type: D): ItemOf<D>
  pop(pathLike: PathLike = -1, type?: TypeDescriptor): Item {
    const spec = resolveOptionalTypeSpec(type)
    const path = this.resolvePath(pathLike)
    assertLastSegment(path, "index")
    return wrapItem(resolveDelete(this._data, path, spec))
  }

  /**
   * Removes the first element deeply equal to `value`.
   * Throws a RangeError when there is none.
   */
  remove(value: Settable, type?: TypeDescriptor): void {
    const spec = resolveOptionalTypeSpec(type)
    const needle = this.clean(value, spec)
    const index = this._data.findIndex((item) => deepEqual(item, needle))
    if (index === -1) {
      throw new RangeError(`${describeValue(needle)} is not in the array`)
    }
    this._data.splice(index, 1)
  }

  /**
   * Tells whether an element deeply equal to `value` exists.
   * A value that is not valid JSON, or that does not match `type`, is never included.
   */
  includes(value: unknown, type?: TypeDescriptor): boolean {
    const spec = resolveOptionalTypeSpec(type)
    let needle: JSONValue
    try {
      needle = this.clean(value, spec)
    } catch (error) {
      if (error instanceof InvalidValueError) return false
      throw error
    }
    return this._data.some((item) => deepEqual(item, needle))
  }

  /**
   * Index of the first element deeply equal to `value` within `[start, end)`, or -1.
   */
  indexOf(value: Settable, start = 0, end = this._data.length, type?: TypeDescriptor): number {
    const spec = resolveOptionalTypeSpec(type)
    const needle = this.clean(value, spec)
    const length = this._data.length
    const from = start < 0 ? Math.max(length + start, 0) : start
    const to = Math.min(end < 0 ? length + end : end, length)
    for (let i = from; i < to; i++) {
      if (deepEqual(this._data[i], needle)) return i
    }
    return -1
  }

  /**
   * Number of elements deeply equal to `value`.
   */
  count(value: Settable, type?: TypeDescriptor): number {
    const spec = resolveOptionalTypeSpec(type)
    const needle = this.clean(value, spec)
    return this._data.reduce((total: number, item) => (deepEqual(item, needle) ? total + 1 : total), 0)
  }

  /**
   * Sorts in place. Without `compare`, elements are ordered like `compare()` orders arrays.
   */
  sort(compare?: (a: Item, b: Item) => number): this {
    this._data.sort(compare ? (a, b) => compare(wrapItem(a), wrapItem(b)) : compareValues)
    return this
  }

  /**
   * Reverses in place.
   */
  reverse(): this {
    this._data.reverse()
    return this
  }

  /**
   * Removes every element, in place.
   */
  clear(): void {
    this._data.length = 0
  }

  /**
   * Deep structural equality with another NestedArray or a plain array.
   */
  equals(other: unknown): boolean {
    if (other instanceof NestedArray) {
      return other._data === this._data || deepEqual(this._data, other._data)
    }
    return Array.isArray(other) && deepEqual(this._data, other)
  }

  /**
   * Lexicographic ordering against another NestedArray or a plain array: -1, 0 or 1.
   * Throws a TypeError when two elements cannot be ordered (objects, or different kinds).
   */
  compare(other: NestedArray | JSONArray): number {
    const otherData = other instanceof NestedArray ? other._data : other
    if (!Array.isArray(otherData)) {
      throw new TypeError(`cannot compare with ${describeValue(otherData)}`)
    }
    return compareArrays(this._data, otherData)
  }

  /**
   * Copies into a new NestedArray. Shallow by default.
   */
  copy(options: CopyOptions = {}): NestedArray {
    const data = options.deep ? deepCloneArray(this._data) : this._data.slice()
    return NestedArray.wrap(data, { check: false })
  }

  toJSON(): JSONArray {
    return this._data
  }

  toString(): string {
    return `NestedArray(${JSON.stringify(this._data)})`
  }
}
