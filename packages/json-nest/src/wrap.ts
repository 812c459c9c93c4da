import type { JSONArray, JSONContainer, JSONRecord, JSONValue } from "./json"
import { NestedArray } from "./NestedArray"
import { NestedObject } from "./NestedObject"
import type { WriteValue } from "./traversal"
import type { Item } from "./typeSpec"
import { describeValue, isPlainObject } from "./utils"

export interface WrapOptions {
  /**
   * Validate the whole structure against the JSON data model.
   * Skip it only for data known to be valid, e.g. fresh out of JSON.parse.
   * Default: true
   */
  check?: boolean
}

export interface CopyOptions {
  /**
   * Copy nested containers too.
   * Default: false
   */
  deep?: boolean
}

/**
 * Anything that can be stored: a JSON value, or a wrapper (stored by its underlying data).
 */
export type Settable = JSONValue | NestedObject | NestedArray

/**
 * Wraps an existing object or array without copying it.
 * A wrapper is returned as is.
 */
export function wrap(raw: JSONRecord | NestedObject, options?: WrapOptions): NestedObject
export function wrap(raw: JSONArray | NestedArray, options?: WrapOptions): NestedArray
export function wrap(
  raw: JSONContainer | NestedObject | NestedArray,
  options?: WrapOptions
): NestedObject | NestedArray
export function wrap(raw: unknown, options: WrapOptions = {}): NestedObject | NestedArray {
  if (raw instanceof NestedObject || raw instanceof NestedArray) return raw
  if (Array.isArray(raw)) return NestedArray.wrap(raw, options)
  if (isPlainObject(raw)) return NestedObject.wrap(raw, options)
  throw new TypeError(`not an object or array: ${describeValue(raw)}`)
}

/**
 * Wraps a value on its way out: containers get a new wrapper (no validation), primitives pass through.
 */
export function wrapItem(value: JSONValue): Item {
  if (Array.isArray(value)) return NestedArray.wrap(value, { check: false })
  if (value !== null && typeof value === "object") return NestedObject.wrap(value, { check: false })
  return value
}

/**
 * Unwraps a value on its way in: wrappers contribute their (already valid) data,
 * anything else still has to be validated.
 */
export function toWriteValue(value: unknown): WriteValue {
  if (value instanceof NestedObject || value instanceof NestedArray) {
    return { trusted: true, value: value.unwrap() }
  }
  return { trusted: false, value }
}
