import equal from "fast-deep-equal"
import type { JSONArray, JSONRecord, JSONValue } from "./json"

const MAX_DESCRIPTION_LENGTH = 60

/**
 * Deep equality check for JSONValues.
 * Used for equals / includes / indexOf / count / remove.
 */
export function deepEqual(a: JSONValue, b: JSONValue): boolean {
  return equal(a, b)
}

/**
 * Checks if a value is an object (typeof === "object" && !== null).
 */
export function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object"
}

/**
 * Checks if a value is a plain object (created by a literal or JSON.parse).
 * Null-prototype objects are not plain: deep equality tells them apart from literals.
 *
 * Shallow check. Nested values are trusted, not inspected: use validateValue for a full check.
 */
export function isPlainObject(value: unknown): value is JSONRecord {
  return isObject(value) && Object.getPrototypeOf(value) === Object.prototype
}

/**
 * Own property check, ignoring inherited keys.
 */
export function hasOwn(target: object, key: string): boolean {
  return Object.hasOwn(target, key)
}

/**
 * Assigns an own property, including `__proto__`, which a plain assignment
 * would route to the prototype setter instead.
 */
export function assignKey(record: JSONRecord, key: string, value: JSONValue): void {
  if (key === "__proto__") {
    Object.defineProperty(record, key, {
      value,
      writable: true,
      enumerable: true,
      configurable: true,
    })
  } else {
    record[key] = value
  }
}

/**
 * Shallow copy of a record, keeping every own key.
 */
export function shallowCopyRecord(record: JSONRecord): JSONRecord {
  const copy: JSONRecord = {}
  for (const key of Object.keys(record)) {
    assignKey(copy, key, record[key])
  }
  return copy
}

/**
 * Deep clone of a JSON value. Primitives are returned as is.
 */
export function deepClone(value: JSONValue): JSONValue {
  if (Array.isArray(value)) return deepCloneArray(value)
  if (value !== null && typeof value === "object") return deepCloneRecord(value)
  return value
}

export function deepCloneArray(array: JSONArray): JSONArray {
  return array.map((item) => deepClone(item))
}

export function deepCloneRecord(record: JSONRecord): JSONRecord {
  const copy: JSONRecord = {}
  for (const key of Object.keys(record)) {
    assignKey(copy, key, deepClone(record[key]))
  }
  return copy
}

/**
 * Name of the runtime type of a value, as shown in error messages.
 */
export function typeName(value: unknown): string {
  if (value === null) return "null"
  if (typeof value === "function") return "function"
  if (typeof value !== "object") return typeof value
  if (Array.isArray(value)) return "array"
  const proto = Object.getPrototypeOf(value)
  if (proto === Object.prototype) return "object"
  if (proto === null) return "null-prototype object"
  const ctor: unknown = proto.constructor
  return typeof ctor === "function" && ctor.name ? ctor.name : "object"
}

function truncate(text: string): string {
  return text.length > MAX_DESCRIPTION_LENGTH
    ? `${text.slice(0, MAX_DESCRIPTION_LENGTH - 3)}...`
    : text
}

/**
 * Short, bounded representation of any value for error messages.
 * JSON values are shown as JSON, everything else by kind.
 */
export function describeValue(value: unknown): string {
  switch (typeof value) {
    case "undefined":
      return "undefined"
    case "bigint":
      return `${value}n`
    case "symbol":
      return value.toString()
    case "function":
      return `[Function ${value.name || "anonymous"}]`
    case "number":
      return Number.isFinite(value) ? JSON.stringify(value) : String(value)
    case "string":
    case "boolean":
      return truncate(JSON.stringify(value))
    default:
      break
  }

  if (value === null) return "null"
  if (!Array.isArray(value) && !isPlainObject(value)) return typeName(value)

  try {
    return truncate(JSON.stringify(value))
  } catch {
    // cyclic structures and nested bigints cannot be stringified
    return Array.isArray(value) ? "[...]" : "{...}"
  }
}
