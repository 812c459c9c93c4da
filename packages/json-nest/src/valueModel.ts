import { formatPath, InvalidValueError } from "./error"
import type { JSONArray, JSONRecord, JSONValue, Path } from "./json"
import { describeValue, isPlainObject, typeName } from "./utils"

/**
 * Runtime tag of a JSON value.
 * Integers and floats are distinct tags even though JS has a single number type.
 */
export type ValueTag = "null" | "boolean" | "int" | "float" | "string" | "object" | "array"

export const VALUE_TAGS: readonly ValueTag[] = [
  "null",
  "boolean",
  "int",
  "float",
  "string",
  "object",
  "array",
]

/**
 * A JSON value together with its tag, so that callers can switch on the tag
 * and get the value narrowed accordingly.
 */
export type Classified =
  | { readonly tag: "null"; readonly value: null }
  | { readonly tag: "boolean"; readonly value: boolean }
  | { readonly tag: "int"; readonly value: number }
  | { readonly tag: "float"; readonly value: number }
  | { readonly tag: "string"; readonly value: string }
  | { readonly tag: "object"; readonly value: JSONRecord }
  | { readonly tag: "array"; readonly value: JSONArray }

/**
 * Tags a JSON value. Only looks at the top level.
 */
export function classify(value: JSONValue): Classified {
  if (value === null) return { tag: "null", value }
  switch (typeof value) {
    case "boolean":
      return { tag: "boolean", value }
    case "number":
      return Number.isInteger(value) ? { tag: "int", value } : { tag: "float", value }
    case "string":
      return { tag: "string", value }
    default:
      return Array.isArray(value) ? { tag: "array", value } : { tag: "object", value }
  }
}

/**
 * Narrows a JSON value to a record.
 */
export function isRecord(value: JSONValue): value is JSONRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function tagOf(value: JSONValue): ValueTag {
  return classify(value).tag
}

/**
 * Describes the kind of any value for error messages,
 * using value tags for JSON values and the runtime type name otherwise.
 */
export function kindOf(value: unknown): string {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return "number"
    return Number.isInteger(value) ? "int" : "float"
  }
  return typeName(value)
}

function invalidValue(trail: readonly (string | number)[], value: unknown): never {
  const path: Path = trail.slice()
  const where = path.length > 0 ? ` at path ${formatPath(path)}` : ""
  throw new InvalidValueError(
    path,
    value,
    `invalid value of type ${kindOf(value)}${where}: ${describeValue(value)}`
  )
}

function walk(value: unknown, trail: (string | number)[]): void {
  if (value === null) return

  switch (typeof value) {
    case "boolean":
    case "string":
      return
    case "number":
      if (!Number.isFinite(value)) invalidValue(trail, value)
      return
    default:
      break
  }

  if (Array.isArray(value)) {
    // index loop so that holes show up as undefined
    for (let i = 0; i < value.length; i++) {
      trail.push(i)
      walk(value[i], trail)
      trail.pop()
    }
    return
  }

  if (isPlainObject(value)) {
    if (Object.getOwnPropertySymbols(value).length > 0) {
      invalidValue(trail, value)
    }
    for (const key of Object.keys(value)) {
      trail.push(key)
      walk(value[key], trail)
      trail.pop()
    }
    return
  }

  invalidValue(trail, value)
}

/**
 * Recursively checks that every value reachable from `value` belongs to the JSON data model.
 * Throws an InvalidValueError naming the first offending sub-path.
 *
 * @param path - Location of `value`, prefixed to the sub-path in errors.
 */
export function validateValue(value: unknown, path: Path = []): asserts value is JSONValue {
  walk(value, path.slice())
}
