import type { JSONArray, JSONValue } from "./json"
import { deepEqual } from "./utils"
import { classify } from "./valueModel"

function order(a: number | string, b: number | string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Compares two JSON values for sorting.
 * Numbers compare numerically (ints and floats together), strings by code unit,
 * booleans false before true, arrays lexicographically.
 * Throws a TypeError for objects and for values of different kinds.
 */
export function compareValues(a: JSONValue, b: JSONValue): number {
  const left = classify(a)
  const right = classify(b)

  switch (left.tag) {
    case "int":
    case "float":
      if (right.tag === "int" || right.tag === "float") return order(left.value, right.value)
      break
    case "string":
      if (right.tag === "string") return order(left.value, right.value)
      break
    case "boolean":
      if (right.tag === "boolean") return order(Number(left.value), Number(right.value))
      break
    case "null":
      if (right.tag === "null") return 0
      break
    case "array":
      if (right.tag === "array") return compareArrays(left.value, right.value)
      break
    case "object":
      break
  }

  throw new TypeError(`cannot order ${left.tag} and ${right.tag}`)
}

/**
 * Lexicographic comparison: the first pair of elements that are not deeply equal decides,
 * otherwise the shorter array comes first.
 */
export function compareArrays(a: JSONArray, b: JSONArray): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (!deepEqual(a[i], b[i])) return compareValues(a[i], b[i])
  }
  return order(a.length, b.length)
}
