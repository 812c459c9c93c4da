/**
 * A unique path to a value within the JSON document.
 * Strings address object keys, integers address array indexes
 * (negative ones count from the end).
 */
export type Path = readonly (string | number)[]

/**
 * A JSON primitive.
 * Note: `undefined` is not a JSON value, neither for object properties nor for array slots.
 */
export type JSONPrimitive = null | boolean | number | string

/**
 * A JSON record.
 */
export type JSONRecord = { [k: string]: JSONValue }

/**
 * A JSON array.
 */
export type JSONArray = JSONValue[]

/**
 * A JSON container (record or array).
 */
export type JSONContainer = JSONRecord | JSONArray

/**
 * A JSON value.
 */
export type JSONValue = JSONPrimitive | JSONContainer
