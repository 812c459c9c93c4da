import { formatPath, InvalidValueError, TypeSpecError } from "./error"
import type { JSONPrimitive, JSONValue, Path } from "./json"
import type { NestedArray } from "./NestedArray"
import type { NestedObject } from "./NestedObject"
import { isRecord, kindOf, tagOf, VALUE_TAGS, type ValueTag } from "./valueModel"
import { describeValue, isPlainObject } from "./utils"

// ============================================================================
// Descriptors (what callers write)
// ============================================================================

/**
 * A single tag. `"number"` is shorthand for `oneOf("int", "float")`.
 */
export type ScalarTag = ValueTag | "number"

/**
 * A union of acceptable tags.
 */
export interface OneOf<T extends readonly ScalarTag[] = readonly ScalarTag[]> {
  readonly oneOf: T
}

export type ScalarDescriptor = ScalarTag | OneOf

/**
 * Type descriptor literal:
 * - a tag (`"string"`) or a union (`oneOf("int", "null")`)
 * - a one-element array for a homogeneous array (`["string"]`)
 * - a one-entry object keyed by `string` for a homogeneous object (`{ string: "int" }`)
 */
export type TypeDescriptor =
  | ScalarDescriptor
  | readonly [ScalarDescriptor]
  | { readonly string: ScalarDescriptor }

/**
 * Builds a union descriptor.
 */
export function oneOf<const T extends readonly ScalarTag[]>(...tags: T): OneOf<T> {
  return { oneOf: tags }
}

// ============================================================================
// Canonical specs (what the engine consumes)
// ============================================================================

export interface TagsSpec {
  readonly kind: "tags"
  readonly tags: readonly ValueTag[]
}

export interface ArrayOfSpec {
  readonly kind: "arrayOf"
  readonly element: TagsSpec
}

export interface ObjectOfSpec {
  readonly kind: "objectOf"
  readonly value: TagsSpec
}

export type TypeSpec = TagsSpec | ArrayOfSpec | ObjectOfSpec

// ============================================================================
// Type-level mapping from descriptors to read results
// ============================================================================

/**
 * What an untyped read returns: primitives as is, containers wrapped.
 */
export type Item = JSONPrimitive | NestedObject | NestedArray

type TagValue<T> = T extends "null"
  ? null
  : T extends "boolean"
    ? boolean
    : T extends "int" | "float" | "number"
      ? number
      : T extends "string"
        ? string
        : T extends "object"
          ? NestedObject
          : T extends "array"
            ? NestedArray
            : never

type ScalarValue<D> = D extends ScalarTag
  ? TagValue<D>
  : D extends OneOf<infer T>
    ? TagValue<T[number]>
    : never

/**
 * What a typed read returns for a given descriptor.
 */
export type ItemOf<D extends TypeDescriptor> = D extends ScalarDescriptor
  ? ScalarValue<D>
  : D extends readonly [ScalarDescriptor]
    ? NestedArray
    : D extends { readonly string: ScalarDescriptor }
      ? NestedObject
      : Item

// ============================================================================
// Resolution
// ============================================================================

const resolvedTags = new Map<string, TypeSpec>()

function isValueTag(value: unknown): value is ValueTag {
  return typeof value === "string" && VALUE_TAGS.some((tag) => tag === value)
}

function tagsOf(descriptor: unknown): readonly ValueTag[] | undefined {
  if (descriptor === "number") return ["int", "float"]
  if (isValueTag(descriptor)) return [descriptor]
  return undefined
}

function resolveScalar(descriptor: unknown): TagsSpec | undefined {
  const single = tagsOf(descriptor)
  if (single) return { kind: "tags", tags: single }

  if (!isPlainObject(descriptor)) return undefined
  const keys = Object.keys(descriptor)
  const members = descriptor.oneOf
  if (keys.length !== 1 || !Array.isArray(members) || members.length === 0) return undefined

  const tags: ValueTag[] = []
  for (const member of members) {
    const memberTags = tagsOf(member)
    if (!memberTags) return undefined
    for (const tag of memberTags) {
      if (!tags.includes(tag)) tags.push(tag)
    }
  }
  return { kind: "tags", tags }
}

function resolveUncached(descriptor: unknown): TypeSpec | undefined {
  const scalar = resolveScalar(descriptor)
  if (scalar) return scalar

  if (Array.isArray(descriptor)) {
    if (descriptor.length !== 1) return undefined
    const element = resolveScalar(descriptor[0])
    return element && { kind: "arrayOf", element }
  }

  if (isPlainObject(descriptor)) {
    const keys = Object.keys(descriptor)
    if (keys.length !== 1 || keys[0] !== "string") return undefined
    const value = resolveScalar(descriptor.string)
    return value && { kind: "objectOf", value }
  }

  return undefined
}

/**
 * Turns a type descriptor into its canonical TypeSpec.
 * Throws a TypeSpecError for anything that is not a valid descriptor,
 * including homogeneous containers nested more than one level deep.
 */
export function resolveTypeSpec(descriptor: unknown): TypeSpec {
  if (typeof descriptor === "string") {
    const cached = resolvedTags.get(descriptor)
    if (cached) return cached
  }

  const spec = resolveUncached(descriptor)
  if (!spec) {
    throw new TypeSpecError(
      descriptor,
      "expected a tag (null, boolean, int, float, number, string, object, array), " +
        `oneOf(...), [...] (for arrays) or {string: ...} (for objects), got ${describeValue(descriptor)}`
    )
  }

  if (typeof descriptor === "string") {
    resolvedTags.set(descriptor, spec)
  }
  return spec
}

/**
 * Resolves an optional descriptor.
 */
export function resolveOptionalTypeSpec(descriptor: unknown): TypeSpec | undefined {
  return descriptor === undefined ? undefined : resolveTypeSpec(descriptor)
}

// ============================================================================
// Checking
// ============================================================================

function formatTags(spec: TagsSpec): string {
  return spec.tags.join(" | ")
}

/**
 * Renders a spec for error messages: `int`, `int | float`, `[string]`, `{string: int}`.
 */
export function formatTypeSpec(spec: TypeSpec): string {
  switch (spec.kind) {
    case "tags":
      return formatTags(spec)
    case "arrayOf":
      return `[${formatTags(spec.element)}]`
    case "objectOf":
      return `{string: ${formatTags(spec.value)}}`
  }
}

function mismatch(expected: string, value: unknown, path: Path | undefined): never {
  const where = path && path.length > 0 ? ` at path ${formatPath(path)}` : ""
  throw new InvalidValueError(
    path ?? [],
    value,
    `expected ${expected}, got ${kindOf(value)}${where}: ${describeValue(value)}`,
    expected
  )
}

function hasTag(spec: TagsSpec, value: JSONValue): boolean {
  return spec.tags.includes(tagOf(value))
}

/**
 * Checks `value` against `spec`, throwing an InvalidValueError on mismatch.
 * For homogeneous containers the error names the first offending element.
 *
 * @param path - Location of `value`, used in error messages.
 */
export function checkType(value: JSONValue, spec: TypeSpec, path?: Path): void {
  switch (spec.kind) {
    case "tags":
      if (!hasTag(spec, value)) mismatch(formatTags(spec), value, path)
      return

    case "arrayOf": {
      if (!Array.isArray(value)) mismatch(formatTypeSpec(spec), value, path)
      const expected = `${formatTags(spec.element)} (element of ${formatTypeSpec(spec)})`
      for (let i = 0; i < value.length; i++) {
        const element = value[i]
        if (!hasTag(spec.element, element)) mismatch(expected, element, [...(path ?? []), i])
      }
      return
    }

    case "objectOf": {
      if (!isRecord(value)) mismatch(formatTypeSpec(spec), value, path)
      const expected = `${formatTags(spec.value)} (value of ${formatTypeSpec(spec)})`
      for (const key of Object.keys(value)) {
        const member = value[key]
        if (!hasTag(spec.value, member)) mismatch(expected, member, [...(path ?? []), key])
      }
      return
    }
  }
}

/**
 * Non-throwing variant of checkType.
 */
export function matchesType(value: JSONValue, spec: TypeSpec): boolean {
  switch (spec.kind) {
    case "tags":
      return hasTag(spec, value)
    case "arrayOf":
      return Array.isArray(value) && value.every((element) => hasTag(spec.element, element))
    case "objectOf":
      return isRecord(value) && Object.values(value).every((member) => hasTag(spec.value, member))
  }
}
