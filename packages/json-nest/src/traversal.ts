import {
  DataError,
  indexFailure,
  keyFailure,
  LookupError,
  structureFailure,
} from "./error"
import type { JSONArray, JSONContainer, JSONRecord, JSONValue, Path } from "./json"
import { checkType, type TypeSpec } from "./typeSpec"
import { assignKey, hasOwn } from "./utils"
import { isRecord, kindOf, validateValue } from "./valueModel"

/**
 * A resolved location: the container holding a value and the position inside it.
 * Array positions are already normalized (never negative).
 */
export type Slot =
  | { readonly kind: "key"; readonly container: JSONRecord; readonly key: string }
  | { readonly kind: "index"; readonly container: JSONArray; readonly index: number }

/**
 * Normalizes an index the way `Array.prototype.at` does.
 * Returns undefined when it is out of range.
 */
export function toArrayIndex(array: readonly unknown[], index: number): number | undefined {
  const normalized = index < 0 ? index + array.length : index
  return normalized >= 0 && normalized < array.length ? normalized : undefined
}

/**
 * Checks that `node` can take `segment` at `depth` and returns the slot it addresses.
 * Throws InvalidStructureError on a container kind mismatch, KeyError/IndexError when absent.
 */
function slotAt(node: JSONValue, path: Path, depth: number): Slot {
  const segment = path[depth]
  if (typeof segment === "string") {
    if (!isRecord(node)) structureFailure(path, depth, "object", kindOf(node))
    if (!hasOwn(node, segment)) keyFailure(path.slice(0, depth + 1))
    return { kind: "key", container: node, key: segment }
  }

  if (!Array.isArray(node)) structureFailure(path, depth, "array", kindOf(node))
  const index = toArrayIndex(node, segment)
  if (index === undefined) indexFailure(path.slice(0, depth + 1))
  return { kind: "index", container: node, index }
}

export function slotValue(slot: Slot): JSONValue {
  return slot.kind === "key" ? slot.container[slot.key] : slot.container[slot.index]
}

function removeSlot(slot: Slot): void {
  if (slot.kind === "key") {
    delete slot.container[slot.key]
  } else {
    slot.container.splice(slot.index, 1)
  }
}

/**
 * Walks `path` and returns the slot of its last segment.
 * Never creates anything.
 */
export function resolveSlot(root: JSONContainer, path: Path): Slot {
  let slot = slotAt(root, path, 0)
  for (let depth = 1; depth < path.length; depth++) {
    slot = slotAt(slotValue(slot), path, depth)
  }
  return slot
}

/**
 * Reads the value at `path`, checking it against `spec` when given.
 */
export function resolveRead(root: JSONContainer, path: Path, spec?: TypeSpec): JSONValue {
  const value = slotValue(resolveSlot(root, path))
  if (spec) checkType(value, spec, path)
  return value
}

/**
 * Tells whether `path` leads to a value (matching `spec` when given).
 * Missing data and data errors yield false; malformed calls still throw.
 */
export function resolveContains(root: JSONContainer, path: Path, spec?: TypeSpec): boolean {
  try {
    resolveRead(root, path, spec)
    return true
  } catch (error) {
    if (error instanceof LookupError || error instanceof DataError) return false
    throw error
  }
}

/**
 * Removes the value at `path` and returns it.
 * With `spec`, the value must match before anything is removed.
 */
export function resolveDelete(root: JSONContainer, path: Path, spec?: TypeSpec): JSONValue {
  const slot = resolveSlot(root, path)
  const value = slotValue(slot)
  if (spec) checkType(value, spec, path)
  removeSlot(slot)
  return value
}

/**
 * Where a write lands: an existing slot, or a missing key of an existing object
 * below which `created` object levels must be materialized.
 */
type WritePlan =
  | { readonly kind: "existing"; readonly slot: Slot }
  | {
      readonly kind: "autovivify"
      readonly container: JSONRecord
      readonly key: string
      readonly created: readonly string[]
    }

/**
 * Plans the autovivification of the missing key at `depth`: every remaining
 * segment must be an object key, since arrays are never created.
 */
function planAutovivify(container: JSONRecord, key: string, path: Path, depth: number): WritePlan {
  const created: string[] = []
  for (let d = depth + 1; d < path.length; d++) {
    const segment = path[d]
    if (typeof segment !== "string") structureFailure(path, d, "array", "missing key")
    created.push(segment)
  }
  return { kind: "autovivify", container, key, created }
}

/**
 * Phase 1 of a write: proves every step is present and compatible, or creatable.
 * Does not mutate anything.
 */
function planWrite(root: JSONContainer, path: Path): WritePlan {
  const last = path.length - 1
  let node: JSONValue = root

  for (let depth = 0; depth < last; depth++) {
    const segment = path[depth]
    if (typeof segment === "string" && isRecord(node) && !hasOwn(node, segment)) {
      return planAutovivify(node, segment, path, depth)
    }
    node = slotValue(slotAt(node, path, depth))
  }

  const segment = path[last]
  if (typeof segment === "string") {
    if (!isRecord(node)) structureFailure(path, last, "object", kindOf(node))
    return { kind: "existing", slot: { kind: "key", container: node, key: segment } }
  }

  if (!Array.isArray(node)) structureFailure(path, last, "array", kindOf(node))
  const index = toArrayIndex(node, segment)
  // arrays are never extended by path writes
  if (index === undefined) indexFailure(path)
  return { kind: "existing", slot: { kind: "index", container: node, index } }
}

/**
 * Phase 2 of a write: a single assignment into an existing container.
 * Missing objects are built bottom-up first, so nothing is attached before it is complete.
 */
function commitWrite(plan: WritePlan, value: JSONValue): void {
  if (plan.kind === "existing") {
    const { slot } = plan
    if (slot.kind === "key") {
      assignKey(slot.container, slot.key, value)
    } else {
      slot.container[slot.index] = value
    }
    return
  }

  let subtree = value
  for (let i = plan.created.length - 1; i >= 0; i--) {
    const level: JSONRecord = {}
    assignKey(level, plan.created[i], subtree)
    subtree = level
  }
  assignKey(plan.container, plan.key, subtree)
}

/**
 * A value about to be written. Values that come out of a wrapper are trusted
 * and skip JSON validation; anything else is validated.
 */
export type WriteValue =
  | { readonly trusted: true; readonly value: JSONValue }
  | { readonly trusted: false; readonly value: unknown }

/**
 * Validates a value unless it is trusted.
 *
 * @param path - Location the value is written to, used in error messages.
 */
export function cleanWriteValue(input: WriteValue, path: Path = []): JSONValue {
  if (input.trusted) return input.value
  const { value } = input
  validateValue(value, path)
  return value
}

/**
 * Writes a value at `path`, creating missing intermediate objects (never arrays).
 * Either fully applies or leaves `root` untouched.
 *
 * @param spec - Type the value must have. Without it the value must still be valid JSON.
 */
export function resolveWrite(
  root: JSONContainer,
  path: Path,
  input: WriteValue,
  spec?: TypeSpec
): void {
  const plan = planWrite(root, path)
  const value = cleanWriteValue(input, path)
  if (spec) checkType(value, spec, path)
  commitWrite(plan, value)
}
