export {
  DataError,
  formatPath,
  IndexError,
  InvalidStructureError,
  InvalidValueError,
  JsonNestError,
  KeyError,
  LookupError,
  PathSyntaxError,
  TypeSpecError,
} from "./error"
export type { JSONArray, JSONContainer, JSONPrimitive, JSONRecord, JSONValue, Path } from "./json"
export { NestedArray } from "./NestedArray"
export { NestedObject, type ObjectSource } from "./NestedObject"
export { normalizePath, type PathLike } from "./path"
export {
  formatTypeSpec,
  type Item,
  type ItemOf,
  matchesType,
  type OneOf,
  oneOf,
  resolveTypeSpec,
  type ScalarTag,
  type TypeDescriptor,
  type TypeSpec,
} from "./typeSpec"
export { classify, tagOf, validateValue, type ValueTag } from "./valueModel"
export { type CopyOptions, type Settable, wrap, type WrapOptions } from "./wrap"
