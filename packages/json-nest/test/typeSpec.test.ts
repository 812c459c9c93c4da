import { describe, expect, it } from "vitest"
import { InvalidValueError, TypeSpecError } from "../src/error"
import {
  checkType,
  formatTypeSpec,
  matchesType,
  oneOf,
  resolveTypeSpec,
} from "../src/typeSpec"
import { catchError } from "./utils"

describe("resolveTypeSpec", () => {
  it("resolves single tags", () => {
    expect(resolveTypeSpec("int")).toStrictEqual({ kind: "tags", tags: ["int"] })
    expect(resolveTypeSpec("null")).toStrictEqual({ kind: "tags", tags: ["null"] })
  })

  it("reuses resolved tags", () => {
    expect(resolveTypeSpec("string")).toBe(resolveTypeSpec("string"))
  })

  it("expands number into int and float", () => {
    expect(resolveTypeSpec("number")).toStrictEqual({ kind: "tags", tags: ["int", "float"] })
  })

  it("resolves unions without duplicates", () => {
    expect(resolveTypeSpec(oneOf("int", "null"))).toStrictEqual({
      kind: "tags",
      tags: ["int", "null"],
    })
    expect(resolveTypeSpec(oneOf("number", "int"))).toStrictEqual({
      kind: "tags",
      tags: ["int", "float"],
    })
  })

  it("resolves homogeneous containers", () => {
    expect(resolveTypeSpec(["string"])).toStrictEqual({
      kind: "arrayOf",
      element: { kind: "tags", tags: ["string"] },
    })
    expect(resolveTypeSpec({ string: oneOf("int", "float") })).toStrictEqual({
      kind: "objectOf",
      value: { kind: "tags", tags: ["int", "float"] },
    })
  })

  it("rejects malformed descriptors", () => {
    const error = catchError(() => resolveTypeSpec("integer"))
    expect(error).toBeInstanceOf(TypeSpecError)
    expect(error).toMatchObject({
      descriptor: "integer",
      message:
        "expected a tag (null, boolean, int, float, number, string, object, array), " +
        'oneOf(...), [...] (for arrays) or {string: ...} (for objects), got "integer"',
    })

    expect(() => resolveTypeSpec([])).toThrow(TypeSpecError)
    expect(() => resolveTypeSpec(["int", "string"])).toThrow(TypeSpecError)
    expect(() => resolveTypeSpec({ string: "int", other: "int" })).toThrow(TypeSpecError)
    expect(() => resolveTypeSpec({ oneOf: [] })).toThrow(TypeSpecError)
    expect(() => resolveTypeSpec(undefined)).toThrow(TypeSpecError)
  })

  it("rejects containers nested more than one level", () => {
    expect(() => resolveTypeSpec([["int"]])).toThrow(TypeSpecError)
    expect(() => resolveTypeSpec({ string: ["int"] })).toThrow(TypeSpecError)
  })
})

describe("formatTypeSpec", () => {
  it("renders specs for messages", () => {
    expect(formatTypeSpec(resolveTypeSpec("number"))).toBe("int | float")
    expect(formatTypeSpec(resolveTypeSpec(["string"]))).toBe("[string]")
    expect(formatTypeSpec(resolveTypeSpec({ string: "int" }))).toBe("{string: int}")
  })
})

describe("checkType", () => {
  it("accepts matching values", () => {
    expect(() => checkType(1, resolveTypeSpec("int"))).not.toThrow()
    expect(() => checkType(1.5, resolveTypeSpec("number"))).not.toThrow()
    expect(() => checkType(null, resolveTypeSpec(oneOf("string", "null")))).not.toThrow()
    expect(() => checkType([], resolveTypeSpec(["object"]))).not.toThrow()
  })

  it("reports the path and the offending value", () => {
    const error = catchError(() =>
      checkType("octocat", resolveTypeSpec("int"), ["user", "login"])
    )
    expect(error).toBeInstanceOf(InvalidValueError)
    expect(error).toMatchObject({
      message: 'expected int, got string at path ["user","login"]: "octocat"',
      path: ["user", "login"],
      value: "octocat",
      expected: "int",
    })
  })

  it("omits the path for bare values", () => {
    expect(() => checkType(1.5, resolveTypeSpec("int"))).toThrow("expected int, got float: 1.5")
    expect(() => checkType(2, resolveTypeSpec("float"))).toThrow("expected float, got int: 2")
  })

  it("names the first offending element of a homogeneous array", () => {
    const error = catchError(() =>
      checkType([{}, 2, "x"], resolveTypeSpec(["object"]), ["items"])
    )
    expect(error).toMatchObject({
      message: 'expected object (element of [object]), got int at path ["items",1]: 2',
      path: ["items", 1],
      expected: "object (element of [object])",
    })
  })

  it("names the first offending value of a homogeneous object", () => {
    expect(() => checkType({ a: 1, b: "x" }, resolveTypeSpec({ string: "int" }))).toThrow(
      'expected int (value of {string: int}), got string at path ["b"]: "x"'
    )
  })

  it("rejects the wrong container kind", () => {
    expect(() => checkType({}, resolveTypeSpec(["int"]), ["a"])).toThrow(
      'expected [int], got object at path ["a"]: {}'
    )
    expect(() => checkType([], resolveTypeSpec({ string: "int" }))).toThrow(
      "expected {string: int}, got array: []"
    )
  })
})

describe("matchesType", () => {
  it("mirrors checkType without throwing", () => {
    expect(matchesType(1, resolveTypeSpec("int"))).toBe(true)
    expect(matchesType("1", resolveTypeSpec("int"))).toBe(false)
    expect(matchesType([1, 2], resolveTypeSpec(["int"]))).toBe(true)
    expect(matchesType([1, "2"], resolveTypeSpec(["int"]))).toBe(false)
    expect(matchesType({ a: null }, resolveTypeSpec({ string: "null" }))).toBe(true)
  })
})
