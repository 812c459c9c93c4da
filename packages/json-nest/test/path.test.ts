import { describe, expect, it } from "vitest"
import { PathSyntaxError } from "../src/error"
import { assertLastSegment, assertRootSegment, normalizePath } from "../src/path"
import { catchError } from "./utils"

describe("normalizePath", () => {
  it("turns a single key or index into a one-segment path", () => {
    expect(normalizePath("user")).toStrictEqual(["user"])
    expect(normalizePath(3)).toStrictEqual([3])
    expect(normalizePath(-1)).toStrictEqual([-1])
  })

  it("copies and freezes segment lists", () => {
    const input = ["user", 0, "login"]
    const path = normalizePath(input)
    input.push("extra")

    expect(path).toStrictEqual(["user", 0, "login"])
    expect(Object.isFrozen(path)).toBe(true)
  })

  it("rejects empty paths", () => {
    expect(() => normalizePath([])).toThrow(PathSyntaxError)
    expect(() => normalizePath([])).toThrow("empty path: []")
  })

  it("rejects values that are not paths", () => {
    expect(() => normalizePath(1.5)).toThrow("invalid path: 1.5")
    expect(() => normalizePath(null)).toThrow("invalid path: null")
    expect(() => normalizePath(true)).toThrow("invalid path: true")
  })

  it("rejects segments that are neither strings nor integers", () => {
    const error = catchError(() => normalizePath(["a", true]))
    expect(error).toBeInstanceOf(PathSyntaxError)
    expect(error).toMatchObject({
      message: 'path must contain only strings and integers: ["a",true]',
      pathLike: ["a", true],
    })
    expect(() => normalizePath(["a", 0.5])).toThrow(PathSyntaxError)
  })
})

describe("assertRootSegment", () => {
  it("requires objects to start with a key", () => {
    expect(() => assertRootSegment(["a", 0], "object")).not.toThrow()
    expect(() => assertRootSegment([2, "a"], "object")).toThrow(
      'object path must start with a string key: [2,"a"]'
    )
  })

  it("requires arrays to start with an index", () => {
    expect(() => assertRootSegment([0, "a"], "array")).not.toThrow()
    expect(() => assertRootSegment(["a"], "array")).toThrow(
      'array path must start with an integer index: ["a"]'
    )
  })
})

describe("assertLastSegment", () => {
  it("checks the kind of the final segment", () => {
    expect(() => assertLastSegment([0, "a"], "key")).not.toThrow()
    expect(() => assertLastSegment(["a", 0], "key")).toThrow(
      'path must lead to an object key: ["a",0]'
    )
    expect(() => assertLastSegment(["a", "b"], "index")).toThrow(
      'path must lead to an array index: ["a","b"]'
    )
  })
})
