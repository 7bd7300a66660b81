import { describe, expect, it } from "@effect/vitest"
import fc from "fast-check"

import { joinUnder, mapDestination } from "../../src/core/path-mapper.js"

const segment = fc.string({ minLength: 1, maxLength: 8, unit: fc.constantFrom("a", "B", "3", " ", "_", "é") })
  .filter((value) => value.trim().length > 0)

describe("mapDestination", () => {
  it("strips the drive letter and joins the rest under the root", () => {
    expect(mapDestination("D:\\Music\\Jazz", "Z:\\Mirror")).toBe("Z:\\Mirror\\Music\\Jazz")
  })

  it("maps the same tree on different drives to the same destination", () => {
    fc.assert(
      fc.property(
        fc.constantFrom("C", "D", "e", "X"),
        fc.array(segment, { minLength: 1, maxLength: 4 }),
        (drive, segments) => {
          const rest = segments.join("\\")
          expect(mapDestination(`${drive}:\\${rest}`, "\\\\nas\\backup")).toBe(`\\\\nas\\backup\\${rest}`)
        }
      )
    )
  })

  it("strips the leading separator from paths without a volume", () => {
    expect(mapDestination("\\Shared\\Docs", "Z:\\Mirror")).toBe("Z:\\Mirror\\Shared\\Docs")
  })

  it("maps a UNC source below the root without a doubled separator", () => {
    expect(mapDestination("\\\\server\\share\\Docs", "Z:\\Mirror")).toBe("Z:\\Mirror\\server\\share\\Docs")
  })

  it("does not normalize dot segments", () => {
    expect(mapDestination("D:\\Music\\..\\Video", "Z:\\Mirror")).toBe("Z:\\Mirror\\Music\\..\\Video")
  })

  it("keeps embedded spaces", () => {
    expect(mapDestination("D:\\My Music\\Live Sets ", "Z:\\")).toBe("Z:\\My Music\\Live Sets ")
  })

  it("maps a bare volume root onto the destination root", () => {
    expect(mapDestination("D:\\", "Z:\\Mirror\\")).toBe("Z:\\Mirror")
  })
})

describe("joinUnder", () => {
  it("does not double separators after a root", () => {
    expect(joinUnder("/", "Music")).toBe("/Music")
    expect(joinUnder("Z:\\Mirror\\\\", "Music")).toBe("Z:\\Mirror\\Music")
    expect(joinUnder("Z:\\Mirror", "\\\\Music")).toBe("Z:\\Mirror\\Music")
  })
})
