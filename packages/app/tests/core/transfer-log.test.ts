import { NodeContext } from "@effect/platform-node"
import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Option } from "effect"
import fc from "fast-check"

import {
  compileExclusions,
  decodeUnicodeLog,
  extractTransferredItems,
  globToRegExp,
  robocopyLineClassifier
} from "../../src/core/transfer-log.js"

const exclusions = {
  excludeFilePatterns: ["*.tmp", "~$*"],
  excludeDirNames: ["$RECYCLE.BIN"]
}

const readFixture = (name: string) =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const testFile = yield* _(path.fromFileUrl(new URL(import.meta.url)))
    return yield* _(fs.readFileString(path.join(path.dirname(testFile), "..", "fixtures", name)))
  })

describe("robocopyLineClassifier", () => {
  it("takes the last tab field of a new-file line", () => {
    expect(
      robocopyLineClassifier.transferredPath(
        "\t    New File  \t\t      4096\t2024/03/01 10:15:00\tD:\\Music\\Jazz\\so what.flac  "
      )
    ).toEqual(Option.some("D:\\Music\\Jazz\\so what.flac"))
  })

  it("ignores marker words inside the path of an unchanged file", () => {
    expect(
      robocopyLineClassifier.transferredPath("\t    same      \t\t  2048\t2024/01/05 09:00:00\tD:\\Notes\\Newer ideas.txt")
    ).toEqual(Option.none())
  })

  it("discards a purely numeric last field", () => {
    expect(robocopyLineClassifier.transferredPath("\t    Newer     \t\tD:\\Music\\x.flac\t   2048")).toEqual(
      Option.none()
    )
  })

  it("requires a rooted volume path on the line", () => {
    expect(robocopyLineClassifier.transferredPath("\t    New File  \t\t  2048\t2024/03/01\tMusic\\x.flac")).toEqual(
      Option.none()
    )
  })

  it("accepts renamed records", () => {
    expect(robocopyLineClassifier.transferredPath("\t  *Renamed  \t\t  10\tE:\\Docs\\plan v2.docx")).toEqual(
      Option.some("E:\\Docs\\plan v2.docx")
    )
  })
})

describe("globToRegExp", () => {
  it("treats dots literally and stars as wildcards", () => {
    const glob = globToRegExp("*.tmp")
    expect(glob.test("cover.tmp")).toBe(true)
    expect(glob.test("COVER.TMP")).toBe(true)
    expect(glob.test("covertmp")).toBe(false)
    expect(glob.test("cover.tmp.flac")).toBe(false)
  })

  it("escapes regular expression characters", () => {
    expect(globToRegExp("~$*").test("~$report.docx")).toBe(true)
    expect(globToRegExp("a+b(1).txt").test("a+b(1).txt")).toBe(true)
    expect(globToRegExp("a+b(1).txt").test("aab1.txt")).toBe(false)
  })
})

describe("extractTransferredItems", () => {
  it.effect("reads transfers from a verbose log in log order", () =>
    Effect.gen(function*(_) {
      const text = yield* _(readFixture("robocopy-jazz.log"))
      const items = extractTransferredItems(text, robocopyLineClassifier, compileExclusions(exclusions))
      expect(items).toEqual([
        { path: "D:\\Music\\Jazz\\Live Sets\\" },
        { path: "D:\\Music\\Jazz\\Live Sets\\so what (live).flac" },
        { path: "D:\\Music\\Jazz\\blue in green.flac" }
      ])
    }).pipe(Effect.provide(NodeContext.layer)))

  it("never reports excluded directories or file names", () => {
    const name = fc.string({ minLength: 1, maxLength: 10, unit: fc.constantFrom("a", "b", "1", " ", "-") })
    const isExcluded = compileExclusions(exclusions)
    fc.assert(
      fc.property(name, name, fc.boolean(), (folder, file, underRecycle) => {
        const excludedPath = underRecycle
          ? `D:\\${folder}\\$Recycle.Bin\\${file}.flac`
          : `D:\\${folder}\\${file}.tmp`
        const log = [
          `\t    New File  \t\t  100\t2024/03/01 10:00:00\t${excludedPath}`,
          `\t    New File  \t\t  100\t2024/03/01 10:00:00\tD:\\${folder}\\${file}.flac`
        ].join("\r\n")
        const items = extractTransferredItems(log, robocopyLineClassifier, isExcluded)
        expect(items).toEqual([{ path: `D:\\${folder}\\${file}.flac`.trim() }])
      })
    )
  })
})

describe("decodeUnicodeLog", () => {
  it("decodes UTF-16LE and drops the byte order mark", () => {
    const bytes = Uint8Array.from([0xff, 0xfe, 0x43, 0x00, 0x61, 0x00, 0x66, 0x00, 0xe9, 0x00, 0x0d, 0x00, 0x0a, 0x00])
    expect(decodeUnicodeLog(bytes)).toBe("Caf\u00e9\r\n")
  })

  it("decodes logs appended without a byte order mark", () => {
    expect(decodeUnicodeLog(Uint8Array.from([0x71, 0x67, 0xac, 0x4e]))).toBe("\u6771\u4eac")
  })
})
