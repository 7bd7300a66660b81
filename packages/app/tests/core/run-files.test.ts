import { describe, expect, it } from "@effect/vitest"

import { formatRunStamp, planRunFiles } from "../../src/core/run-files.js"

describe("run files", () => {
  it("formats the run start as a UTC stamp", () => {
    expect(formatRunStamp(Date.UTC(2024, 2, 1, 4, 5, 9))).toBe("20240301-040509")
    expect(formatRunStamp(0)).toBe("19700101-000000")
  })

  it("names per-invocation logs by stamp and padded folder index", () => {
    const files = planRunFiles((directory, fileName) => `${directory}\\${fileName}`, "C:\\logs", "20240301-040509")
    expect(files.runLogPath).toBe("C:\\logs\\mirror-20240301-040509.log")
    expect(files.transferredItemsPath).toBe("C:\\logs\\transferred-20240301-040509.txt")
    expect(files.invocationLogPath(7)).toBe("C:\\logs\\mirror-20240301-040509-folder-007.log")
    expect(files.invocationLogPath(1234)).toBe("C:\\logs\\mirror-20240301-040509-folder-1234.log")
  })
})
