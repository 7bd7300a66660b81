import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect, pipe } from "effect"

import { CopyTool, makeCopyToolLive } from "../../src/shell/services/copy-tool.js"

const runTool = (toolPath: string, args: ReadonlyArray<string>) =>
  pipe(
    Effect.flatMap(CopyTool, (tool) => tool.run(args)),
    Effect.provide(makeCopyToolLive(toolPath)),
    Effect.provide(NodeContext.layer)
  )

describe("makeCopyToolLive", () => {
  it.effect("returns the exit status of the launched process", () =>
    Effect.gen(function*(_) {
      const exitCode = yield* _(runTool(process.execPath, ["-e", "process.exit(3)"]))
      expect(exitCode).toBe(3)
    }))

  it.effect("passes arguments with spaces as single elements", () =>
    Effect.gen(function*(_) {
      const exitCode = yield* _(
        runTool(process.execPath, [
          "-e",
          "process.exit(process.argv[1] === 'D:\\\\My Music\\\\Live Sets' ? 0 : 9)",
          "D:\\My Music\\Live Sets"
        ])
      )
      expect(exitCode).toBe(0)
    }))

  it.effect("reports a tool that cannot be started as CopyLaunchError", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(runTool("/nonexistent/folder-mirror-copy-tool", [])))
      expect(error._tag).toBe("CopyLaunchError")
      expect(error.tool).toBe("/nonexistent/folder-mirror-copy-tool")
    }))
})
