import * as Command from "@effect/platform/Command"
import * as CommandExecutor from "@effect/platform/CommandExecutor"
import { Context, Effect, Layer, pipe } from "effect"

import { type CopyLaunchError, copyLaunchError } from "../../core/errors.js"

export class CopyTool extends Context.Tag("CopyTool")<
  CopyTool,
  {
    readonly name: string
    readonly run: (args: ReadonlyArray<string>) => Effect.Effect<number, CopyLaunchError>
  }
>() {}

/**
 * Live copy tool backed by a child process.
 *
 * @param toolPath - Executable name or path, e.g. "robocopy".
 * @returns Layer that launches the tool with a literal argument array.
 *
 * @pure false - spawns a process and waits for its exit
 * @effect CommandExecutor
 * @invariant arguments are never joined or re-quoted
 * @complexity O(1) besides the tool's own work
 */
// CHANGE: launch the copy tool through @effect/platform Command
// WHY: argv arrays keep whitespace in paths intact; no shell is involved
// QUOTE(TZ): n/a
// REF: copy-invocation
// SOURCE: n/a
// FORMAT THEOREM: forall a: run(a) -> exitCode(tool(a))
// PURITY: SHELL
// EFFECT: Effect<number, CopyLaunchError, CommandExecutor>
// INVARIANT: exit status is returned verbatim
// COMPLEXITY: O(1)/O(1)
export const makeCopyToolLive = (toolPath: string): Layer.Layer<CopyTool, never, CommandExecutor.CommandExecutor> =>
  Layer.effect(
    CopyTool,
    Effect.gen(function*(_) {
      const executor = yield* _(CommandExecutor.CommandExecutor)
      return {
        name: toolPath,
        run: (args) =>
          pipe(
            Command.make(toolPath, ...args),
            Command.stdout("inherit"),
            Command.stderr("inherit"),
            Command.exitCode,
            Effect.map((exitCode) => Number(exitCode)),
            Effect.provideService(CommandExecutor.CommandExecutor, executor),
            Effect.mapError((error) => copyLaunchError(toolPath, error.message))
          )
      }
    })
  )
