import * as Command from "@effect/platform/Command"
import * as CommandExecutor from "@effect/platform/CommandExecutor"
import { Console, Context, Effect, Layer, pipe } from "effect"

import { type MountError, mountError } from "../../core/errors.js"
import type { Credentials } from "./credentials.js"
import { FileSystemService } from "./file-system.js"

export class ShareMounter extends Context.Tag("ShareMounter")<
  ShareMounter,
  {
    readonly acquire: (credentials: Credentials, remoteShare: string) => Effect.Effect<string, MountError>
    readonly release: (mountedRoot: string) => Effect.Effect<void>
  }
>() {}

// Z: down to D:, A-C are reserved for floppy and system volumes.
export const mountLetters: ReadonlyArray<string> = [..."ZYXWVUTSRQPONMLKJIHGFED"]

const driveOf = (mountedRoot: string): string => mountedRoot.slice(0, 2)

/**
 * Live mounter mapping a drive letter with `net use`.
 *
 * @pure false - probes volumes and runs net.exe
 * @effect CommandExecutor, FileSystemService
 * @invariant the secret is passed as its own argv element
 */
// CHANGE: acquire the authenticated destination as a mapped drive for one run
// WHY: robocopy needs a plain path; the mapping lives exactly as long as the run scope
// QUOTE(TZ): n/a
// REF: share-mount
// SOURCE: n/a
// FORMAT THEOREM: forall s: acquire(s) = "L:\\" -> free(L) before acquire
// PURITY: SHELL
// EFFECT: Effect<string, MountError, CommandExecutor | FileSystemService>
// INVARIANT: release never fails; problems are printed
// COMPLEXITY: O(letters)/O(1)
export const ShareMounterLive = Layer.effect(
  ShareMounter,
  Effect.gen(function*(_) {
    const executor = yield* _(CommandExecutor.CommandExecutor)
    const fs = yield* _(FileSystemService)

    const runNet = (args: ReadonlyArray<string>) =>
      pipe(
        Command.make("net", ...args),
        Command.exitCode,
        Effect.map((exitCode) => Number(exitCode)),
        Effect.provideService(CommandExecutor.CommandExecutor, executor)
      )

    const findFreeLetter = (share: string): Effect.Effect<string, MountError> =>
      pipe(
        Effect.filter(mountLetters, (letter) =>
          pipe(
            fs.exists(`${letter}:\\`),
            Effect.map((taken) => !taken),
            Effect.orElseSucceed(() => false)
          )),
        Effect.flatMap((free) => {
          const [first] = free
          return first === undefined
            ? Effect.fail(mountError(share, "No free drive letter available for mounting"))
            : Effect.succeed(first)
        })
      )

    const acquire = (credentials: Credentials, remoteShare: string): Effect.Effect<string, MountError> =>
      Effect.gen(function*(_) {
        const letter = yield* _(findFreeLetter(remoteShare))
        const exitCode = yield* _(
          pipe(
            runNet([
              "use",
              `${letter}:`,
              remoteShare,
              `/user:${credentials.username}`,
              credentials.secret,
              "/persistent:no"
            ]),
            Effect.mapError((error) => mountError(remoteShare, error.message))
          )
        )
        if (exitCode !== 0) {
          return yield* _(
            Effect.fail(mountError(remoteShare, `Authentication or connection failed (net use exit ${exitCode})`))
          )
        }
        return `${letter}:\\`
      })

    const release = (mountedRoot: string): Effect.Effect<void> =>
      pipe(
        runNet(["use", driveOf(mountedRoot), "/delete", "/y"]),
        Effect.flatMap((exitCode) =>
          exitCode === 0
            ? Effect.void
            : Console.error(`Could not unmount ${mountedRoot} (net use exit ${exitCode})`)
        ),
        Effect.catchAll((error) => Console.error(`Could not unmount ${mountedRoot}: ${error.message}`))
      )

    return { acquire, release }
  })
)
