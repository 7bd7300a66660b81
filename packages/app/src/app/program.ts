import { Console, Effect, pipe } from "effect"

import { describeError, type CredentialTarget } from "../core/errors.js"
import { type CliArgs, readCliArgs } from "../shell/cli.js"
import { loadSettings } from "../shell/config.js"
import { runMirrorJob } from "../shell/mirror/index.js"
import { makeCopyToolLive } from "../shell/services/copy-tool.js"
import { ensureCredentialsExist } from "../shell/services/credentials.js"
import { RuntimeEnv } from "../shell/services/runtime-env.js"

export const credentialTargets = (args: CliArgs): ReadonlyArray<CredentialTarget> => {
  const targets: ReadonlyArray<CredentialTarget> = [
    ...(args.useAlternateCredentials ? ["share" as const] : []),
    ...(args.notifyEnabled ? ["notify" as const] : [])
  ]
  return args.setupCredentials && targets.length === 0 ? ["share", "notify"] : targets
}

const setupCredentials = (args: CliArgs) =>
  pipe(
    ensureCredentialsExist(credentialTargets(args)),
    Effect.flatMap((stored) =>
      Console.log(
        stored.length === 0 ? "All credentials already stored" : `Stored credentials: ${stored.join(", ")}`
      )
    )
  )

/**
 * Compose the folder mirror CLI as a single effect.
 *
 * @returns Effect that sets up credentials or runs one mirror job.
 *
 * @pure false - reads argv/env, prompts when interactive, runs the job
 * @effect RuntimeEnv, FileSystemService, CredentialProvider, CredentialPrompt, ShareMounter,
 *   NotificationTransport, CommandExecutor, Path
 * @invariant the prompt is only reachable from an interactive terminal or --setup-credentials
 * @complexity O(n) where n = number of folders
 * @throws Never - fatal errors are reported and kept in the Effect error channel
 */
// CHANGE: keep interactive credential setup outside the scheduled job
// WHY: the job depends on CredentialProvider only and fails instead of prompting
// QUOTE(TZ): n/a
// REF: credential-setup
// SOURCE: n/a
// FORMAT THEOREM: forall a: setup(a) xor run(settings(a))
// PURITY: SHELL
// EFFECT: Effect<void, FatalRunError | CredentialMissing | IoError, ...>
// INVARIANT: fatal errors are printed once as "<Tag>: <reason>"
// COMPLEXITY: O(n)/O(n)
export const program = pipe(
  readCliArgs,
  Effect.flatMap((args) =>
    Effect.gen(function*(_) {
      if (args.setupCredentials) {
        return yield* _(setupCredentials(args))
      }
      const env = yield* _(RuntimeEnv)
      const interactive = yield* _(env.isInteractive)
      if (interactive) {
        yield* _(
          pipe(
            ensureCredentialsExist(credentialTargets(args)),
            Effect.catchAll((error) => Console.error(describeError(error)))
          )
        )
      }
      const settings = yield* _(loadSettings(args))
      yield* _(
        pipe(
          runMirrorJob(settings),
          Effect.provide(makeCopyToolLive(settings.copyToolPath)),
          Effect.asVoid
        )
      )
    })
  ),
  Effect.tapError((error) => Console.error(describeError(error)))
)
