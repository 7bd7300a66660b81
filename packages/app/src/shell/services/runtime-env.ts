import { homedir, hostname, userInfo } from "node:os"

import { Context, Effect, Layer, Option, pipe } from "effect"

export interface Identity {
  readonly user: string
  readonly host: string
}

export class RuntimeEnv extends Context.Tag("RuntimeEnv")<
  RuntimeEnv,
  {
    readonly argv: Effect.Effect<ReadonlyArray<string>>
    readonly cwd: Effect.Effect<string>
    readonly homedir: Effect.Effect<string>
    readonly envVar: (key: string) => Effect.Effect<Option.Option<string>>
    readonly isInteractive: Effect.Effect<boolean>
    readonly identity: Effect.Effect<Identity>
  }
>() {}

const lookup = (key: string): Option.Option<string> =>
  pipe(Option.fromNullable(process.env[key]), Option.filter((value) => value.length > 0))

// Scheduled tasks on Windows run with USERNAME/COMPUTERNAME; POSIX shells with USER.
const resolveIdentity = (): Identity => ({
  user: pipe(
    lookup("USERNAME"),
    Option.orElse(() => lookup("USER")),
    Option.getOrElse(() => userInfo().username)
  ),
  host: Option.getOrElse(lookup("COMPUTERNAME"), () => hostname())
})

// CHANGE: expose argv, environment and the executing identity as one service
// WHY: settings, credential lookup and notifications read them without touching process directly
// QUOTE(TZ): n/a
// REF: runtime-env
// SOURCE: n/a
// FORMAT THEOREM: forall k: envVar(k) = Some(v) -> v != ""
// PURITY: SHELL
// EFFECT: Effect<RuntimeEnv, never, never>
// INVARIANT: identity names the executing user and machine
// COMPLEXITY: O(1)/O(1)
export const RuntimeEnvLive = Layer.succeed(RuntimeEnv, {
  argv: Effect.sync(() => [...process.argv]),
  cwd: Effect.sync(() => process.cwd()),
  homedir: Effect.sync(() => homedir()),
  envVar: (key) => Effect.sync(() => lookup(key)),
  isInteractive: Effect.sync(() => process.stdin.isTTY === true),
  identity: Effect.sync(resolveIdentity)
})
