import * as Path from "@effect/platform/Path"
import { Effect, Option, pipe } from "effect"

import { robocopyLineClassifier } from "../core/transfer-log.js"
import type { CliArgs } from "./cli.js"
import type { MirrorSettings } from "./mirror/types.js"
import type { MailEndpoint } from "./services/notification-transport.js"
import { RuntimeEnv } from "./services/runtime-env.js"

// Compiled into each deployment; not read from the environment.
export const excludeFilePatterns: ReadonlyArray<string> = ["*.tmp", "~$*", "Thumbs.db", "desktop.ini"]
export const excludeDirNames: ReadonlyArray<string> = ["$RECYCLE.BIN", "System Volume Information"]

const defaultThreads = 8
// robocopy rejects /MT outside 1..128 with exit 16.
const maxThreads = 128
const maxPort = 65535
const defaultSmtpPort = 587

const parseBoundedInt = (value: Option.Option<string>, fallback: number, max: number): number =>
  pipe(
    value,
    Option.map((raw) => Number.parseInt(raw, 10)),
    Option.filter((parsed) => Number.isInteger(parsed) && parsed > 0 && parsed <= max),
    Option.getOrElse(() => fallback)
  )

const parseFlag = (value: Option.Option<string>): boolean =>
  Option.exists(value, (raw) => ["1", "true", "yes"].includes(raw.trim().toLowerCase()))

const nonEmpty = (value: Option.Option<string>): Option.Option<string> =>
  Option.filter(value, (raw) => raw.trim().length > 0)

const readMailEndpoint = (
  envVar: (key: string) => Effect.Effect<Option.Option<string>>
): Effect.Effect<Option.Option<MailEndpoint>> =>
  Effect.gen(function*(_) {
    const host = nonEmpty(yield* _(envVar("FOLDER_MIRROR_SMTP_HOST")))
    const from = nonEmpty(yield* _(envVar("FOLDER_MIRROR_SMTP_FROM")))
    const to = nonEmpty(yield* _(envVar("FOLDER_MIRROR_SMTP_TO")))
    const port = parseBoundedInt(yield* _(envVar("FOLDER_MIRROR_SMTP_PORT")), defaultSmtpPort, maxPort)
    const secure = parseFlag(yield* _(envVar("FOLDER_MIRROR_SMTP_SECURE")))
    return Option.all({ host, from, to }).pipe(
      Option.map((fields): MailEndpoint => ({ ...fields, port, secure }))
    )
  })

/**
 * Resolves deployment settings from flags, environment and compiled defaults.
 *
 * @param args - Parsed command line.
 * @returns Settings for one run.
 *
 * @pure false - reads env vars and cwd via RuntimeEnv
 * @effect RuntimeEnv, Path
 * @invariant flag values take precedence over environment values
 * @complexity O(1)
 */
// CHANGE: layer flags over FOLDER_MIRROR_* variables over defaults
// WHY: scheduled tasks configure through the environment, humans through flags
// QUOTE(TZ): n/a
// REF: settings
// SOURCE: n/a
// FORMAT THEOREM: forall k: setting(k) = flag(k) ?? env(k) ?? default(k)
// PURITY: SHELL
// EFFECT: Effect<MirrorSettings, never, RuntimeEnv | Path>
// INVARIANT: 1 <= concurrencyLevel <= 128
// COMPLEXITY: O(1)/O(1)
export const loadSettings = (
  args: CliArgs
): Effect.Effect<MirrorSettings, never, RuntimeEnv | Path.Path> =>
  Effect.gen(function*(_) {
    const env = yield* _(RuntimeEnv)
    const path = yield* _(Path.Path)
    const cwd = yield* _(env.cwd)
    const fromEnv = (key: string, fallback: string) =>
      Effect.map(env.envVar(key), (value) => Option.getOrElse(nonEmpty(value), () => fallback))

    const folderListPath = args.listPath ?? (yield* _(fromEnv("FOLDER_MIRROR_LIST", path.join(cwd, "folders.txt"))))
    const destinationRoot = args.destinationRoot ??
      (yield* _(fromEnv("FOLDER_MIRROR_DEST", path.join(cwd, "mirror"))))
    const logDirectory = args.logDirectory ?? (yield* _(fromEnv("FOLDER_MIRROR_LOG_DIR", path.join(cwd, "logs"))))
    const copyToolPath = yield* _(fromEnv("FOLDER_MIRROR_COPY_TOOL", "robocopy"))
    const concurrencyLevel = parseBoundedInt(
      yield* _(env.envVar("FOLDER_MIRROR_THREADS")),
      defaultThreads,
      maxThreads
    )
    const remoteShare = nonEmpty(yield* _(env.envVar("FOLDER_MIRROR_SHARE")))
    const mail = yield* _(readMailEndpoint(env.envVar))

    return {
      folderListPath,
      logDirectory,
      copyToolPath,
      run: {
        simulateOnly: args.simulateOnly,
        notifyEnabled: args.notifyEnabled,
        destinationRoot,
        concurrencyLevel,
        excludeFilePatterns,
        excludeDirNames
      },
      useAlternateCredentials: args.useAlternateCredentials,
      remoteShare,
      mail,
      classifier: robocopyLineClassifier
    }
  })
