import * as Path from "@effect/platform/Path"
import * as Terminal from "@effect/platform/Terminal"
import * as Schema from "@effect/schema/Schema"
import { Context, Effect, Layer, Option, pipe } from "effect"

import {
  type CredentialMissing,
  credentialMissing,
  type CredentialTarget,
  type IoError
} from "../../core/errors.js"
import { FileSystemService } from "./file-system.js"
import { RuntimeEnv } from "./runtime-env.js"

export interface Credentials {
  readonly username: string
  readonly secret: string
}

export class CredentialProvider extends Context.Tag("CredentialProvider")<
  CredentialProvider,
  {
    readonly get: (target: CredentialTarget) => Effect.Effect<Credentials, CredentialMissing>
    readonly store: (target: CredentialTarget, credentials: Credentials) => Effect.Effect<void, IoError>
  }
>() {}

export class CredentialPrompt extends Context.Tag("CredentialPrompt")<
  CredentialPrompt,
  {
    readonly ask: (target: CredentialTarget, question: string) => Effect.Effect<string, CredentialMissing>
  }
>() {}

type StoredCredentials = Partial<Record<CredentialTarget, Credentials>>

const CredentialsSchema = Schema.Struct({
  username: Schema.NonEmptyString,
  secret: Schema.String
})

const StoreFileSchema = Schema.parseJson(
  Schema.Struct({
    share: Schema.optional(Schema.Unknown),
    notify: Schema.optional(Schema.Unknown)
  })
)

const decodeCredentials = (value: unknown): Option.Option<Credentials> =>
  Schema.decodeUnknownOption(CredentialsSchema)(value)

// CHANGE: decode the credential file with Schema instead of trusting its contents
// WHY: a hand-edited or truncated store must read as "missing", not crash the run
// QUOTE(TZ): n/a
// REF: credential-store
// SOURCE: n/a
// FORMAT THEOREM: forall c: parse(c) -> only well-formed entries survive
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: each target is decoded on its own; a malformed entry drops only itself
// COMPLEXITY: O(1)/O(1)
export const parseCredentialStore = (content: string): StoredCredentials =>
  pipe(
    Schema.decodeUnknownOption(StoreFileSchema)(content),
    Option.match({
      onNone: (): StoredCredentials => ({}),
      onSome: (record): StoredCredentials => {
        const share = decodeCredentials(record.share)
        const notify = decodeCredentials(record.notify)
        return {
          ...(Option.isSome(share) ? { share: share.value } : {}),
          ...(Option.isSome(notify) ? { notify: notify.value } : {})
        }
      }
    })
  )

const storeFileName = (user: string, host: string): string => `${user}@${host}.json`

/**
 * File-backed credential store keyed by executing identity and machine.
 *
 * @pure false - reads and writes the credential file
 * @effect RuntimeEnv, FileSystemService, Path
 * @invariant the store is plaintext JSON; mode 0600 limits readers on POSIX only, and on Windows
 *   access follows the ACL of the credential directory
 */
export const CredentialProviderLive = Layer.effect(
  CredentialProvider,
  Effect.gen(function*(_) {
    const env = yield* _(RuntimeEnv)
    const fs = yield* _(FileSystemService)
    const path = yield* _(Path.Path)
    const home = yield* _(env.homedir)
    const identity = yield* _(env.identity)
    const override = yield* _(env.envVar("FOLDER_MIRROR_CREDENTIAL_DIR"))
    const directory = Option.getOrElse(override, () => path.join(home, ".folder-mirror", "credentials"))
    const storePath = path.join(directory, storeFileName(identity.user, identity.host))

    const load = pipe(
      fs.exists(storePath),
      Effect.flatMap((present) =>
        present ? Effect.map(fs.readFileString(storePath), parseCredentialStore) : Effect.succeed<StoredCredentials>({})
      )
    )

    const get = (target: CredentialTarget): Effect.Effect<Credentials, CredentialMissing> =>
      pipe(
        load,
        Effect.mapError((error) => credentialMissing(target, `${error.reason} ${error.path}`)),
        Effect.flatMap((stored) => {
          const found = stored[target]
          return found === undefined
            ? Effect.fail(
              credentialMissing(target, `No stored credential for ${identity.user}@${identity.host}`)
            )
            : Effect.succeed(found)
        })
      )

    const store = (target: CredentialTarget, credentials: Credentials): Effect.Effect<void, IoError> =>
      Effect.gen(function*(_) {
        const stored = yield* _(load)
        yield* _(fs.makeDirectory(directory))
        yield* _(
          fs.writeFileString(
            storePath,
            `${JSON.stringify({ ...stored, [target]: credentials }, null, 2)}\n`,
            { mode: 0o600 }
          )
        )
      })

    return { get, store }
  })
)

// readLine echoes typed characters, the secret included.
export const CredentialPromptLive = Layer.effect(
  CredentialPrompt,
  Effect.gen(function*(_) {
    const terminal = yield* _(Terminal.Terminal)
    return {
      ask: (target, question) =>
        pipe(
          terminal.display(question),
          Effect.zipRight(terminal.readLine),
          Effect.map((answer) => answer.trim()),
          Effect.mapError(() => credentialMissing(target, "Credential prompt was interrupted"))
        )
    }
  })
)

const promptFor = (
  target: CredentialTarget
): Effect.Effect<Credentials, CredentialMissing, CredentialPrompt> =>
  Effect.gen(function*(_) {
    const prompt = yield* _(CredentialPrompt)
    const username = yield* _(prompt.ask(target, `Username for ${target}: `))
    if (username.length === 0) {
      return yield* _(Effect.fail(credentialMissing(target, "Empty username entered")))
    }
    const secret = yield* _(prompt.ask(target, `Secret for ${target}: `))
    return { username, secret }
  })

/**
 * Interactive one-time setup: prompts for every missing credential and stores it.
 *
 * @param targets - Credentials the upcoming run needs.
 * @returns Targets that were newly stored.
 *
 * @pure false - prompts on the terminal and writes the store
 * @effect CredentialProvider, CredentialPrompt
 * @invariant targets that already exist are never prompted for
 * @complexity O(t)
 */
// CHANGE: split credential setup out of the run into an explicit interactive step
// WHY: the scheduled run must fail fast on a missing credential, never block on a prompt
// QUOTE(TZ): n/a
// REF: credential-setup
// SOURCE: n/a
// FORMAT THEOREM: forall t in targets: after(ensure) -> stored(t)
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<CredentialTarget>, CredentialMissing | IoError, CredentialProvider | CredentialPrompt>
// INVARIANT: prompts run sequentially in target order
// COMPLEXITY: O(t)/O(t)
export const ensureCredentialsExist = (
  targets: ReadonlyArray<CredentialTarget>
): Effect.Effect<
  ReadonlyArray<CredentialTarget>,
  CredentialMissing | IoError,
  CredentialProvider | CredentialPrompt
> =>
  Effect.gen(function*(_) {
    const provider = yield* _(CredentialProvider)
    const created = yield* _(
      Effect.forEach(targets, (target) =>
        pipe(
          provider.get(target),
          Effect.as(Option.none<CredentialTarget>()),
          Effect.catchTag("CredentialMissing", () =>
            pipe(
              promptFor(target),
              Effect.flatMap((credentials) => provider.store(target, credentials)),
              Effect.as(Option.some(target))
            ))
        ))
    )
    return created.flatMap((entry) => Option.toArray(entry))
  })
