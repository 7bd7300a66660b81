import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer, pipe } from "effect"

import type { CredentialTarget } from "../../src/core/errors.js"
import {
  CredentialPrompt,
  CredentialProvider,
  CredentialProviderLive,
  ensureCredentialsExist,
  parseCredentialStore
} from "../../src/shell/services/credentials.js"
import { makeCredentialStore, makeRuntimeEnvLayer, pathLayer } from "../support/fakes.js"
import { makeMemoryFs, type MemoryFs } from "../support/memory-fs.js"

const storePath = "/home/mirror/.folder-mirror/credentials/mirror@test-host.json"

const liveProvider = (fs: MemoryFs, env: Readonly<Record<string, string>> = {}) =>
  pipe(
    CredentialProviderLive,
    Layer.provide(Layer.mergeAll(fs.layer, makeRuntimeEnvLayer(["node", "main"], env), pathLayer))
  )

const scriptedPrompt = (answers: ReadonlyArray<string>) => {
  const questions: Array<string> = []
  const queue = [...answers]
  const layer = Layer.succeed(CredentialPrompt, {
    ask: (_target: CredentialTarget, question: string) =>
      Effect.sync(() => {
        questions.push(question)
        return queue.shift() ?? ""
      })
  })
  return { questions, layer }
}

describe("parseCredentialStore", () => {
  it("keeps well-formed entries only", () => {
    expect(
      parseCredentialStore(
        JSON.stringify({
          share: { username: "svc-mirror", secret: "test-secret" },
          notify: { username: "", secret: "test-secret" }
        })
      )
    ).toEqual({ share: { username: "svc-mirror", secret: "test-secret" } })
  })

  it("drops a malformed entry without losing the other target", () => {
    expect(
      parseCredentialStore(
        JSON.stringify({ share: "svc-mirror", notify: { username: "mailer", secret: "test-secret" }, extra: 1 })
      )
    ).toEqual({ notify: { username: "mailer", secret: "test-secret" } })
  })

  it("reads malformed content as an empty store", () => {
    expect(parseCredentialStore("{ truncated")).toEqual({})
    expect(parseCredentialStore("[1, 2]")).toEqual({})
    expect(parseCredentialStore("null")).toEqual({})
  })
})

describe("CredentialProviderLive", () => {
  it.effect("stores credentials per identity with owner-only permissions", () =>
    Effect.gen(function*(_) {
      const fs = makeMemoryFs()
      const credentials = yield* _(
        pipe(
          Effect.gen(function*(_) {
            const provider = yield* _(CredentialProvider)
            yield* _(provider.store("share", { username: "svc-mirror", secret: "test-secret" }))
            return yield* _(provider.get("share"))
          }),
          Effect.provide(liveProvider(fs))
        )
      )
      expect(credentials).toEqual({ username: "svc-mirror", secret: "test-secret" })
      expect(fs.modes.get(storePath)).toBe(0o600)
      expect(fs.files.get(storePath)).toBe(
        `${JSON.stringify({ share: { username: "svc-mirror", secret: "test-secret" } }, null, 2)}\n`
      )
      expect(fs.directories.has("/home/mirror/.folder-mirror/credentials")).toBe(true)
    }))

  it.effect("fails with CredentialMissing when nothing is stored", () =>
    Effect.gen(function*(_) {
      const error = yield* _(
        pipe(
          Effect.flatMap(CredentialProvider, (provider) => provider.get("notify")),
          Effect.flip,
          Effect.provide(liveProvider(makeMemoryFs()))
        )
      )
      expect(error).toEqual({
        _tag: "CredentialMissing",
        target: "notify",
        reason: "No stored credential for mirror@test-host"
      })
    }))

  it.effect("honours the credential directory override", () =>
    Effect.gen(function*(_) {
      const fs = makeMemoryFs({
        files: {
          "/etc/folder-mirror/secrets/mirror@test-host.json": JSON.stringify({
            notify: { username: "mailer", secret: "test-secret" }
          })
        }
      })
      const credentials = yield* _(
        pipe(
          Effect.flatMap(CredentialProvider, (provider) => provider.get("notify")),
          Effect.provide(liveProvider(fs, { FOLDER_MIRROR_CREDENTIAL_DIR: "/etc/folder-mirror/secrets" }))
        )
      )
      expect(credentials.username).toBe("mailer")
    }))
})

describe("ensureCredentialsExist", () => {
  it.effect("prompts only for missing targets", () =>
    Effect.gen(function*(_) {
      const store = makeCredentialStore({ share: { username: "svc-mirror", secret: "test-secret" } })
      const prompt = scriptedPrompt(["mailer", "test-secret"])
      const created = yield* _(
        pipe(
          ensureCredentialsExist(["share", "notify"]),
          Effect.provide(Layer.mergeAll(store.layer, prompt.layer))
        )
      )
      expect(created).toEqual(["notify"])
      expect(prompt.questions).toEqual(["Username for notify: ", "Secret for notify: "])
      expect(store.stored.notify).toEqual({ username: "mailer", secret: "test-secret" })
    }))

  it.effect("rejects an empty username", () =>
    Effect.gen(function*(_) {
      const store = makeCredentialStore({})
      const error = yield* _(
        pipe(
          ensureCredentialsExist(["share"]),
          Effect.flip,
          Effect.provide(Layer.mergeAll(store.layer, scriptedPrompt([""]).layer))
        )
      )
      expect(error).toEqual({ _tag: "CredentialMissing", target: "share", reason: "Empty username entered" })
    }))
})
