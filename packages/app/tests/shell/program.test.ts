import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer, Option, pipe } from "effect"

import { credentialTargets, program } from "../../src/app/program.js"
import { parseArgs } from "../../src/shell/cli.js"
import { CredentialPrompt } from "../../src/shell/services/credentials.js"
import {
  makeCredentialStore,
  makeRecordingMounter,
  makeRecordingTransport,
  makeRuntimeEnvLayer
} from "../support/fakes.js"
import { makeMemoryFs } from "../support/memory-fs.js"

describe("credentialTargets", () => {
  it("needs the share credential for alternate credentials and the notify one for notifications", () => {
    expect(credentialTargets(parseArgs([]))).toEqual([])
    expect(credentialTargets(parseArgs(["-a", "-n"]))).toEqual(["share", "notify"])
    expect(credentialTargets(parseArgs(["--notify"]))).toEqual(["notify"])
  })

  it("sets up every credential when setup is requested without run flags", () => {
    expect(credentialTargets(parseArgs(["--setup-credentials"]))).toEqual(["share", "notify"])
  })
})

const programWith = (argv: ReadonlyArray<string>, answers: ReadonlyArray<string>) => {
  const store = makeCredentialStore({})
  const queue = [...answers]
  const prompt = Layer.succeed(CredentialPrompt, {
    ask: () => Effect.sync(() => queue.shift() ?? "")
  })
  const layer = Layer.mergeAll(
    makeMemoryFs().layer,
    makeRuntimeEnvLayer(["node", "main", ...argv]),
    store.layer,
    prompt,
    makeRecordingMounter(Option.none()).layer,
    makeRecordingTransport().layer,
    NodeContext.layer
  )
  return { store, run: pipe(program, Effect.provide(layer)) }
}

describe("program", () => {
  it.effect("stores prompted credentials and exits with --setup-credentials", () =>
    Effect.gen(function*(_) {
      const { run, store } = programWith(["--setup-credentials", "--notify"], ["mailer", "test-secret"])
      yield* _(run)
      expect(store.stored).toEqual({ notify: { username: "mailer", secret: "test-secret" } })
    }))

  it.effect("fails with ConfigError when the default folder list is absent", () =>
    Effect.gen(function*(_) {
      const { run } = programWith([], [])
      const error = yield* _(Effect.flip(run))
      expect(error).toEqual({ _tag: "ConfigError", reason: "Folder list not found: /srv/mirror/folders.txt" })
    }))
})
