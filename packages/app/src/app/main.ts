#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer, pipe } from "effect"

import { CredentialPromptLive, CredentialProviderLive } from "../shell/services/credentials.js"
import { FileSystemLive } from "../shell/services/file-system.js"
import { SmtpTransportLive } from "../shell/services/notification-transport.js"
import { RuntimeEnvLive } from "../shell/services/runtime-env.js"
import { ShareMounterLive } from "../shell/services/share-mounter.js"
import { program } from "./program.js"

const PlatformLive = Layer.provideMerge(
  Layer.mergeAll(RuntimeEnvLive, FileSystemLive),
  NodeContext.layer
)

// CHANGE: run the mirror program through the Node runtime with all live layers
// WHY: provide platform services and shell dependencies in one place
// QUOTE(TZ): n/a
// REF: entry-point
// SOURCE: n/a
// FORMAT THEOREM: forall env: provide(env) -> runMain(program)
// PURITY: SHELL
// EFFECT: Effect<void, FatalRunError, never>
// INVARIANT: a failed program exits with status 1 after reporting its own error
// COMPLEXITY: O(1)/O(1)
const main = pipe(
  program,
  Effect.provide(
    Layer.provideMerge(
      Layer.mergeAll(ShareMounterLive, CredentialProviderLive, CredentialPromptLive, SmtpTransportLive),
      PlatformLive
    )
  )
)

NodeRuntime.runMain(main, { disableErrorReporting: true })
