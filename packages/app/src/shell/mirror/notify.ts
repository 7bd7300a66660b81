import { Effect, Option } from "effect"

import { type CredentialMissing, type NotifyError, notifyError } from "../../core/errors.js"
import { composeNotification } from "../../core/notification.js"
import type { RunSummary } from "../../core/summary.js"
import { CredentialProvider } from "../services/credentials.js"
import { type MailEndpoint, NotificationTransport } from "../services/notification-transport.js"

export interface NotificationRequest {
  readonly summary: RunSummary
  readonly simulateOnly: boolean
  readonly machine: string
  readonly runLogPath: string
  readonly transferredItemsPath: string
  readonly endpoint: Option.Option<MailEndpoint>
}

/**
 * Sends the run notification with the run log and transferred-items file attached.
 *
 * @pure false - retrieves the notify credential and calls the transport
 * @effect CredentialProvider, NotificationTransport
 * @invariant never retried; the caller decides how to report failures
 * @complexity O(f) where f = |failedFolders|
 */
// CHANGE: keep notification as the informational last step of a run
// WHY: a mail outage must not turn a good sync into a failed one
// QUOTE(TZ): n/a
// REF: run-notification
// SOURCE: n/a
// FORMAT THEOREM: forall r: send(r) -> delivered | NotifyError | CredentialMissing
// PURITY: SHELL
// EFFECT: Effect<void, NotifyError | CredentialMissing, CredentialProvider | NotificationTransport>
// INVARIANT: attachments are [runLogPath, transferredItemsPath]
// COMPLEXITY: O(f)/O(f)
export const sendNotification = (
  request: NotificationRequest
): Effect.Effect<void, NotifyError | CredentialMissing, CredentialProvider | NotificationTransport> =>
  Effect.gen(function*(_) {
    if (Option.isNone(request.endpoint)) {
      return yield* _(Effect.fail(notifyError("Mail endpoint is not configured")))
    }
    const credentials = yield* _(CredentialProvider)
    const transport = yield* _(NotificationTransport)
    const auth = yield* _(credentials.get("notify"))
    const content = composeNotification(request.summary, request.simulateOnly, request.machine)
    yield* _(
      transport.send(
        {
          endpoint: request.endpoint.value,
          subject: content.subject,
          urgency: content.urgency,
          body: content.body,
          attachments: [request.runLogPath, request.transferredItemsPath]
        },
        auth
      )
    )
  })
