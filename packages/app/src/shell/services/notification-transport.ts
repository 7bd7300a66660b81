import { Context, Effect, Layer, pipe } from "effect"
import nodemailer from "nodemailer"

import { type NotifyError, notifyError } from "../../core/errors.js"
import type { Urgency } from "../../core/notification.js"
import type { Credentials } from "./credentials.js"

export interface MailEndpoint {
  readonly host: string
  readonly port: number
  readonly secure: boolean
  readonly from: string
  readonly to: string
}

export interface OutgoingNotification {
  readonly endpoint: MailEndpoint
  readonly subject: string
  readonly urgency: Urgency
  readonly body: string
  readonly attachments: ReadonlyArray<string>
}

export class NotificationTransport extends Context.Tag("NotificationTransport")<
  NotificationTransport,
  {
    readonly send: (
      message: OutgoingNotification,
      credentials: Credentials
    ) => Effect.Effect<void, NotifyError>
  }
>() {}

const fileNameOf = (pathValue: string): string => pathValue.split(/[\\/]/).at(-1) ?? pathValue

// CHANGE: deliver run notifications over SMTP with nodemailer
// WHY: mail protocol handling stays in a maintained library behind the transport tag
// QUOTE(TZ): n/a
// REF: notification-transport
// SOURCE: n/a
// FORMAT THEOREM: forall m: send(m) -> delivered(m) | NotifyError
// PURITY: SHELL
// EFFECT: Effect<void, NotifyError, never>
// INVARIANT: every attachment path is attached under its own file name
// COMPLEXITY: O(a)/O(a)
export const SmtpTransportLive = Layer.succeed(NotificationTransport, {
  send: (message, credentials) =>
    pipe(
      Effect.tryPromise({
        try: () =>
          nodemailer
            .createTransport({
              host: message.endpoint.host,
              port: message.endpoint.port,
              secure: message.endpoint.secure,
              auth: { user: credentials.username, pass: credentials.secret }
            })
            .sendMail({
              from: message.endpoint.from,
              to: message.endpoint.to,
              subject: message.subject,
              priority: message.urgency,
              text: message.body,
              attachments: message.attachments.map((attachment) => ({
                filename: fileNameOf(attachment),
                path: attachment
              }))
            }),
        catch: (error) => notifyError(error instanceof Error ? error.message : "SMTP delivery failed")
      }),
      Effect.asVoid
    )
})
