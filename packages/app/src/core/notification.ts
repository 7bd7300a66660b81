import { renderReport, type RunSummary, totalFolders } from "./summary.js"

export type Urgency = "high" | "normal" | "low"

export interface NotificationContent {
  readonly subject: string
  readonly urgency: Urgency
  readonly body: string
}

const urgencyOf = (summary: RunSummary, simulateOnly: boolean): Urgency => {
  if (summary.failedCount > 0) {
    return "high"
  }
  return simulateOnly ? "low" : "normal"
}

const subjectOf = (summary: RunSummary, simulateOnly: boolean, machine: string): string => {
  const prefix = simulateOnly ? "[SIMULATION] " : ""
  return summary.failedCount > 0
    ? `${prefix}Folder mirror on ${machine} FAILED: ${summary.failedCount} of ${totalFolders(summary)} folders failed`
    : `${prefix}Folder mirror on ${machine} completed: ${summary.copiedCount} copied, ${summary.syncedCount} unchanged`
}

/**
 * Composes the notification for a finished run.
 *
 * @pure true
 * @invariant urgency = "high" iff failedCount > 0
 * @complexity O(f) where f = |failedFolders|
 */
// CHANGE: derive subject, urgency and body from the summary alone
// WHY: the transport only delivers; it never inspects run results
// QUOTE(TZ): n/a
// REF: run-notification
// SOURCE: n/a
// FORMAT THEOREM: forall s: compose(s).body contains renderReport(s)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: simulation runs are always marked in the subject
// COMPLEXITY: O(f)/O(f)
export const composeNotification = (
  summary: RunSummary,
  simulateOnly: boolean,
  machine: string
): NotificationContent => ({
  subject: subjectOf(summary, simulateOnly, machine),
  urgency: urgencyOf(summary, simulateOnly),
  body: [
    ...renderReport(summary, simulateOnly),
    "",
    "The run log and the list of transferred items are attached."
  ].join("\n")
})
