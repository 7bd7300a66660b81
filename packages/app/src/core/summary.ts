import type { FolderOutcome } from "./outcome.js"
import type { TransferredItem } from "./transfer-log.js"

export interface RunAccumulator {
  readonly outcomes: ReadonlyArray<FolderOutcome>
  readonly transferredItems: ReadonlyArray<TransferredItem>
}

export interface RunSummary {
  readonly copiedCount: number
  readonly syncedCount: number
  readonly skippedCount: number
  readonly failedCount: number
  readonly failedFolders: ReadonlyArray<string>
  readonly transferredItems: ReadonlyArray<TransferredItem>
}

export const emptyAccumulator: RunAccumulator = {
  outcomes: [],
  transferredItems: []
}

// CHANGE: thread per-run totals through the folder loop as a value
// WHY: no ambient counters; each run starts from an empty accumulator
// QUOTE(TZ): n/a
// REF: run-accumulator
// SOURCE: n/a
// FORMAT THEOREM: forall a, o, t: record(a, o, t).outcomes = a.outcomes ++ [o]
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: outcomes and transferred items are append-only
// COMPLEXITY: O(n)/O(n)
export const recordFolder = (
  accumulator: RunAccumulator,
  outcome: FolderOutcome,
  items: ReadonlyArray<TransferredItem>
): RunAccumulator => ({
  outcomes: [...accumulator.outcomes, outcome],
  transferredItems: [...accumulator.transferredItems, ...items]
})

const countOf = (outcomes: ReadonlyArray<FolderOutcome>, tag: FolderOutcome["_tag"]): number =>
  outcomes.filter((outcome) => outcome._tag === tag).length

/**
 * Aggregates the outcome sequence of a run.
 *
 * @pure true
 * @invariant copied + synced + skipped + failed = |outcomes|
 * @complexity O(n)
 */
export const buildRunSummary = (accumulator: RunAccumulator): RunSummary => ({
  copiedCount: countOf(accumulator.outcomes, "Copied"),
  syncedCount: countOf(accumulator.outcomes, "SyncedNoChange"),
  skippedCount: countOf(accumulator.outcomes, "SkippedMissing"),
  failedCount: countOf(accumulator.outcomes, "Failed"),
  failedFolders: accumulator.outcomes
    .filter((outcome) => outcome._tag === "Failed")
    .map((outcome) => outcome.sourcePath),
  transferredItems: accumulator.transferredItems
})

export const totalFolders = (summary: RunSummary): number =>
  summary.copiedCount + summary.syncedCount + summary.skippedCount + summary.failedCount

export const noTransfersLine = "No files were transferred during this run."

export const renderTransferredItems = (summary: RunSummary): string =>
  summary.transferredItems.length === 0
    ? `${noTransfersLine}\n`
    : summary.transferredItems.map((item) => `${item.path}\n`).join("")

/**
 * Renders the human-readable run report.
 *
 * @param summary - Aggregated run summary.
 * @param simulateOnly - Whether the copy tool ran in list-only mode.
 * @returns Report lines without trailing newlines.
 *
 * @pure true
 * @invariant the failed-folder section is present iff failedCount > 0
 * @complexity O(f) where f = |failedFolders|
 */
export const renderReport = (
  summary: RunSummary,
  simulateOnly: boolean
): ReadonlyArray<string> => [
  simulateOnly ? "Folder mirror summary (simulation, nothing was copied)" : "Folder mirror summary",
  `Folders processed: ${totalFolders(summary)}`,
  `Copied: ${summary.copiedCount}`,
  `Synced (no change): ${summary.syncedCount}`,
  `Skipped (missing source): ${summary.skippedCount}`,
  `Failed: ${summary.failedCount}`,
  `Transferred items: ${summary.transferredItems.length}`,
  ...(summary.failedCount > 0
    ? ["Failed folders:", ...summary.failedFolders.map((folder) => `  ${folder}`)]
    : [])
]
