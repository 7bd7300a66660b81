import { Match, Option } from "effect"

import { copyToolFailure, type FolderFailure } from "./errors.js"

export interface InvocationResult {
  readonly sourcePath: string
  readonly destPath: string
  readonly exitCode: number
  readonly invocationLogPath: string
}

export interface Copied {
  readonly _tag: "Copied"
  readonly sourcePath: string
  readonly destPath: string
  readonly exitCode: number
}

export interface SyncedNoChange {
  readonly _tag: "SyncedNoChange"
  readonly sourcePath: string
  readonly destPath: string
  readonly exitCode: number
}

export interface Failed {
  readonly _tag: "Failed"
  readonly sourcePath: string
  readonly destPath: Option.Option<string>
  readonly exitCode: Option.Option<number>
  readonly cause: FolderFailure
}

export interface SkippedMissing {
  readonly _tag: "SkippedMissing"
  readonly sourcePath: string
}

export type FolderOutcome = Copied | SyncedNoChange | Failed | SkippedMissing

export type OutcomeKind = FolderOutcome["_tag"]

export type InvocationKind = Exclude<OutcomeKind, "SkippedMissing">

const copyBits = 0b011
const failureThreshold = 8

/**
 * Maps a copy tool exit code to an outcome kind.
 *
 * Exit codes are a bitmask: 1 files copied, 2 extra items, 4 mismatches, 8 failures.
 *
 * @pure true
 * @invariant code >= 8 or code < 0 -> "Failed"; 0..7 never "Failed"
 * @complexity O(1)
 */
// CHANGE: isolate the tool's exit-code contract in one total function
// WHY: the run loop must never interpret raw exit codes itself
// QUOTE(TZ): n/a
// REF: robocopy-exit-codes
// SOURCE: n/a
// FORMAT THEOREM: forall c in [0,7]: classify(c) = (c & 3) != 0 ? Copied : SyncedNoChange
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 4 (mismatch only) stays SyncedNoChange
// COMPLEXITY: O(1)/O(1)
export const classifyExitCode = (exitCode: number): InvocationKind => {
  if (exitCode < 0 || exitCode >= failureThreshold) {
    return "Failed"
  }
  return (exitCode & copyBits) === 0 ? "SyncedNoChange" : "Copied"
}

export const skippedMissing = (sourcePath: string): SkippedMissing => ({
  _tag: "SkippedMissing",
  sourcePath
})

export const failedBeforeCopy = (
  sourcePath: string,
  destPath: Option.Option<string>,
  cause: FolderFailure
): Failed => ({
  _tag: "Failed",
  sourcePath,
  destPath,
  exitCode: Option.none(),
  cause
})

export const outcomeFromInvocation = (result: InvocationResult): FolderOutcome =>
  Match.value(classifyExitCode(result.exitCode)).pipe(
    Match.when("Copied", (): FolderOutcome => ({
      _tag: "Copied",
      sourcePath: result.sourcePath,
      destPath: result.destPath,
      exitCode: result.exitCode
    })),
    Match.when("SyncedNoChange", (): FolderOutcome => ({
      _tag: "SyncedNoChange",
      sourcePath: result.sourcePath,
      destPath: result.destPath,
      exitCode: result.exitCode
    })),
    Match.when("Failed", (): FolderOutcome => ({
      _tag: "Failed",
      sourcePath: result.sourcePath,
      destPath: Option.some(result.destPath),
      exitCode: Option.some(result.exitCode),
      cause: copyToolFailure(result.sourcePath, result.exitCode)
    })),
    Match.exhaustive
  )

export const describeOutcome = (outcome: FolderOutcome): string =>
  Match.value(outcome).pipe(
    Match.tag("Copied", (o) => `copied ${o.sourcePath} -> ${o.destPath} (exit ${o.exitCode})`),
    Match.tag("SyncedNoChange", (o) => `unchanged ${o.sourcePath} -> ${o.destPath} (exit ${o.exitCode})`),
    Match.tag("Failed", (o) =>
      `failed ${o.sourcePath}${
        Option.match(o.exitCode, { onNone: () => "", onSome: (code) => ` (exit ${code})` })
      }`),
    Match.tag("SkippedMissing", (o) => `skipped missing source ${o.sourcePath}`),
    Match.exhaustive
  )
