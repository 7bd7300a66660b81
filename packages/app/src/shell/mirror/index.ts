import * as Path from "@effect/platform/Path"
import { Clock, Effect, Either, Option, pipe, type Scope } from "effect"

import type { RunConfig } from "../../core/copy-args.js"
import {
  type ConfigError,
  configError,
  type CredentialMissing,
  describeError,
  type FatalRunError,
  type MountError
} from "../../core/errors.js"
import type { FolderEntry } from "../../core/folder-list.js"
import {
  describeOutcome,
  failedBeforeCopy,
  type FolderOutcome,
  outcomeFromInvocation,
  skippedMissing
} from "../../core/outcome.js"
import { mapDestination } from "../../core/path-mapper.js"
import { formatRunStamp, planRunFiles, type RunFiles } from "../../core/run-files.js"
import {
  buildRunSummary,
  emptyAccumulator,
  recordFolder,
  renderReport,
  renderTransferredItems,
  type RunSummary
} from "../../core/summary.js"
import { compileExclusions, type LogLineClassifier, type TransferredItem } from "../../core/transfer-log.js"
import type { CopyTool } from "../services/copy-tool.js"
import { CredentialProvider } from "../services/credentials.js"
import { FileSystemService } from "../services/file-system.js"
import type { NotificationTransport } from "../services/notification-transport.js"
import { RuntimeEnv } from "../services/runtime-env.js"
import { ShareMounter } from "../services/share-mounter.js"
import { invokeCopy } from "./copy-invoker.js"
import { readFolderList } from "./folder-list.js"
import { sendNotification } from "./notify.js"
import { openRunLog, type RunLog } from "./run-log.js"
import { extractTransferred } from "./transfer-log.js"
import type { MirrorSettings } from "./types.js"

export type MirrorEnv = FileSystemService | CopyTool | ShareMounter | CredentialProvider | Path.Path

export type MirrorJobEnv = MirrorEnv | NotificationTransport | RuntimeEnv

export interface MirrorRun {
  readonly summary: RunSummary
  readonly files: RunFiles
  readonly runLog: RunLog
}

interface LoopContext {
  readonly config: RunConfig
  readonly files: RunFiles
  readonly runLog: RunLog
  readonly classifier: LogLineClassifier
  readonly isExcluded: (pathValue: string) => boolean
}

interface FolderStep {
  readonly outcome: FolderOutcome
  readonly items: ReadonlyArray<TransferredItem>
}

const noItems: ReadonlyArray<TransferredItem> = []

const collectTransferred = (
  invocationLogPath: string,
  context: LoopContext
): Effect.Effect<ReadonlyArray<TransferredItem>, never, FileSystemService> =>
  pipe(
    extractTransferred(invocationLogPath, context.classifier, context.isExcluded),
    Effect.catchAll((error) =>
      pipe(
        context.runLog.write("transfer-log", describeError(error)),
        Effect.as(noItems)
      )
    )
  )

// CHANGE: turn one folder entry into exactly one outcome
// WHY: per-folder problems are recorded and never escape the loop
// QUOTE(TZ): n/a
// REF: run-loop
// SOURCE: n/a
// FORMAT THEOREM: forall e: process(e) -> one FolderOutcome
// PURITY: SHELL
// EFFECT: Effect<FolderStep, never, FileSystemService | CopyTool>
// INVARIANT: a missing source never reaches the copy tool
// COMPLEXITY: O(log lines)/O(items)
const processFolder = (
  entry: FolderEntry,
  index: number,
  context: LoopContext
): Effect.Effect<FolderStep, never, FileSystemService | CopyTool> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const { runLog } = context
    const present = yield* _(Effect.either(fs.exists(entry.sourcePath)))
    if (Either.isLeft(present)) {
      yield* _(runLog.write("failed", `${entry.sourcePath}: ${describeError(present.left)}`))
      return { outcome: failedBeforeCopy(entry.sourcePath, Option.none(), present.left), items: noItems }
    }
    if (!present.right) {
      yield* _(runLog.write("skipped-missing", entry.sourcePath))
      return { outcome: skippedMissing(entry.sourcePath), items: noItems }
    }

    const destPath = mapDestination(entry.sourcePath, context.config.destinationRoot)
    const invocationLogPath = context.files.invocationLogPath(index)
    const invocation = yield* _(
      Effect.either(invokeCopy(entry, destPath, context.config, invocationLogPath, runLog))
    )
    if (Either.isLeft(invocation)) {
      yield* _(runLog.write("failed", `${entry.sourcePath}: ${describeError(invocation.left)}`))
      return { outcome: failedBeforeCopy(entry.sourcePath, Option.some(destPath), invocation.left), items: noItems }
    }

    const outcome = outcomeFromInvocation(invocation.right)
    const items = yield* _(collectTransferred(invocationLogPath, context))
    yield* _(
      runLog.write(
        outcome._tag === "Failed" ? "failed" : "folder",
        `${describeOutcome(outcome)}; ${items.length} transferred; log ${invocationLogPath}`
      )
    )
    return { outcome, items }
  })

const requireShare = (settings: MirrorSettings): Effect.Effect<string, ConfigError> =>
  Option.match(settings.remoteShare, {
    onNone: () => Effect.fail(configError("FOLDER_MIRROR_SHARE must be set when alternate credentials are used")),
    onSome: (share) => Effect.succeed(share)
  })

// CHANGE: hold the mapped share for the lifetime of the run scope
// WHY: the mapping must be released on success, failure and interruption alike
// QUOTE(TZ): n/a
// REF: share-mount
// SOURCE: n/a
// FORMAT THEOREM: forall r: acquire(r) -> release(r) when the scope closes
// PURITY: SHELL
// EFFECT: Effect<string, ConfigError | CredentialMissing | MountError, ShareMounter | CredentialProvider | Scope>
// INVARIANT: release is registered only after a successful acquire
// COMPLEXITY: O(1)/O(1)
const mountDestination = (
  settings: MirrorSettings,
  runLog: RunLog
): Effect.Effect<
  string,
  ConfigError | CredentialMissing | MountError,
  ShareMounter | CredentialProvider | Scope.Scope
> =>
  Effect.gen(function*(_) {
    const share = yield* _(requireShare(settings))
    const provider = yield* _(CredentialProvider)
    const mounter = yield* _(ShareMounter)
    const credentials = yield* _(provider.get("share"))
    const root = yield* _(
      Effect.acquireRelease(
        mounter.acquire(credentials, share),
        (mountedRoot) => pipe(mounter.release(mountedRoot), Effect.zipRight(runLog.write("unmount", mountedRoot)))
      )
    )
    yield* _(runLog.write("mount", `${share} mounted at ${root}`))
    return root
  })

const writeReports = (
  summary: RunSummary,
  files: RunFiles,
  simulateOnly: boolean,
  runLog: RunLog
): Effect.Effect<void, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    yield* _(
      pipe(
        fs.writeFileString(files.transferredItemsPath, renderTransferredItems(summary)),
        Effect.catchAll((error) => runLog.write("summary", describeError(error)))
      )
    )
    yield* _(Effect.forEach(renderReport(summary, simulateOnly), (line) => runLog.write("summary", line)))
  })

const mirrorFolders = (
  settings: MirrorSettings,
  files: RunFiles,
  runLog: RunLog
): Effect.Effect<RunSummary, FatalRunError, Exclude<MirrorEnv, Path.Path>> =>
  Effect.scoped(
    Effect.gen(function*(_) {
      const entries = yield* _(readFolderList(settings.folderListPath))
      yield* _(runLog.write("folder-list", `${entries.length} folders from ${settings.folderListPath}`))
      const destinationRoot = settings.useAlternateCredentials
        ? yield* _(mountDestination(settings, runLog))
        : settings.run.destinationRoot
      const context: LoopContext = {
        config: { ...settings.run, destinationRoot },
        files,
        runLog,
        classifier: settings.classifier,
        isExcluded: compileExclusions(settings.run)
      }
      const accumulator = yield* _(
        Effect.reduce(entries, emptyAccumulator, (current, entry, index) =>
          Effect.map(
            processFolder(entry, index + 1, context),
            (step) => recordFolder(current, step.outcome, step.items)
          ))
      )
      const summary = buildRunSummary(accumulator)
      yield* _(writeReports(summary, files, settings.run.simulateOnly, runLog))
      return summary
    })
  )

/**
 * Mirrors every folder of the list and writes the run artefacts.
 *
 * @param settings - Deployment settings and run options.
 * @returns Summary plus the run's file names and log writer.
 *
 * @pure false - reads the list, runs the copy tool, writes logs and reports
 * @effect FileSystemService, CopyTool, ShareMounter, CredentialProvider, Path, Clock
 * @invariant copied + synced + skipped + failed = number of entries
 * @precondition settings.logDirectory is writable
 * @postcondition the share, when mounted, has been released
 * @complexity O(n) invocations where n = number of entries
 * @throws Never - fatal setup errors are typed in the Effect error channel
 */
// CHANGE: sequential folder loop with an explicit accumulator
// WHY: deterministic per-invocation log names and no shared mutable counters
// QUOTE(TZ): n/a
// REF: run-loop
// SOURCE: n/a
// FORMAT THEOREM: forall l: run(l) -> |outcomes| = |entries(l)|
// PURITY: SHELL
// EFFECT: Effect<MirrorRun, FatalRunError, MirrorEnv>
// INVARIANT: folders are processed one at a time in list order
// COMPLEXITY: O(n)/O(n)
export const runMirror = (
  settings: MirrorSettings
): Effect.Effect<MirrorRun, FatalRunError, MirrorEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path.Path)
    const fs = yield* _(FileSystemService)
    const startedAt = yield* _(Clock.currentTimeMillis)
    const files = planRunFiles(
      (directory, fileName) => path.join(directory, fileName),
      settings.logDirectory,
      formatRunStamp(startedAt)
    )
    yield* _(
      pipe(
        fs.makeDirectory(settings.logDirectory),
        Effect.mapError((error) => configError(`Cannot create log directory ${error.path}`))
      )
    )
    const runLog = yield* _(openRunLog(files.runLogPath))
    yield* _(
      runLog.write(
        "run-start",
        `simulate=${settings.run.simulateOnly} notify=${settings.run.notifyEnabled} alternateCredentials=${settings.useAlternateCredentials}`
      )
    )
    const summary = yield* _(
      pipe(
        mirrorFolders(settings, files, runLog),
        Effect.tapError((error) => runLog.write("fatal", describeError(error)))
      )
    )
    return { summary, files, runLog }
  })

/**
 * Full scheduled job: mirror, then notify when enabled.
 *
 * @pure false
 * @effect MirrorEnv, NotificationTransport, RuntimeEnv
 * @invariant notification failures are logged and never change the result
 */
export const runMirrorJob = (
  settings: MirrorSettings
): Effect.Effect<RunSummary, FatalRunError, MirrorJobEnv> =>
  Effect.gen(function*(_) {
    const { files, runLog, summary } = yield* _(runMirror(settings))
    if (settings.run.notifyEnabled) {
      const env = yield* _(RuntimeEnv)
      const identity = yield* _(env.identity)
      yield* _(
        pipe(
          sendNotification({
            summary,
            simulateOnly: settings.run.simulateOnly,
            machine: identity.host,
            runLogPath: files.runLogPath,
            transferredItemsPath: files.transferredItemsPath,
            endpoint: settings.mail
          }),
          Effect.matchEffect({
            onFailure: (error) => runLog.write("notify-error", describeError(error)),
            onSuccess: () => runLog.write("notify", "Notification sent")
          })
        )
      )
    }
    yield* _(runLog.write("run-end", `failed=${summary.failedCount}`))
    return summary
  })
