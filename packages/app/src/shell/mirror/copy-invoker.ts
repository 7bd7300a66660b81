import { Effect, pipe } from "effect"

import { buildCopyArgs, type RunConfig } from "../../core/copy-args.js"
import { type CopyLaunchError, type DirectoryCreateError, directoryCreateError } from "../../core/errors.js"
import type { FolderEntry } from "../../core/folder-list.js"
import type { InvocationResult } from "../../core/outcome.js"
import { CopyTool } from "../services/copy-tool.js"
import { FileSystemService } from "../services/file-system.js"
import type { RunLog } from "./run-log.js"

const ensureDestination = (
  destPath: string
): Effect.Effect<void, DirectoryCreateError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const present = yield* _(fs.exists(destPath))
    if (!present) {
      yield* _(fs.makeDirectory(destPath))
    }
  }).pipe(
    Effect.mapError((error) => directoryCreateError(destPath, error.reason))
  )

/**
 * Runs the copy tool once for one folder.
 *
 * @param entry - Folder list entry whose source exists.
 * @param destPath - Mapped destination folder.
 * @param config - Run configuration.
 * @param invocationLogPath - Log file the tool appends to.
 * @param runLog - Run-level log for the path debug line.
 * @returns Raw invocation result; the exit code is not interpreted here.
 *
 * @pure false - creates the destination and launches the tool
 * @effect FileSystemService, CopyTool
 * @invariant the tool is never started when the destination cannot be created
 */
// CHANGE: one invocation per folder with the destination prepared first
// WHY: a missing destination folder must fail that folder only, before robocopy runs
// QUOTE(TZ): n/a
// REF: copy-invocation
// SOURCE: n/a
// FORMAT THEOREM: forall e: invoke(e) -> exitCode(tool(args(e)))
// PURITY: SHELL
// EFFECT: Effect<InvocationResult, DirectoryCreateError | CopyLaunchError, FileSystemService | CopyTool>
// INVARIANT: source path and its length are logged before launching
// COMPLEXITY: O(1)/O(1)
export const invokeCopy = (
  entry: FolderEntry,
  destPath: string,
  config: RunConfig,
  invocationLogPath: string,
  runLog: RunLog
): Effect.Effect<InvocationResult, DirectoryCreateError | CopyLaunchError, FileSystemService | CopyTool> =>
  Effect.gen(function*(_) {
    const tool = yield* _(CopyTool)
    yield* _(ensureDestination(destPath))
    yield* _(
      runLog.write("debug", `source="${entry.sourcePath}" length=${entry.sourcePath.length}`)
    )
    const exitCode = yield* _(
      pipe(
        buildCopyArgs(entry.sourcePath, destPath, config, invocationLogPath),
        tool.run
      )
    )
    return {
      sourcePath: entry.sourcePath,
      destPath,
      exitCode,
      invocationLogPath
    }
  })
