import { Clock, Console, Effect, pipe } from "effect"

import { FileSystemService } from "../services/file-system.js"

export type RunLogEvent =
  | "run-start"
  | "folder-list"
  | "mount"
  | "unmount"
  | "debug"
  | "folder"
  | "skipped-missing"
  | "failed"
  | "transfer-log"
  | "summary"
  | "notify"
  | "notify-error"
  | "fatal"
  | "run-end"

export interface RunLog {
  readonly path: string
  readonly write: (event: RunLogEvent, context: string) => Effect.Effect<void>
}

export const formatLogLine = (event: RunLogEvent, epochMillis: number, context: string): string =>
  `${event} ${new Date(epochMillis).toISOString()} ${context}\n`

/**
 * Opens the append-only run log.
 *
 * @param logPath - Run-level log file named after the run stamp.
 * @returns Writer that appends one line per event and echoes non-debug events.
 *
 * @pure false - appends to the log file and writes to the console
 * @effect FileSystemService, Clock
 * @invariant a failed append is reported on stderr and never fails the caller
 */
// CHANGE: one run-level log alongside the tool's per-invocation logs
// WHY: every skipped, failed and copied folder must be traceable after a scheduled run
// QUOTE(TZ): n/a
// REF: run-log
// SOURCE: n/a
// FORMAT THEOREM: forall e, c: write(e, c) -> appended("<e> <ts> <c>")
// PURITY: SHELL
// EFFECT: Effect<RunLog, never, FileSystemService>
// INVARIANT: debug lines go to the file only
// COMPLEXITY: O(1)/O(1)
export const openRunLog = (logPath: string): Effect.Effect<RunLog, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)

    const write = (event: RunLogEvent, context: string): Effect.Effect<void> =>
      Effect.gen(function*(_) {
        const now = yield* _(Clock.currentTimeMillis)
        yield* _(
          pipe(
            fs.appendFileString(logPath, formatLogLine(event, now, context)),
            Effect.catchAll((error) => Console.error(`run log unavailable: ${error.reason} ${error.path}`))
          )
        )
        if (event !== "debug") {
          yield* _(Console.log(`${event}: ${context}`))
        }
      })

    return { path: logPath, write }
  })
