import * as FileSystem from "@effect/platform/FileSystem"
import { Context, Effect, Layer, pipe } from "effect"

import { type IoError, ioError } from "../../core/errors.js"

export interface WriteOptions {
  readonly mode?: number
}

export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  {
    readonly readFileString: (pathValue: string) => Effect.Effect<string, IoError>
    readonly readFileBytes: (pathValue: string) => Effect.Effect<Uint8Array, IoError>
    readonly writeFileString: (
      pathValue: string,
      content: string,
      options?: WriteOptions
    ) => Effect.Effect<void, IoError>
    readonly appendFileString: (pathValue: string, content: string) => Effect.Effect<void, IoError>
    readonly makeDirectory: (pathValue: string) => Effect.Effect<void, IoError>
    readonly exists: (pathValue: string) => Effect.Effect<boolean, IoError>
  }
>() {}

// CHANGE: wrap filesystem access behind a service for typed errors and testing
// WHY: the run loop, logs and credential store share one injectable boundary
// QUOTE(TZ): n/a
// REF: fs-boundary
// SOURCE: n/a
// FORMAT THEOREM: forall p: exists(p) -> readable(p)
// PURITY: SHELL
// EFFECT: Effect<FileSystemService, never, FileSystem>
// INVARIANT: text is read and written as UTF-8 without BOM
// COMPLEXITY: O(n)/O(n)
export const FileSystemLive = Layer.effect(
  FileSystemService,
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)

    const readFileString = (pathValue: string): Effect.Effect<string, IoError> =>
      pipe(
        fs.readFileString(pathValue, "utf8"),
        Effect.mapError(() => ioError(pathValue, "Cannot read file"))
      )

    const readFileBytes = (pathValue: string): Effect.Effect<Uint8Array, IoError> =>
      pipe(
        fs.readFile(pathValue),
        Effect.mapError(() => ioError(pathValue, "Cannot read file"))
      )

    const writeFileString = (
      pathValue: string,
      content: string,
      options?: WriteOptions
    ): Effect.Effect<void, IoError> =>
      pipe(
        fs.writeFileString(pathValue, content, options?.mode === undefined ? {} : { mode: options.mode }),
        Effect.mapError(() => ioError(pathValue, "Cannot write file"))
      )

    const appendFileString = (pathValue: string, content: string): Effect.Effect<void, IoError> =>
      pipe(
        fs.writeFileString(pathValue, content, { flag: "a" }),
        Effect.mapError(() => ioError(pathValue, "Cannot append to file"))
      )

    const makeDirectory = (pathValue: string): Effect.Effect<void, IoError> =>
      pipe(
        fs.makeDirectory(pathValue, { recursive: true }),
        Effect.mapError(() => ioError(pathValue, "Cannot create directory"))
      )

    const exists = (pathValue: string): Effect.Effect<boolean, IoError> =>
      pipe(
        fs.exists(pathValue),
        Effect.mapError(() => ioError(pathValue, "Cannot check path existence"))
      )

    return {
      readFileString,
      readFileBytes,
      writeFileString,
      appendFileString,
      makeDirectory,
      exists
    }
  })
)
