import { Effect, Layer } from "effect"

import { ioError } from "../../src/core/errors.js"
import { FileSystemService } from "../../src/shell/services/file-system.js"

export interface MemoryFsSeed {
  readonly files?: Readonly<Record<string, string>>
  readonly directories?: ReadonlyArray<string>
  readonly failingDirectories?: ReadonlyArray<string>
}

export interface MemoryFs {
  readonly files: Map<string, string>
  readonly directories: Set<string>
  readonly modes: Map<string, number>
  readonly layer: Layer.Layer<FileSystemService>
}

export const makeMemoryFs = (seed: MemoryFsSeed = {}): MemoryFs => {
  const files = new Map(Object.entries(seed.files ?? {}))
  const directories = new Set(seed.directories ?? [])
  const failing = new Set(seed.failingDirectories ?? [])
  const modes = new Map<string, number>()

  const layer = Layer.succeed(FileSystemService, {
    readFileString: (pathValue) => {
      const content = files.get(pathValue)
      return content === undefined
        ? Effect.fail(ioError(pathValue, "Cannot read file"))
        : Effect.succeed(content)
    },
    // Stored text is served the way /UNILOG writes it: UTF-16LE with a BOM.
    readFileBytes: (pathValue) => {
      const content = files.get(pathValue)
      return content === undefined
        ? Effect.fail(ioError(pathValue, "Cannot read file"))
        : Effect.succeed(Uint8Array.from(Buffer.from(`\uFEFF${content}`, "utf16le")))
    },
    writeFileString: (pathValue, content, options) =>
      Effect.sync(() => {
        files.set(pathValue, content)
        if (options?.mode !== undefined) {
          modes.set(pathValue, options.mode)
        }
      }),
    appendFileString: (pathValue, content) =>
      Effect.sync(() => {
        files.set(pathValue, `${files.get(pathValue) ?? ""}${content}`)
      }),
    makeDirectory: (pathValue) =>
      failing.has(pathValue)
        ? Effect.fail(ioError(pathValue, "Access is denied"))
        : Effect.sync(() => {
          directories.add(pathValue)
        }),
    exists: (pathValue) => Effect.sync(() => files.has(pathValue) || directories.has(pathValue))
  })

  return { files, directories, modes, layer }
}
