import { Effect, pipe } from "effect"

import { type ConfigError, configError } from "../../core/errors.js"
import { type FolderEntry, parseFolderList } from "../../core/folder-list.js"
import { FileSystemService } from "../services/file-system.js"

/**
 * Reads the folder list file.
 *
 * @param listPath - Path of the line-oriented folder list.
 * @returns Entries in file order.
 *
 * @pure false - reads the list file
 * @effect FileSystemService
 * @invariant fails with ConfigError iff the file is absent, unreadable or has no usable line
 */
// CHANGE: treat a missing or empty folder list as fatal before any folder is touched
// WHY: an empty list would otherwise look like a successful run with nothing to do
// QUOTE(TZ): n/a
// REF: folder-list-format
// SOURCE: n/a
// FORMAT THEOREM: forall p: read(p) = [] -> ConfigError
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<FolderEntry>, ConfigError, FileSystemService>
// INVARIANT: returned sequence is non-empty
// COMPLEXITY: O(n)/O(n)
export const readFolderList = (
  listPath: string
): Effect.Effect<ReadonlyArray<FolderEntry>, ConfigError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const present = yield* _(
      pipe(fs.exists(listPath), Effect.mapError((error) => configError(`${error.reason}: ${error.path}`)))
    )
    if (!present) {
      return yield* _(Effect.fail(configError(`Folder list not found: ${listPath}`)))
    }
    const content = yield* _(
      pipe(fs.readFileString(listPath), Effect.mapError((error) => configError(`${error.reason}: ${error.path}`)))
    )
    const entries = parseFolderList(content)
    if (entries.length === 0) {
      return yield* _(Effect.fail(configError(`Folder list has no usable entries: ${listPath}`)))
    }
    return entries
  })
