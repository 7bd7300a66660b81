import { Effect, pipe } from "effect"

import type { IoError } from "../../core/errors.js"
import {
  decodeUnicodeLog,
  extractTransferredItems,
  type LogLineClassifier,
  type TransferredItem
} from "../../core/transfer-log.js"
import { FileSystemService } from "../services/file-system.js"

// CHANGE: read one /UNILOG invocation log and hand its text to the pure extractor
// WHY: the tool writes UTF-16LE so non-ASCII file names survive; line rules stay in CORE
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<TransferredItem>, IoError, FileSystemService>
// INVARIANT: items keep log order
// COMPLEXITY: O(n)/O(n)
export const extractTransferred = (
  invocationLogPath: string,
  classifier: LogLineClassifier,
  isExcluded: (pathValue: string) => boolean
): Effect.Effect<ReadonlyArray<TransferredItem>, IoError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    return yield* _(
      pipe(
        fs.readFileBytes(invocationLogPath),
        Effect.map((bytes) => extractTransferredItems(decodeUnicodeLog(bytes), classifier, isExcluded))
      )
    )
  })
