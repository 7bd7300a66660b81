import { Option } from "effect"

export interface TransferredItem {
  readonly path: string
}

export interface Exclusions {
  readonly excludeFilePatterns: ReadonlyArray<string>
  readonly excludeDirNames: ReadonlyArray<string>
}

/**
 * Recognizes transfer records in the text log of one copy tool.
 *
 * Implementations own the tool's log format; nothing else in the program inspects log lines.
 */
export interface LogLineClassifier {
  readonly tool: string
  readonly transferredPath: (line: string) => Option.Option<string>
}

const robocopyMarkers: ReadonlyArray<string> = ["New File", "New Dir", "Newer", "Renamed"]

const rootedVolume = /[A-Za-z]:\\/

const numericField = /^\d+$/

const lastTabField = (line: string): { readonly head: string; readonly last: string } => {
  const cut = line.lastIndexOf("\t")
  return cut === -1
    ? { head: "", last: line }
    : { head: line.slice(0, cut), last: line.slice(cut + 1) }
}

// CHANGE: tie transfer detection to robocopy's verbose /FP /TS /BYTES line layout
// WHY: free-text inference stays behind one narrow, swappable classifier
// QUOTE(TZ): n/a
// REF: robocopy-log-format
// SOURCE: n/a
// FORMAT THEOREM: forall l: some(p) <- marker(head(l)) & rooted(l) & !numeric(p)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: markers are searched before the path field only
// COMPLEXITY: O(|l|)/O(|l|)
export const robocopyLineClassifier: LogLineClassifier = {
  tool: "robocopy",
  transferredPath: (line) => {
    if (!rootedVolume.test(line)) {
      return Option.none()
    }
    const { head, last } = lastTabField(line)
    if (!robocopyMarkers.some((marker) => head.includes(marker))) {
      return Option.none()
    }
    const candidate = last.trim()
    if (candidate.length === 0 || numericField.test(candidate)) {
      return Option.none()
    }
    return Option.some(candidate)
  }
}

const escapeRegExp = (value: string): string => value.replaceAll(/[$()+.[\\\]^{|}]/g, "\\$&")

/**
 * Translates a file glob into an anchored, case-insensitive expression.
 *
 * @pure true
 * @invariant "*" matches any run of characters, "?" one character, "." is literal
 */
export const globToRegExp = (pattern: string): RegExp =>
  new RegExp(
    `^${escapeRegExp(pattern).replaceAll("*", ".*").replaceAll("?", ".")}$`,
    "i"
  )

const fileNameOf = (pathValue: string): string => {
  const cut = Math.max(pathValue.lastIndexOf("\\"), pathValue.lastIndexOf("/"))
  return pathValue.slice(cut + 1)
}

/**
 * Builds the exclusion predicate for transfer candidates.
 *
 * @param exclusions - Excluded file globs and directory names.
 * @returns Predicate that is true when a path must not be reported.
 *
 * @pure true
 * @invariant a path containing "\\<dir>\\" for an excluded dir is always excluded
 * @complexity O(p + d) per call where p = |excludeFilePatterns|, d = |excludeDirNames|
 */
// CHANGE: compile globs once per run instead of once per log line
// WHY: logs of large folders hold one line per file
// QUOTE(TZ): n/a
// REF: transfer-exclusions
// SOURCE: n/a
// FORMAT THEOREM: forall p: excluded(p) <-> underDir(p) | globMatch(name(p))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: matching is case-insensitive
// COMPLEXITY: O(p + d)/O(p + d)
export const compileExclusions = (exclusions: Exclusions): (pathValue: string) => boolean => {
  const globs = exclusions.excludeFilePatterns.map((pattern) => globToRegExp(pattern))
  const segments = exclusions.excludeDirNames.map((name) => `\\${name}\\`.toLowerCase())
  return (pathValue) => {
    const lowered = pathValue.toLowerCase()
    if (segments.some((segment) => lowered.includes(segment))) {
      return true
    }
    const fileName = fileNameOf(pathValue)
    return globs.some((glob) => glob.test(fileName))
  }
}

/**
 * Extracts transferred items from the text of one invocation log.
 *
 * @param logText - Full text of the per-invocation log.
 * @param classifier - Tool-specific line recognizer.
 * @param isExcluded - Compiled exclusion predicate.
 * @returns Items in log order.
 *
 * @pure true
 * @invariant no returned item satisfies isExcluded
 * @complexity O(n) where n = |logText|
 */
export const extractTransferredItems = (
  logText: string,
  classifier: LogLineClassifier,
  isExcluded: (pathValue: string) => boolean
): ReadonlyArray<TransferredItem> =>
  logText
    .split(/\r?\n/)
    .flatMap((line) => Option.toArray(classifier.transferredPath(line)))
    .filter((pathValue) => !isExcluded(pathValue))
    .map((pathValue) => ({ path: pathValue }))

const unicodeLogDecoder = new TextDecoder("utf-16le")

/**
 * Decodes a log written with /UNILOG (UTF-16LE, optional leading BOM).
 *
 * @pure true
 * @invariant a leading U+FEFF is never part of the result
 */
export const decodeUnicodeLog = (bytes: Uint8Array): string => unicodeLogDecoder.decode(bytes)
