export interface FolderEntry {
  readonly sourcePath: string
}

const isComment = (line: string): boolean => line.startsWith("#")

const isUsable = (line: string): boolean => line.length > 0 && !isComment(line)

/**
 * Parses the raw folder list into ordered entries.
 *
 * @param content - Raw text of the folder list file.
 * @returns Entries in input order, one per usable line.
 *
 * @pure true
 * @invariant every entry equals a trimmed input line that is non-empty and not a comment
 * @complexity O(n) where n = |content|
 */
// CHANGE: keep folder list parsing in CORE so whitespace handling is testable without IO
// WHY: paths with embedded spaces must survive exactly as written in the list
// QUOTE(TZ): n/a
// REF: folder-list-format
// SOURCE: n/a
// FORMAT THEOREM: forall l in lines: usable(trim(l)) <-> exists e: e.sourcePath = trim(l)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: order of entries equals order of lines
// COMPLEXITY: O(n)/O(n)
export const parseFolderList = (content: string): ReadonlyArray<FolderEntry> =>
  content
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => isUsable(line))
    .map((sourcePath) => ({ sourcePath }))
