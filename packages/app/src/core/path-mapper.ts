const volumePrefix = /^[A-Za-z]:\\(.*)$/s

const isSeparator = (char: string | undefined): boolean => char === "\\" || char === "/"

const stripLeadingSeparators = (value: string): string => {
  let start = 0
  while (start < value.length && isSeparator(value[start])) {
    start += 1
  }
  return value.slice(start)
}

const stripTrailingSeparators = (value: string): string => {
  let end = value.length
  while (end > 1 && isSeparator(value[end - 1])) {
    end -= 1
  }
  return value.slice(0, end)
}

/**
 * Joins a relative remainder onto a destination root with the given separator.
 *
 * @pure true
 * @invariant no ".." or "." segment is resolved; exactly one separator sits between root and rest
 */
export const joinUnder = (root: string, rest: string, separator = "\\"): string => {
  const base = stripTrailingSeparators(root)
  const relative = stripLeadingSeparators(rest)
  if (relative.length === 0) {
    return base
  }
  return isSeparator(base.at(-1)) ? `${base}${relative}` : `${base}${separator}${relative}`
}

/**
 * Derives the destination folder that mirrors a source folder.
 *
 * @param sourcePath - Absolute source path as written in the folder list.
 * @param destRoot - Root of the destination tree.
 * @returns destRoot joined with the source path below its volume root.
 *
 * @pure true
 * @invariant the drive letter of the source never appears in the result
 * @complexity O(n) where n = |sourcePath|
 */
// CHANGE: mirror the tree below the volume root independent of the source drive
// WHY: D:\Music and E:\Music must land in the same destination subtree layout
// QUOTE(TZ): n/a
// REF: path-mapping
// SOURCE: n/a
// FORMAT THEOREM: forall s = "X:\\r": map(s, d) = join(d, r)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: callers supply resolved paths; segments are copied verbatim
// COMPLEXITY: O(n)/O(n)
export const mapDestination = (sourcePath: string, destRoot: string): string => {
  const volume = volumePrefix.exec(sourcePath)
  const rest = volume === null ? sourcePath : (volume[1] ?? "")
  return joinUnder(destRoot, rest)
}
