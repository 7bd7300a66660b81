export interface RunFiles {
  readonly stamp: string
  readonly runLogPath: string
  readonly transferredItemsPath: string
  readonly invocationLogPath: (index: number) => string
}

const pad = (value: number, width = 2): string => String(value).padStart(width, "0")

/**
 * Formats a run start time as a sortable UTC stamp.
 *
 * @pure true
 * @invariant output matches /^\d{8}-\d{6}$/
 */
export const formatRunStamp = (epochMillis: number): string => {
  const date = new Date(epochMillis)
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-${
    pad(date.getUTCHours())
  }${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
}

// CHANGE: name every artefact of a run after its start stamp
// WHY: files are written once per run and never mutated by later runs
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: invocation log names are unique per 1-based folder index
// COMPLEXITY: O(1)/O(1)
export const planRunFiles = (
  joinPath: (directory: string, fileName: string) => string,
  logDirectory: string,
  stamp: string
): RunFiles => ({
  stamp,
  runLogPath: joinPath(logDirectory, `mirror-${stamp}.log`),
  transferredItemsPath: joinPath(logDirectory, `transferred-${stamp}.txt`),
  invocationLogPath: (index) => joinPath(logDirectory, `mirror-${stamp}-folder-${pad(index, 3)}.log`)
})
