import type { Exclusions } from "./transfer-log.js"

export interface RunConfig extends Exclusions {
  readonly simulateOnly: boolean
  readonly notifyEnabled: boolean
  readonly destinationRoot: string
  readonly concurrencyLevel: number
}

/**
 * Builds the robocopy argument array for one folder.
 *
 * @param sourcePath - Folder to mirror, passed through untouched.
 * @param destPath - Mapped destination folder.
 * @param config - Run configuration.
 * @param invocationLogPath - Per-invocation log the tool appends to.
 * @returns Literal arguments; never joined into a shell string.
 *
 * @pure true
 * @invariant "/L" is present iff config.simulateOnly
 * @complexity O(p + d)
 */
// CHANGE: pass one argv element per value instead of a quoted command line
// WHY: source paths with spaces must reach the tool byte-for-byte
// QUOTE(TZ): n/a
// REF: robocopy-arguments
// SOURCE: n/a
// FORMAT THEOREM: forall s, d: args(s, d)[0] = s & args(s, d)[1] = d
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: each file pattern and dir name gets its own /XF or /XD flag
// COMPLEXITY: O(p + d)/O(p + d)
export const buildCopyArgs = (
  sourcePath: string,
  destPath: string,
  config: RunConfig,
  invocationLogPath: string
): ReadonlyArray<string> => [
  sourcePath,
  destPath,
  `/MT:${config.concurrencyLevel}`,
  "/MIR",
  "/V",
  "/TS",
  "/FP",
  "/BYTES",
  "/NP",
  `/UNILOG+:${invocationLogPath}`,
  ...config.excludeFilePatterns.flatMap((pattern) => ["/XF", pattern]),
  ...config.excludeDirNames.flatMap((name) => ["/XD", name]),
  ...(config.simulateOnly ? ["/L"] : [])
]
