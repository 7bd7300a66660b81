import { Effect } from "effect"

import { RuntimeEnv } from "./services/runtime-env.js"
import type { RunOptions } from "./mirror/types.js"

export interface CliArgs extends RunOptions {
  readonly listPath?: string
  readonly destinationRoot?: string
  readonly logDirectory?: string
}

type ValueKey = "listPath" | "destinationRoot" | "logDirectory"
type SwitchKey = keyof RunOptions

const valueFlags = new Map<string, ValueKey>([
  ["--list", "listPath"],
  ["-l", "listPath"],
  ["--dest", "destinationRoot"],
  ["-d", "destinationRoot"],
  ["--log-dir", "logDirectory"]
])

const switchFlags = new Map<string, SwitchKey>([
  ["--simulate", "simulateOnly"],
  ["-s", "simulateOnly"],
  ["--notify", "notifyEnabled"],
  ["-n", "notifyEnabled"],
  ["--alt-credentials", "useAlternateCredentials"],
  ["-a", "useAlternateCredentials"],
  ["--setup-credentials", "setupCredentials"]
])

const defaultArgs: CliArgs = {
  simulateOnly: false,
  notifyEnabled: false,
  useAlternateCredentials: false,
  setupCredentials: false
}

/**
 * Parses command line flags.
 *
 * @param args - Arguments after the script path.
 * @returns Parsed options; unknown flags are ignored.
 *
 * @pure true
 * @invariant a value flag without a following value is ignored
 * @complexity O(n) where n = |args|
 */
export const parseArgs = (args: ReadonlyArray<string>): CliArgs => {
  let result: CliArgs = defaultArgs

  let index = 0
  while (index < args.length) {
    const arg = args[index]
    if (arg === undefined) {
      index += 1
      continue
    }
    const switchKey = switchFlags.get(arg)
    if (switchKey !== undefined) {
      result = { ...result, [switchKey]: true }
      index += 1
      continue
    }
    const valueKey = valueFlags.get(arg)
    if (valueKey === undefined) {
      index += 1
      continue
    }

    const value = args[index + 1]
    if (value !== undefined) {
      result = { ...result, [valueKey]: value }
      index += 2
      continue
    }
    index += 1
  }

  return result
}

// CHANGE: read run options from argv through RuntimeEnv
// WHY: keep process access injectable for tests
// QUOTE(TZ): n/a
// REF: cli-options
// SOURCE: n/a
// FORMAT THEOREM: forall a: parse(a) -> CliArgs
// PURITY: SHELL
// EFFECT: Effect<CliArgs, never, RuntimeEnv>
// INVARIANT: unknown flags are ignored
// COMPLEXITY: O(n)/O(1)
export const readCliArgs = Effect.gen(function*(_) {
  const env = yield* _(RuntimeEnv)
  const argv = yield* _(env.argv)
  return parseArgs(argv.slice(2))
})
