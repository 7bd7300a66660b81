export interface IoError {
  readonly _tag: "IoError"
  readonly path: string
  readonly reason: string
}

export interface ConfigError {
  readonly _tag: "ConfigError"
  readonly reason: string
}

export interface MountError {
  readonly _tag: "MountError"
  readonly share: string
  readonly reason: string
}

export interface DirectoryCreateError {
  readonly _tag: "DirectoryCreateError"
  readonly path: string
  readonly reason: string
}

export interface CopyToolFailure {
  readonly _tag: "CopyToolFailure"
  readonly sourcePath: string
  readonly exitCode: number
}

export interface CopyLaunchError {
  readonly _tag: "CopyLaunchError"
  readonly tool: string
  readonly reason: string
}

export type CredentialTarget = "share" | "notify"

export interface CredentialMissing {
  readonly _tag: "CredentialMissing"
  readonly target: CredentialTarget
  readonly reason: string
}

export interface NotifyError {
  readonly _tag: "NotifyError"
  readonly reason: string
}

export type FatalRunError = ConfigError | MountError | CredentialMissing

export type FolderFailure = DirectoryCreateError | CopyToolFailure | CopyLaunchError | IoError

export const ioError = (pathValue: string, reason: string): IoError => ({
  _tag: "IoError",
  path: pathValue,
  reason
})

export const configError = (reason: string): ConfigError => ({
  _tag: "ConfigError",
  reason
})

export const mountError = (share: string, reason: string): MountError => ({
  _tag: "MountError",
  share,
  reason
})

export const directoryCreateError = (pathValue: string, reason: string): DirectoryCreateError => ({
  _tag: "DirectoryCreateError",
  path: pathValue,
  reason
})

export const copyToolFailure = (sourcePath: string, exitCode: number): CopyToolFailure => ({
  _tag: "CopyToolFailure",
  sourcePath,
  exitCode
})

export const copyLaunchError = (tool: string, reason: string): CopyLaunchError => ({
  _tag: "CopyLaunchError",
  tool,
  reason
})

export const credentialMissing = (target: CredentialTarget, reason: string): CredentialMissing => ({
  _tag: "CredentialMissing",
  target,
  reason
})

export const notifyError = (reason: string): NotifyError => ({
  _tag: "NotifyError",
  reason
})

/**
 * Renders any domain error as a single human-readable line.
 *
 * @pure true
 * @invariant output starts with the error tag
 */
// CHANGE: one formatter for console, run log and notification texts
// WHY: fatal and per-folder errors must read the same everywhere they are reported
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: describeError(e).startsWith(e._tag)
// COMPLEXITY: O(1)/O(1)
export const describeError = (
  error: FatalRunError | FolderFailure | NotifyError
): string => {
  switch (error._tag) {
    case "IoError":
      return `IoError: ${error.reason} (${error.path})`
    case "ConfigError":
      return `ConfigError: ${error.reason}`
    case "MountError":
      return `MountError: ${error.reason} (${error.share})`
    case "DirectoryCreateError":
      return `DirectoryCreateError: ${error.reason} (${error.path})`
    case "CopyToolFailure":
      return `CopyToolFailure: exit code ${error.exitCode} for ${error.sourcePath}`
    case "CopyLaunchError":
      return `CopyLaunchError: ${error.reason} (${error.tool})`
    case "CredentialMissing":
      return `CredentialMissing: ${error.reason} (${error.target})`
    case "NotifyError":
      return `NotifyError: ${error.reason}`
  }
}
