import type { Option } from "effect"

import type { RunConfig } from "../../core/copy-args.js"
import type { LogLineClassifier } from "../../core/transfer-log.js"
import type { MailEndpoint } from "../services/notification-transport.js"

export interface RunOptions {
  readonly simulateOnly: boolean
  readonly notifyEnabled: boolean
  readonly useAlternateCredentials: boolean
  readonly setupCredentials: boolean
}

export interface MirrorSettings {
  readonly folderListPath: string
  readonly logDirectory: string
  readonly copyToolPath: string
  readonly run: RunConfig
  readonly useAlternateCredentials: boolean
  readonly remoteShare: Option.Option<string>
  readonly mail: Option.Option<MailEndpoint>
  readonly classifier: LogLineClassifier
}
