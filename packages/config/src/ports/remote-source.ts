import type { ConfigDocument } from "./document"
import type { Environment } from "./environment"

export type RemoteLoadRequest = {
  environment: Environment
  appName: string

  /**
   * Aborted when the caller's time budget runs out.
   */
  signal?: AbortSignal
}

/**
 * Optional, highest-precedence configuration backend.
 *
 * Implementations throw on any failure; callers decide whether a failure is
 * fatal. Parameters live under `/{environment}/{appName}/{category}/{key}`.
 */
export interface RemoteConfigSource {
  readonly name: string

  /**
   * `false` for sources that never perform I/O.
   */
  readonly enabled: boolean

  /**
   * Where a request reads from, e.g. "ssm:/uat/risk-api/". Used for provenance.
   */
  location(request: RemoteLoadRequest): string

  load(request: RemoteLoadRequest): Promise<ConfigDocument>
}
