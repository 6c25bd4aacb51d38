import { createNullLogger, type Logger } from "@strata/logger"
import type { ConfigDocument } from "../../ports/document"
import type { RemoteConfigSource, RemoteLoadRequest } from "../../ports/remote-source"
import { RemoteStoreUnavailableError } from "../errors/config-error"

export const DEFAULT_REMOTE_TIMEOUT_MS = 3_000

export type RemoteConfigOptions = {
  timeoutMs?: number
  logger?: Logger
}

/**
 * Loads the remote document, bounded by a timeout.
 *
 * Never rejects: a disabled source yields `{}` without I/O, and any failure
 * is logged as a warning and yields `{}`.
 */
export async function loadRemoteConfig(
  source: RemoteConfigSource,
  request: Omit<RemoteLoadRequest, "signal">,
  options: RemoteConfigOptions = {},
): Promise<ConfigDocument> {
  if (!source.enabled) return {}

  const logger = options.logger ?? createNullLogger()
  const timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS
  const location = source.location(request)
  const started = Date.now()

  try {
    const document = await source.load({ ...request, signal: AbortSignal.timeout(timeoutMs) })

    logger.debug("Remote configuration loaded", {
      source: location,
      keys: Object.keys(document).length,
      durationMs: Date.now() - started,
    })

    return document
  } catch (err) {
    const error = new RemoteStoreUnavailableError(location, err)

    logger.warn("Remote configuration unavailable, continuing with file and environment values", {
      source: location,
      durationMs: Date.now() - started,
      err: error,
    })

    return {}
  }
}
