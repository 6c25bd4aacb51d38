import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

const discard = (): void => {}

/**
 * Logger that drops every entry, children included. Used wherever a
 * resolver, loader or source is built without a logger.
 */
export function createNullLogger<TContext extends LogContext = LogContext>(): Logger<TContext> {
  return {
    trace: discard,
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
    fatal: discard,
    child: <U extends LogContextPatch>(_context: U) => createNullLogger<TContext & U>(),
  }
}
