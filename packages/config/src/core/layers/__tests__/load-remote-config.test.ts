import type { Logger } from "@strata/logger"
import { mock } from "vitest-mock-extended"
import { DisabledRemoteSource } from "../../../adapters/disabled/disabled-remote-source"
import { StaticRemoteSource } from "../../../adapters/memory/static-remote-source"
import type { RemoteConfigSource, RemoteLoadRequest } from "../../../ports/remote-source"
import { RemoteStoreUnavailableError } from "../../errors/config-error"
import { loadRemoteConfig } from "../load-remote-config"

class HangingSource implements RemoteConfigSource {
  readonly name = "hanging"
  readonly enabled = true

  location(request: RemoteLoadRequest): string {
    return `hanging:/${request.environment}/${request.appName}/`
  }

  load(request: RemoteLoadRequest): Promise<never> {
    return new Promise((_, reject) => {
      request.signal?.addEventListener("abort", () => reject(request.signal?.reason))
    })
  }
}

describe("loadRemoteConfig", () => {
  let logger: ReturnType<typeof mock<Logger>>

  beforeEach(() => {
    logger = mock<Logger>()
  })

  it("returns the remote document", async () => {
    const source = new StaticRemoteSource({ uat: { app: { debug: "false" } } })

    await expect(
      loadRemoteConfig(source, { environment: "uat", appName: "risk-api" }, { logger }),
    ).resolves.toEqual({ app: { debug: "false" } })
  })

  it("does not call a disabled source", async () => {
    const source = new DisabledRemoteSource()
    const loadSpy = vi.spyOn(source, "load")

    await expect(loadRemoteConfig(source, { environment: "uat", appName: "a" })).resolves.toEqual({})
    expect(loadSpy).not.toHaveBeenCalled()
  })

  it("absorbs failures and logs a warning", async () => {
    const source = new StaticRemoteSource()
    vi.spyOn(source, "load").mockRejectedValue(new Error("connect ECONNREFUSED"))

    const result = await loadRemoteConfig(
      source,
      { environment: "prod", appName: "risk-api" },
      { logger },
    )

    expect(result).toEqual({})
    expect(logger.warn).toHaveBeenCalledTimes(1)
    const [message, meta] = logger.warn.mock.calls[0]
    expect(message).toBe(
      "Remote configuration unavailable, continuing with file and environment values",
    )
    expect(meta).toMatchObject({ source: "memory:/prod/risk-api/" })
    expect(meta?.err).toBeInstanceOf(RemoteStoreUnavailableError)
  })

  it("gives up after the timeout", async () => {
    const result = await loadRemoteConfig(
      new HangingSource(),
      { environment: "uat", appName: "risk-api" },
      { logger, timeoutMs: 20 },
    )

    expect(result).toEqual({})
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })
})
