import { createNullLogger, type Logger } from "@strata/logger"
import { mock } from "vitest-mock-extended"
import { MemorySecretBackend } from "../../../adapters/memory/memory-secret-backend"
import type { ReadonlyConfigDocument } from "../../../ports/document"
import type { SecretBackend } from "../../../ports/secret-backend"
import { SecretResolutionError } from "../../errors/config-error"
import { ConfigResolver, type SecretBackendFactory } from "../config-resolver"
import { type ConfigFixture, createConfigFixture } from "./config-fixtures"

describe("ConfigResolver secrets", () => {
  let fixture: ConfigFixture
  let backend: MemorySecretBackend

  beforeEach(async () => {
    fixture = await createConfigFixture({
      "base.yaml": {
        database: {
          riskdb: {
            host: "risk-host",
            port: 5432,
            use_secrets_manager: true,
            secret_name: "riskdb-creds",
          },
          reportingdb: {
            host: "reporting-host",
            use_secrets_manager: "true",
            secret_name: "riskdb-creds",
          },
        },
        cloud: {
          s3: { bucket: "risk-base" },
          secrets_manager: { region: "eu-west-1" },
        },
      },
    })
    backend = new MemorySecretBackend({
      "riskdb-creds": { username: "risk_user", password: "test-secret", port: "6432" },
    })
  })

  afterEach(async () => {
    await fixture.cleanup()
  })

  type MakeOptions = {
    env?: Record<string, string | undefined>
    secretBackend?: SecretBackend | SecretBackendFactory
    logger?: Logger
    allowInsecureFallback?: boolean
  }

  const make = (options: MakeOptions = {}) =>
    new ConfigResolver(
      { secretBackend: options.secretBackend, logger: options.logger ?? createNullLogger() },
      {
        configDir: fixture.configDir,
        env: options.env ?? { ENV: "uat" },
        allowInsecureFallback: options.allowInsecureFallback,
      },
    )

  const warningLogger = () => {
    const logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
    return logger
  }

  it("replaces the reference with the secret's fields", async () => {
    const resolver = make({ secretBackend: backend })

    await expect(resolver.getDbConfig("riskdb")).resolves.toEqual({
      host: "risk-host",
      port: 6432,
      username: "risk_user",
      password: "test-secret",
    })
  })

  it("accepts the flag as a string", async () => {
    const resolver = make({ secretBackend: backend })

    await expect(resolver.getDbConfig("reportingdb")).resolves.toEqual({
      host: "reporting-host",
      username: "risk_user",
      password: "test-secret",
      port: "6432",
    })
  })

  it("attributes secret fields to the secret", async () => {
    const resolver = make({ secretBackend: backend })

    await resolver.getDbConfig("riskdb")

    await expect(resolver.explain("database.riskdb.password")).resolves.toBe("secret:riskdb-creds")
    await expect(resolver.explain("database.riskdb.port")).resolves.toBe("secret:riskdb-creds")
    await expect(resolver.explain("database.riskdb.host")).resolves.toBe("file:base.yaml")
    await expect(resolver.sourcesUsed()).resolves.toEqual(["file:base.yaml", "secret:riskdb-creds"])
  })

  it("looks up a secret shared by several sections once per resolution", async () => {
    const resolver = make({ secretBackend: backend })

    const config = await resolver.getConfig()

    expect(config.database).toMatchObject({
      riskdb: { username: "risk_user" },
      reportingdb: { username: "risk_user" },
    })
    expect(backend.lookupCount("riskdb-creds")).toBe(1)
  })

  it("does not need a backend for sections without a reference", async () => {
    const resolver = make()

    await expect(resolver.getCloudConfig("s3")).resolves.toEqual({ bucket: "risk-base" })
  })

  it("fails when a reference has no backend to resolve it", async () => {
    const resolver = make()

    await expect(resolver.getDbConfig("riskdb")).rejects.toThrow("No secrets backend configured")
  })

  it("fails when the flag is set without a name", async () => {
    await fixture.write("uat.yaml", { database: { brokendb: { use_secrets_manager: true } } })
    const resolver = make({ secretBackend: backend })

    await expect(resolver.getDbConfig("brokendb")).rejects.toThrow(
      "Section database.brokendb sets use_secrets_manager without a secret_name",
    )
  })

  it("fails the general view when any secret cannot be resolved", async () => {
    backend.delete("riskdb-creds")
    const resolver = make({ secretBackend: backend })

    const err = await resolver.getConfig().catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SecretResolutionError)
    expect(err).toMatchObject({
      message: "Failed to resolve secret 'riskdb-creds' from memory",
      secretName: "riskdb-creds",
    })
  })

  it("retries a failed secret on the next call", async () => {
    backend.delete("riskdb-creds")
    const resolver = make({ secretBackend: backend })
    await expect(resolver.getDbConfig("riskdb")).rejects.toBeInstanceOf(SecretResolutionError)

    backend.set("riskdb-creds", { password: "test-secret" })

    await expect(resolver.getDbConfig("riskdb")).resolves.toMatchObject({ password: "test-secret" })
  })

  describe("insecure fallback", () => {
    beforeEach(() => {
      backend.delete("riskdb-creds")
    })

    it("returns the reference unexpanded in dev when allowed", async () => {
      const logger = warningLogger()
      const resolver = make({
        env: { ENV: "dev" },
        secretBackend: backend,
        logger,
        allowInsecureFallback: true,
      })

      await expect(resolver.getDbConfig("riskdb")).resolves.toEqual({
        host: "risk-host",
        port: 5432,
        use_secrets_manager: true,
        secret_name: "riskdb-creds",
      })
      expect(logger.warn).toHaveBeenCalledWith(
        "Secret unresolved, returning the reference unexpanded",
        expect.objectContaining({ section: "database.riskdb" }),
      )
    })

    it("is off in dev unless allowed", async () => {
      const resolver = make({ env: { ENV: "dev" }, secretBackend: backend })

      await expect(resolver.getDbConfig("riskdb")).rejects.toBeInstanceOf(SecretResolutionError)
    })

    it.each(["uat", "prod"])("never applies in %s", async (stage) => {
      const resolver = make({
        env: { ENV: stage },
        secretBackend: backend,
        allowInsecureFallback: true,
      })

      await expect(resolver.getDbConfig("riskdb")).rejects.toBeInstanceOf(SecretResolutionError)
    })
  })

  describe("backend factory", () => {
    it("builds the backend from the merged document once", async () => {
      const factory = vi.fn((_document: ReadonlyConfigDocument): SecretBackend => backend)
      const resolver = make({ secretBackend: factory })

      await resolver.getDbConfig("riskdb")
      await resolver.getDbConfig("reportingdb")

      expect(factory).toHaveBeenCalledTimes(1)
      expect(factory.mock.calls[0][0]).toMatchObject({
        cloud: { secrets_manager: { region: "eu-west-1" } },
      })
    })

    it("is not called when nothing references a secret", async () => {
      const factory = vi.fn((_document: ReadonlyConfigDocument): SecretBackend => backend)
      const resolver = make({ secretBackend: factory })

      await resolver.getCloudConfig("s3")

      expect(factory).not.toHaveBeenCalled()
    })
  })
})
