import { fileURLToPath } from "node:url"
import { MemorySecretBackend } from "../../../adapters/memory/memory-secret-backend"
import { ConfigResolver } from "../config-resolver"
import { type ConfigFixture, createConfigFixture } from "./config-fixtures"

describe("ConfigResolver end to end", () => {
  describe("uat with the remote store disabled", () => {
    let fixture: ConfigFixture

    beforeEach(async () => {
      fixture = await createConfigFixture({
        "base.yaml": { database: { riskdb: { host: "base-host", port: 5432 } } },
        "uat.yaml": { database: { riskdb: { host: "uat-host" } } },
      })
    })

    afterEach(async () => {
      await fixture.cleanup()
    })

    it("returns the uat host with the base port", async () => {
      const resolver = new ConfigResolver({}, { configDir: fixture.configDir, env: { ENV: "uat" } })

      await expect(resolver.getDbConfig("riskdb")).resolves.toEqual({ host: "uat-host", port: 5432 })
    })
  })

  describe("the sample configuration directory", () => {
    const configDir = fileURLToPath(new URL("../../../../../../config/", import.meta.url))

    const make = (stage: string) =>
      new ConfigResolver(
        {
          secretBackend: new MemorySecretBackend({
            "uat/riskdb-creds": { username: "risk_user", password: "test-secret" },
          }),
        },
        {
          configDir,
          env: { ENV: stage },
          sections: { database: ["riskdb", "snowflakedb"], cloud: ["s3", "aws"] },
        },
      )

    it("resolves every known section in uat", async () => {
      const resolver = make("uat")

      await expect(resolver.validateSections()).resolves.toBeUndefined()
      await expect(resolver.getDbConfig("riskdb")).resolves.toEqual({
        host: "uat-host",
        port: 5432,
        database: "risk",
        pool_size: 5,
        username: "risk_user",
        password: "test-secret",
      })
      await expect(resolver.getDbConfig("snowflakedb")).resolves.toEqual({
        account: "risk-uat",
        warehouse: "RISK_WH",
        role: "RISK_READER",
      })
      await expect(resolver.getCloudConfig("s3")).resolves.toEqual({
        bucket: "risk-artifacts-uat",
        region: "us-east-1",
      })
    })

    it("keeps inline credentials off in dev", async () => {
      const resolver = make("development")

      expect(resolver.getEnvironment()).toBe("dev")
      await expect(resolver.getDbConfig("riskdb")).resolves.toMatchObject({
        host: "localhost",
        use_secrets_manager: false,
      })
      await expect(resolver.getConfig("logging")).resolves.toEqual({ level: "debug" })
    })
  })
})
