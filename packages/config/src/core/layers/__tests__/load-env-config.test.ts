import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { envOverrides, loadEnvConfig } from "../load-env-config"

describe("loadEnvConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "env-config-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("loads dotenv values without overwriting variables already set", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "AWS_REGION=eu-west-1\nAWS_PROFILE=sandbox\nENV=uat\n",
    )
    const env: Record<string, string | undefined> = { AWS_REGION: "us-west-2" }

    const view = await loadEnvConfig({ envFile: ".env", cwd, env })

    expect(env).toEqual({ AWS_REGION: "us-west-2", AWS_PROFILE: "sandbox", ENV: "uat" })
    expect(view).toEqual({ AWS_REGION: "us-west-2", AWS_PROFILE: "sandbox" })
  })

  it("tolerates a missing dotenv file", async () => {
    const env = { JWT_SECRET_KEY: "test-secret" }

    await expect(loadEnvConfig({ envFile: ".env", cwd, env })).resolves.toEqual({
      JWT_SECRET_KEY: "test-secret",
    })
  })

  it("includes prefixed nested overrides and skips unrelated variables", async () => {
    const env = {
      CONFIG__DATABASE__RISKDB__PORT: "5433",
      CONFIG_DIR: "config",
      HOME: "/home/test",
    }

    await expect(loadEnvConfig({ env })).resolves.toEqual({
      CONFIG__DATABASE__RISKDB__PORT: "5433",
    })
  })

  it("accepts a custom mapping table and prefix", async () => {
    const env = { RISK_DB_HOST: "db.internal", RISK__APP__DEBUG: "true", AWS_REGION: "eu-west-1" }

    await expect(
      loadEnvConfig({
        env,
        mappings: [{ variable: "RISK_DB_HOST", path: "database.riskdb.host" }],
        prefix: "RISK__",
      }),
    ).resolves.toEqual({ RISK_DB_HOST: "db.internal", RISK__APP__DEBUG: "true" })
  })
})

describe("envOverrides", () => {
  it("orders table rows before nested overrides, so AWS_REGION beats AWS_DEFAULT_REGION", () => {
    const overrides = envOverrides({
      CONFIG__LOGGING__LEVEL: "warn",
      AWS_REGION: "eu-west-1",
      AWS_DEFAULT_REGION: "us-east-1",
      LOG_LEVEL: "debug",
    })

    expect(overrides).toEqual([
      { variable: "AWS_DEFAULT_REGION", path: ["cloud", "aws", "region"], value: "us-east-1" },
      { variable: "AWS_REGION", path: ["cloud", "aws", "region"], value: "eu-west-1" },
      { variable: "LOG_LEVEL", path: ["logging", "level"], value: "debug" },
      { variable: "CONFIG__LOGGING__LEVEL", path: ["logging", "level"], value: "warn" },
    ])
  })

  it("sorts nested overrides by variable name", () => {
    const overrides = envOverrides({ CONFIG__B: "2", CONFIG__A: "1" })

    expect(overrides.map((o) => o.variable)).toEqual(["CONFIG__A", "CONFIG__B"])
  })
})
