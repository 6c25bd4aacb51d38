import { ConfigValidationError } from "../../errors/config-error"
import { readBootstrapSettings } from "../bootstrap-settings"

describe("readBootstrapSettings", () => {
  it("applies defaults", () => {
    expect(readBootstrapSettings({})).toEqual({
      configDir: "config",
      envFile: ".env",
      appName: "app",
      envPrefix: "CONFIG__",
      remote: { enabled: false, timeoutMs: 3000 },
      allowInsecureFallback: false,
      requiredSections: { database: [], cloud: [] },
      logging: { level: "info", prettify: false },
    })
  })

  it("reads and coerces every variable", () => {
    expect(
      readBootstrapSettings({
        CONFIG_DIR: "/etc/risk/config",
        CONFIG_ENV_FILE: ".env.local",
        CONFIG_APP_NAME: "risk-api",
        CONFIG_ENV_PREFIX: "RISK__",
        CONFIG_REMOTE_ENABLED: "true",
        CONFIG_REMOTE_TIMEOUT_MS: "1500",
        CONFIG_ALLOW_INSECURE_FALLBACK: "1",
        CONFIG_REQUIRED_DATABASES: "riskdb, snowflakedb,",
        CONFIG_REQUIRED_CLOUD: "s3",
        LOG_LEVEL: "debug",
        LOG_PRETTY: "false",
      }),
    ).toEqual({
      configDir: "/etc/risk/config",
      envFile: ".env.local",
      appName: "risk-api",
      envPrefix: "RISK__",
      remote: { enabled: true, timeoutMs: 1500 },
      allowInsecureFallback: true,
      requiredSections: { database: ["riskdb", "snowflakedb"], cloud: ["s3"] },
      logging: { level: "debug", prettify: false },
    })
  })

  it("ignores unrelated variables", () => {
    expect(readBootstrapSettings({ HOME: "/home/test" }).appName).toBe("app")
  })

  it("rejects invalid values with a ConfigValidationError", () => {
    let caught: unknown

    try {
      readBootstrapSettings({ CONFIG_REMOTE_TIMEOUT_MS: "-5", LOG_LEVEL: "loud" })
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(ConfigValidationError)
    expect(caught).toMatchObject({
      code: "config_validation_failed",
      context: { issues: ["CONFIG_REMOTE_TIMEOUT_MS", "LOG_LEVEL"] },
    })
    expect(caught instanceof Error && caught.message).toMatch(/^Configuration validation failed:\n/)
  })

  it("rejects a boolean flag that is not a boolean word", () => {
    expect(() => readBootstrapSettings({ CONFIG_REMOTE_ENABLED: "maybe" })).toThrow(
      ConfigValidationError,
    )
  })
})
