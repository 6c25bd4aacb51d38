import { logLevelNames } from "@strata/logger"
import { z } from "zod/mini"

const csvList = z.pipe(
  z.optional(z.string()),
  z.transform((value: string | undefined) =>
    value === undefined
      ? []
      : value
          .split(",")
          .map((item) => item.trim())
          .filter((item) => item.length > 0),
  ),
)

/**
 * Variables that configure the resolver itself. Read from the process
 * environment after the dotenv file has been applied.
 */
export const bootstrapEnvSchema = z.object({
  CONFIG_DIR: z._default(z.string().check(z.minLength(1)), "config"),
  CONFIG_ENV_FILE: z._default(z.string(), ".env"),
  CONFIG_APP_NAME: z._default(z.string().check(z.minLength(1)), "app"),
  CONFIG_ENV_PREFIX: z._default(z.string().check(z.minLength(1)), "CONFIG__"),

  CONFIG_REMOTE_ENABLED: z._default(z.stringbool(), false),
  CONFIG_REMOTE_TIMEOUT_MS: z._default(z.coerce.number().check(z.positive()), 3_000),
  CONFIG_ALLOW_INSECURE_FALLBACK: z._default(z.stringbool(), false),

  CONFIG_REQUIRED_DATABASES: csvList,
  CONFIG_REQUIRED_CLOUD: csvList,

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
})

export type BootstrapEnv = z.infer<typeof bootstrapEnvSchema>
