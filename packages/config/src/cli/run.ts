import { readBootstrapSettings } from "../core/bootstrap/bootstrap-settings"
import type { EnvironmentVariables } from "../core/environment/resolve-environment"
import { isConfigError } from "../core/errors/config-error"
import { errorMessages } from "../core/errors/error-chain"
import { createConfigResolver } from "../core/resolver/create-config-resolver"
import type { ConfigAccessor, KnownSections } from "../ports/config-accessor"
import type { ReadonlyConfigValue } from "../ports/document"
import { maskSecrets } from "./mask-secrets"

export type CliIo = {
  out: (line: string) => void
  err: (line: string) => void
}

export type CliDeps = {
  io: CliIo
  env: EnvironmentVariables
  createResolver: (env: EnvironmentVariables) => Promise<ConfigAccessor>
}

export const USAGE = [
  "usage: strata-config <command>",
  "",
  "commands:",
  "  env               print the resolved environment",
  "  show [key]        print the resolved configuration, or one top-level key",
  "  db <name>         print a database section",
  "  cloud <name>      print a cloud service section",
  "  explain <path>    print the source of the value at a dotted path",
  "  validate          check CONFIG_REQUIRED_DATABASES and CONFIG_REQUIRED_CLOUD",
].join("\n")

const defaultDeps = (): CliDeps => ({
  io: {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  },
  env: process.env,
  createResolver: (env) => createConfigResolver({ env }),
})

const printJson = (io: CliIo, value: ReadonlyConfigValue | undefined) => {
  io.out(JSON.stringify(value === undefined ? null : maskSecrets(value), null, 2))
}

const usage = (io: CliIo) => {
  io.err(USAGE)
  return 2
}

const COMMANDS = new Set(["env", "show", "db", "cloud", "explain", "validate"])

const describeSections = (sections: Required<KnownSections>) =>
  (["database", "cloud"] as const)
    .map((kind) => `${kind}: ${sections[kind].length > 0 ? sections[kind].join(", ") : "none"}`)
    .join("; ")

/**
 * Runs one command and returns the exit code (2 for bad usage).
 */
export async function main(argv: readonly string[], deps: CliDeps = defaultDeps()): Promise<number> {
  const { io, env } = deps
  const [command, arg] = argv

  if (command === undefined || !COMMANDS.has(command)) return usage(io)

  try {
    const resolver = await deps.createResolver(env)

    switch (command) {
      case "env":
        io.out(resolver.getEnvironment())
        break

      case "show":
        printJson(io, arg === undefined ? await resolver.getConfig() : await resolver.getConfig(arg))
        break

      case "db":
        if (arg === undefined) return usage(io)
        printJson(io, await resolver.getDbConfig(arg))
        break

      case "cloud":
        if (arg === undefined) return usage(io)
        printJson(io, await resolver.getCloudConfig(arg))
        break

      case "explain": {
        if (arg === undefined) return usage(io)
        const source = await resolver.explain(arg)
        if (source === undefined) {
          io.err(`No value at ${arg}`)
          return 1
        }
        io.out(source)
        break
      }

      case "validate": {
        const { requiredSections } = readBootstrapSettings(env)
        await resolver.validateSections(requiredSections)
        io.out(`All required sections present (${describeSections(requiredSections)})`)
        break
      }
    }

    return 0
  } catch (err) {
    const [message, ...causes] = errorMessages(err)

    io.err(`error [${isConfigError(err) ? err.code : "unknown"}]: ${message}`)
    for (const cause of causes) {
      io.err(`  caused by: ${cause}`)
    }
    return 1
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (err) => {
      console.error(err)
      process.exitCode = 1
    },
  )
}
