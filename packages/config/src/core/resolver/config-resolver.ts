import { createNullLogger, type Logger } from "@strata/logger"
import { DisabledRemoteSource } from "../../adapters/disabled/disabled-remote-source"
import type { ConfigAccessor, KnownSections } from "../../ports/config-accessor"
import {
  type CloudServiceConfig,
  type ConfigDocument,
  type DatabaseConfig,
  type ReadonlyConfigDocument,
  type ReadonlyConfigValue,
  SECTION_ROOTS,
  type SectionKind,
} from "../../ports/document"
import type { Environment } from "../../ports/environment"
import type { RemoteConfigSource } from "../../ports/remote-source"
import type { SecretBackend } from "../../ports/secret-backend"
import { ResolutionCache } from "../cache/resolution-cache"
import { cloneDocument, deepFreeze, isConfigDocument } from "../document/config-value"
import { type LayeredSnapshot, LayeredDocument } from "../document/layered-document"
import { getPath } from "../document/paths"
import { type EnvironmentVariables, resolveEnvironment } from "../environment/resolve-environment"
import {
  SecretResolutionError,
  type SectionRef,
  UnknownConfigSectionError,
} from "../errors/config-error"
import { DEFAULT_ENV_MAPPINGS, DEFAULT_ENV_PREFIX, type EnvMapping } from "../layers/env-mappings"
import { envOverrides, loadEnvConfig } from "../layers/load-env-config"
import { loadFileLayers } from "../layers/load-file-config"
import { DEFAULT_REMOTE_TIMEOUT_MS, loadRemoteConfig } from "../layers/load-remote-config"
import { expandSection, type SecretResolver } from "../secrets/expand-section"
import { type SecretSession, SecretsBridge } from "../secrets/secrets-bridge"

const SECTION_KINDS: readonly SectionKind[] = ["database", "cloud"]

/**
 * Builds the secret backend once the merged document is known, so it can
 * read its own settings (e.g. `cloud.secrets_manager`) from configuration.
 */
export type SecretBackendFactory = (document: ReadonlyConfigDocument) => SecretBackend

export type ConfigResolverDeps = {
  /**
   * @default DisabledRemoteSource
   */
  remote?: RemoteConfigSource

  /**
   * Required only when a section references a secret.
   */
  secretBackend?: SecretBackend | SecretBackendFactory

  logger?: Logger
}

export type ConfigResolverOptions<TDatabase extends string = string, TCloud extends string = string> = {
  /**
   * Directory holding `base.yaml` and `<environment>.yaml`.
   */
  configDir: string

  /**
   * Base for relative paths.
   * @default process.cwd()
   */
  cwd?: string

  /**
   * Fixed stage. Read from `ENVIRONMENT` / `ENV` when omitted.
   */
  environment?: Environment

  /**
   * @default process.env
   */
  env?: EnvironmentVariables

  /**
   * @default "CONFIG__"
   */
  envPrefix?: string

  envMappings?: readonly EnvMapping[]

  /**
   * Second segment of remote parameter paths.
   * @default "app"
   */
  appName?: string

  /**
   * @default 3000
   */
  remoteTimeoutMs?: number

  /**
   * @default 3000
   */
  secretTimeoutMs?: number

  /**
   * In `dev` only: hand back the unresolved secret reference instead of
   * failing when a secret cannot be resolved.
   */
  allowInsecureFallback?: boolean

  sections?: KnownSections<TDatabase, TCloud>

  /**
   * Further names checked by {@link ConfigResolver.validateSections}, e.g.
   * from `CONFIG_REQUIRED_DATABASES`.
   */
  requiredSections?: KnownSections
}

/**
 * Resolves layered configuration: files, then the process environment,
 * then the remote store, with secret references expanded per section.
 *
 * Construct one per process and pass it to consumers. The merged document
 * and every category are resolved once and cached; concurrent first calls
 * share a single resolution.
 */
export class ConfigResolver<TDatabase extends string = string, TCloud extends string = string>
  implements ConfigAccessor<TDatabase, TCloud>
{
  private readonly environment: Environment
  private readonly env: EnvironmentVariables
  private readonly logger: Logger
  private readonly remote: RemoteConfigSource
  private readonly layers = new ResolutionCache<LayeredSnapshot>()
  private readonly categories = new ResolutionCache<ReadonlyConfigDocument>()
  private readonly secretProvenance = new Map<string, string>()
  private bridge: SecretsBridge | undefined

  constructor(
    private readonly deps: ConfigResolverDeps,
    private readonly options: ConfigResolverOptions<TDatabase, TCloud>,
  ) {
    const baseLogger = deps.logger ?? createNullLogger()

    this.env = options.env ?? process.env
    this.environment = options.environment ?? resolveEnvironment(this.env, baseLogger)
    this.remote = deps.remote ?? new DisabledRemoteSource()
    this.logger = baseLogger.child({
      module: "config-resolver",
      env: this.environment,
      app: this.appName,
    })
  }

  private get appName(): string {
    return this.options.appName ?? "app"
  }

  getEnvironment(): Environment {
    return this.environment
  }

  async getConfig(): Promise<ReadonlyConfigDocument>
  async getConfig(key: string): Promise<ReadonlyConfigValue | undefined>
  async getConfig(key?: string): Promise<ReadonlyConfigDocument | ReadonlyConfigValue | undefined> {
    const config = await this.categories.get("general", () => this.resolveGeneral())

    if (key === undefined) return config
    return Object.hasOwn(config, key) ? config[key] : undefined
  }

  async getDbConfig(name: TDatabase): Promise<DatabaseConfig> {
    return this.categories.get(`database:${name}`, () => this.resolveSection("database", name))
  }

  async getCloudConfig(name: TCloud): Promise<CloudServiceConfig> {
    return this.categories.get(`cloud:${name}`, () => this.resolveSection("cloud", name))
  }

  async sectionNames(kind: SectionKind): Promise<string[]> {
    const { document } = await this.snapshot()
    const root = getPath(document, [SECTION_ROOTS[kind]])

    return isConfigDocument(root)
      ? Object.keys(root).filter((name) => isConfigDocument(root[name]))
      : []
  }

  /**
   * Secret fields are attributed once the section holding them has been
   * resolved.
   */
  async explain(path: string): Promise<string | undefined> {
    const { provenance } = await this.snapshot()

    return this.secretProvenance.get(path) ?? provenance.get(path)
  }

  async sourcesUsed(): Promise<string[]> {
    const { provenance } = await this.snapshot()

    return [...new Set([...provenance.values(), ...this.secretProvenance.values()])]
  }

  /**
   * Checks that every known section exists.
   *
   * @throws UnknownConfigSectionError listing every missing name.
   */
  async validateSections(sections: KnownSections = this.knownSections()): Promise<void> {
    const missing: SectionRef[] = []

    for (const kind of SECTION_KINDS) {
      const present = new Set(await this.sectionNames(kind))

      for (const name of sections[kind] ?? []) {
        if (!present.has(name)) missing.push({ kind, name })
      }
    }

    if (missing.length > 0) throw new UnknownConfigSectionError(missing)

    this.logger.debug("Known configuration sections present", {
      database: sections.database?.length ?? 0,
      cloud: sections.cloud?.length ?? 0,
    })
  }

  private knownSections(): KnownSections {
    const { sections = {}, requiredSections = {} } = this.options
    const union = (a: readonly string[] = [], b: readonly string[] = []) => [...new Set([...a, ...b])]

    return {
      database: union(sections.database, requiredSections.database),
      cloud: union(sections.cloud, requiredSections.cloud),
    }
  }

  private snapshot(): Promise<LayeredSnapshot> {
    return this.layers.get("document", () => this.buildDocument())
  }

  private async buildDocument(): Promise<LayeredSnapshot> {
    const started = Date.now()
    const layered = new LayeredDocument()
    const { cwd } = this.options

    const files = await loadFileLayers({
      environment: this.environment,
      configDir: this.options.configDir,
      cwd,
    })
    for (const layer of files) {
      layered.merge(layer.document, layer.source)
    }

    const mappings = this.options.envMappings ?? DEFAULT_ENV_MAPPINGS
    const prefix = this.options.envPrefix ?? DEFAULT_ENV_PREFIX
    const view = await loadEnvConfig({
      env: this.env,
      mappings,
      prefix,
      logger: this.logger,
    })
    const overrides = envOverrides(view, mappings, prefix)
    for (const override of overrides) {
      layered.set(override.path, override.value, `env:${override.variable}`)
    }

    const request = { environment: this.environment, appName: this.appName }
    const remote = await loadRemoteConfig(this.remote, request, {
      timeoutMs: this.options.remoteTimeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS,
      logger: this.logger,
    })
    layered.overlay(remote, `remote:${this.remote.location(request)}`)

    this.logger.debug("Configuration layers loaded", {
      files: files.map((f) => f.source),
      envOverrides: overrides.length,
      remoteKeys: Object.keys(remote).length,
      durationMs: Date.now() - started,
    })

    return layered.snapshot()
  }

  private async resolveGeneral(): Promise<ReadonlyConfigDocument> {
    const { document } = await this.snapshot()
    const config = cloneDocument(document)
    const session = this.openSession(document)

    for (const kind of SECTION_KINDS) {
      const root = config[SECTION_ROOTS[kind]]
      if (!isConfigDocument(root)) continue

      await Promise.all(
        Object.entries(root).map(async ([name, section]) => {
          if (!isConfigDocument(section)) return
          root[name] = await this.expand(kind, name, section, session)
        }),
      )
    }

    this.logger.debug("Configuration resolved", { section: "general" })
    return deepFreeze(config)
  }

  private async resolveSection(kind: SectionKind, name: string): Promise<ReadonlyConfigDocument> {
    const { document } = await this.snapshot()
    const section = getPath(document, [SECTION_ROOTS[kind], name])

    if (!isConfigDocument(section)) {
      throw new UnknownConfigSectionError([{ kind, name }], await this.sectionNames(kind))
    }

    const resolved = await this.expand(kind, name, section, this.openSession(document))

    this.logger.debug("Configuration section resolved", { section: `${kind}.${name}` })
    return deepFreeze(resolved)
  }

  private async expand(
    kind: SectionKind,
    name: string,
    section: ReadonlyConfigDocument,
    secrets: SecretResolver,
  ): Promise<ConfigDocument> {
    const sectionPath = `${SECTION_ROOTS[kind]}.${name}`

    try {
      const expanded = await expandSection(section, sectionPath, secrets)

      if (expanded.secretName !== undefined) {
        for (const field of expanded.fields) {
          this.secretProvenance.set(`${sectionPath}.${field}`, `secret:${expanded.secretName}`)
        }
      }

      return expanded.document
    } catch (err) {
      if (!(err instanceof SecretResolutionError) || !this.insecureFallbackAllowed()) throw err

      this.logger.warn("Secret unresolved, returning the reference unexpanded", {
        section: sectionPath,
        err,
      })
      return cloneDocument(section)
    }
  }

  private insecureFallbackAllowed(): boolean {
    return this.environment === "dev" && this.options.allowInsecureFallback === true
  }

  /**
   * One secrets session per resolution. The backend is only built when a
   * section actually references a secret.
   */
  private openSession(document: ReadonlyConfigDocument): SecretResolver {
    let session: SecretSession | undefined

    return {
      resolve: (secretName) => {
        session ??= this.secretsBridge(document).session()
        return session.resolve(secretName)
      },
    }
  }

  private secretsBridge(document: ReadonlyConfigDocument): SecretsBridge {
    if (this.bridge) return this.bridge

    const { secretBackend } = this.deps
    if (secretBackend === undefined) {
      throw new SecretResolutionError("No secrets backend configured")
    }

    const backend = typeof secretBackend === "function" ? secretBackend(document) : secretBackend
    this.bridge = new SecretsBridge(
      { backend, logger: this.logger },
      { timeoutMs: this.options.secretTimeoutMs },
    )
    return this.bridge
  }
}
