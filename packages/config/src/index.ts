export { DisabledRemoteSource } from "./adapters/disabled/disabled-remote-source"
export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { MemorySecretBackend } from "./adapters/memory/memory-secret-backend"
export { StaticRemoteSource, type StaticRemoteDocuments } from "./adapters/memory/static-remote-source"
export {
  AwsSecretsManagerBackend,
  type AwsSecretsManagerBackendOptions,
} from "./adapters/secrets-manager/aws-secrets-manager-backend"
export {
  ParameterStoreSource,
  type ParameterStoreSourceOptions,
} from "./adapters/ssm/parameter-store-source"
export { YamlDocumentError, YamlSource, type YamlSourceOptions } from "./adapters/yaml/yaml-source"
export { MASK, maskSecrets } from "./cli/mask-secrets"
export {
  type AwsClientConfig,
  type AwsCredentials,
  DEFAULT_AWS_REGION,
  getAwsClientConfig,
  getAwsCredentials,
  getAwsCredentialsFromConfig,
  setupAwsEnvironment,
  toAwsClientConfig,
} from "./core/aws/aws-credentials"
export {
  type BootstrapSettings,
  mapEnvToSettings,
  readBootstrapSettings,
} from "./core/bootstrap/bootstrap-settings"
export { type BootstrapEnv, bootstrapEnvSchema } from "./core/bootstrap/schema"
export { deepMerge } from "./core/document/deep-merge"
export { type ConfigPath, formatPath, getPath, parsePath } from "./core/document/paths"
export {
  type EnvironmentVariables,
  isEnvironment,
  normalizeEnvironment,
  resolveEnvironment,
} from "./core/environment/resolve-environment"
export {
  ConfigError,
  ConfigLoadError,
  ConfigValidationError,
  isConfigError,
  RemoteStoreUnavailableError,
  SecretResolutionError,
  type SectionRef,
  serializeError,
  UnknownConfigSectionError,
} from "./core/errors/config-error"
export { errorChain, errorMessages } from "./core/errors/error-chain"
export { DEFAULT_ENV_MAPPINGS, DEFAULT_ENV_PREFIX, type EnvMapping } from "./core/layers/env-mappings"
export { type EnvConfigOptions, envOverrides, loadEnvConfig } from "./core/layers/load-env-config"
export { type FileConfigOptions, loadFileConfig } from "./core/layers/load-file-config"
export { loadRemoteConfig } from "./core/layers/load-remote-config"
export {
  ConfigResolver,
  type ConfigResolverDeps,
  type ConfigResolverOptions,
  type SecretBackendFactory,
} from "./core/resolver/config-resolver"
export {
  type BootstrapOverrides,
  type CreateConfigResolverOptions,
  createConfigResolver,
} from "./core/resolver/create-config-resolver"
export { SecretsBridge, type SecretSession } from "./core/secrets/secrets-bridge"
export type { ConfigAccessor, KnownSections } from "./ports/config-accessor"
export type {
  CloudServiceConfig,
  ConfigDocument,
  ConfigScalar,
  ConfigValue,
  DatabaseConfig,
  ReadonlyConfigDocument,
  ReadonlyConfigValue,
  ResolvedSecret,
  SectionKind,
} from "./ports/document"
export { DEFAULT_ENVIRONMENT, type Environment, environments } from "./ports/environment"
export type { RemoteConfigSource, RemoteLoadRequest } from "./ports/remote-source"
export type { GetSecretOptions, SecretBackend } from "./ports/secret-backend"
export type { ConfigSource } from "./ports/source"
