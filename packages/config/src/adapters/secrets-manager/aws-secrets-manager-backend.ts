import { GetSecretValueCommand, type SecretsManagerClient } from "@aws-sdk/client-secrets-manager"
import { parseSecretPayload } from "../../core/secrets/parse-secret-payload"
import type { ResolvedSecret } from "../../ports/document"
import type { GetSecretOptions, SecretBackend } from "../../ports/secret-backend"

export interface AwsSecretsManagerBackendOptions {
  /**
   * Prepended to every secret name, e.g. "risk-platform/uat/".
   */
  prefix?: string
}

export type AwsSecretsManagerBackendDeps = {
  client: SecretsManagerClient
}

/**
 * Reads JSON `SecretString` values from AWS Secrets Manager.
 */
export class AwsSecretsManagerBackend implements SecretBackend {
  readonly name = "secretsmanager"
  private readonly prefix: string

  constructor(
    private readonly deps: AwsSecretsManagerBackendDeps,
    options: AwsSecretsManagerBackendOptions = {},
  ) {
    this.prefix = options.prefix ?? ""
  }

  async getSecret(secretName: string, options: GetSecretOptions = {}): Promise<ResolvedSecret> {
    const secretId = this.resolveId(secretName)
    let payload: string | undefined

    try {
      const response = await this.deps.client.send(
        new GetSecretValueCommand({ SecretId: secretId }),
        { abortSignal: options.signal },
      )
      payload = response.SecretString
    } catch (error: unknown) {
      if (this.isNotFound(error)) {
        throw new Error(`Secret not found: ${secretId}`, { cause: error })
      }
      this.fail(secretId, error)
    }

    if (payload === undefined) {
      throw new Error(`Secret has no string value: ${secretId}`)
    }

    return parseSecretPayload(secretId, payload)
  }

  private resolveId(secretName: string): string {
    return `${this.prefix}${secretName}`
  }

  private isNotFound(error: unknown): boolean {
    return error instanceof Error && error.name === "ResourceNotFoundException"
  }

  private fail(id: string, cause: unknown): never {
    throw new Error(`Failed to get secret: ${id}`, { cause })
  }
}
