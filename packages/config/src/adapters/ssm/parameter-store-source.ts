import { GetParametersByPathCommand, type SSMClient } from "@aws-sdk/client-ssm"
import type { ConfigDocument } from "../../ports/document"
import type { RemoteConfigSource, RemoteLoadRequest } from "../../ports/remote-source"
import { setPath } from "../../core/document/paths"

export type ParameterStoreSourceDeps = {
  client: SSMClient
}

export interface ParameterStoreSourceOptions {
  /**
   * Decrypt SecureString parameters.
   * @default true
   */
  withDecryption?: boolean
}

/**
 * AWS SSM Parameter Store adapter.
 *
 * Reads every parameter under `/{environment}/{appName}/` recursively.
 * `/{env}/{app}/database/riskdb/host` becomes
 * `{ database: { riskdb: { host } } }`.
 */
export class ParameterStoreSource implements RemoteConfigSource {
  readonly name = "ssm"
  readonly enabled = true
  private readonly withDecryption: boolean

  constructor(
    private readonly deps: ParameterStoreSourceDeps,
    options: ParameterStoreSourceOptions = {},
  ) {
    this.withDecryption = options.withDecryption ?? true
  }

  location(request: RemoteLoadRequest): string {
    return `${this.name}:${this.resolvePath(request)}`
  }

  async load(request: RemoteLoadRequest): Promise<ConfigDocument> {
    const path = this.resolvePath(request)
    const document: ConfigDocument = {}

    try {
      let nextToken: string | undefined

      do {
        const response = await this.deps.client.send(
          new GetParametersByPathCommand({
            Path: path,
            Recursive: true,
            WithDecryption: this.withDecryption,
            NextToken: nextToken,
          }),
          { abortSignal: request.signal },
        )

        for (const param of response.Parameters ?? []) {
          if (!param.Name?.startsWith(path) || param.Value === undefined) continue

          const segments = param.Name.slice(path.length).split("/").filter(Boolean)
          setPath(document, segments, param.Value)
        }

        nextToken = response.NextToken
      } while (nextToken)

      return document
    } catch (error) {
      this.fail(path, error)
    }
  }

  private resolvePath(request: RemoteLoadRequest): string {
    const app = request.appName.replace(/^\/+|\/+$/g, "")
    return `/${request.environment}/${app}/`
  }

  private fail(path: string, cause: unknown): never {
    throw new Error(`Failed to load parameters under path: ${path}`, { cause })
  }
}
