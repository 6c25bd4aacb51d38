import { cloneDocument } from "../../core/document/config-value"
import type { ConfigDocument } from "../../ports/document"
import type { Environment } from "../../ports/environment"
import type { RemoteConfigSource, RemoteLoadRequest } from "../../ports/remote-source"

export type StaticRemoteDocuments = Partial<Record<Environment, ConfigDocument>>

/**
 * In-memory remote store keyed by environment. Used for local development
 * and tests.
 */
export class StaticRemoteSource implements RemoteConfigSource {
  readonly name = "memory"
  readonly enabled = true
  private calls = 0

  constructor(private readonly documents: StaticRemoteDocuments = {}) {}

  get loadCount(): number {
    return this.calls
  }

  location(request: RemoteLoadRequest): string {
    return `${this.name}:/${request.environment}/${request.appName}/`
  }

  async load(request: RemoteLoadRequest): Promise<ConfigDocument> {
    this.calls++
    request.signal?.throwIfAborted()

    return cloneDocument(this.documents[request.environment] ?? {})
  }
}
