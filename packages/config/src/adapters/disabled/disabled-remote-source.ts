import type { ConfigDocument } from "../../ports/document"
import type { RemoteConfigSource } from "../../ports/remote-source"

/**
 * Stand-in used when the remote store is switched off. Performs no I/O.
 */
export class DisabledRemoteSource implements RemoteConfigSource {
  readonly name = "disabled"
  readonly enabled = false

  location(): string {
    return this.name
  }

  async load(): Promise<ConfigDocument> {
    return {}
  }
}
