import type { ConfigDocument, ReadonlyConfigDocument } from "../../ports/document"
import { SECRET_REFERENCE_KEYS } from "../../ports/document"
import { coerceLike } from "../document/coerce"
import { cloneDocument } from "../document/config-value"
import { SecretResolutionError } from "../errors/config-error"

export interface SecretResolver {
  resolve(secretName: string): Promise<Readonly<Record<string, string>>>
}

/**
 * Name of the secret a section refers to, or `undefined` when the section
 * does not use the secrets backend.
 *
 * @throws SecretResolutionError when the flag is set without a name.
 */
export function secretReferenceOf(
  section: ReadonlyConfigDocument,
  sectionPath: string,
): string | undefined {
  const flag = section[SECRET_REFERENCE_KEYS.enabled]
  const enabled = flag === true || (typeof flag === "string" && flag.toLowerCase() === "true")
  if (!enabled) return undefined

  const name = section[SECRET_REFERENCE_KEYS.name]
  if (typeof name !== "string" || name.trim() === "") {
    throw new SecretResolutionError(
      `Section ${sectionPath} sets ${SECRET_REFERENCE_KEYS.enabled} without a ${SECRET_REFERENCE_KEYS.name}`,
      { section: sectionPath },
    )
  }

  return name
}

export type ExpandedSection = Readonly<{
  document: ConfigDocument
  secretName?: string
  fields: readonly string[]
}>

/**
 * Replaces a section's secret reference with the secret's fields.
 *
 * Secret fields win over inline values; a field replacing a number or
 * boolean is coerced to that type. The reference keys are removed.
 */
export async function expandSection(
  section: ReadonlyConfigDocument,
  sectionPath: string,
  secrets: SecretResolver,
): Promise<ExpandedSection> {
  const secretName = secretReferenceOf(section, sectionPath)
  const document = cloneDocument(section)

  if (secretName === undefined) return { document, fields: [] }

  const secret = await secrets.resolve(secretName)

  delete document[SECRET_REFERENCE_KEYS.enabled]
  delete document[SECRET_REFERENCE_KEYS.name]

  for (const [key, value] of Object.entries(secret)) {
    document[key] = coerceLike(section[key], value)
  }

  return { document, secretName, fields: Object.keys(secret) }
}
