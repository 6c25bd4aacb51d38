function getCause(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Walk the error cause chain and return all values encountered.
 *
 * Stops after `maxDepth` entries or when a cycle is detected.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * Messages of every link in the chain, outermost first.
 */
export function errorMessages(err: unknown): string[] {
  return errorChain(err).map((e) => (e instanceof Error ? e.message : String(e)))
}
