import { deepMerge } from "../deep-merge"

describe("deepMerge", () => {
  it("keeps nested keys the override does not mention", () => {
    expect(deepMerge({ a: { x: 1, y: 2 } }, { a: { y: 3 } })).toEqual({ a: { x: 1, y: 3 } })
  })

  it("replaces arrays wholesale", () => {
    expect(deepMerge({ hosts: ["a", "b"] }, { hosts: ["c"] })).toEqual({ hosts: ["c"] })
  })

  it("replaces a mapping with a scalar and a scalar with a mapping", () => {
    expect(deepMerge({ a: { x: 1 }, b: "flat" }, { a: "flat", b: { y: 2 } })).toEqual({
      a: "flat",
      b: { y: 2 },
    })
  })

  it("lets null override a value", () => {
    expect(deepMerge({ a: { x: 1 } }, { a: null })).toEqual({ a: null })
  })

  it("adds keys only present in the override", () => {
    expect(deepMerge({ a: 1 }, { b: { c: true } })).toEqual({ a: 1, b: { c: true } })
  })

  it("does not mutate or share structure with its inputs", () => {
    const base = { database: { riskdb: { host: "base-host", port: 5432 } } }
    const override = { database: { riskdb: { host: "uat-host" } } }

    const merged = deepMerge(base, override)

    expect(base).toEqual({ database: { riskdb: { host: "base-host", port: 5432 } } })
    expect(override).toEqual({ database: { riskdb: { host: "uat-host" } } })
    expect(merged.database).not.toBe(base.database)
  })
})
