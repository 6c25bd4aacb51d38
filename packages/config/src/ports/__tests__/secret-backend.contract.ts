import type { SecretBackend } from "../secret-backend"

export type SecretBackendHarness = {
  name: string

  /**
   * Backend holding `riskdb-creds` = `{ username: "risk_user", password: "test-secret" }`
   * and nothing else.
   */
  make: () => Promise<SecretBackend>
}

export function describeSecretBackendContract(h: SecretBackendHarness) {
  describe(`${h.name} (SecretBackend contract)`, () => {
    let backend: SecretBackend

    beforeEach(async () => {
      backend = await h.make()
    })

    it("has a name", () => {
      expect(typeof backend.name).toBe("string")
      expect(backend.name.length).toBeGreaterThan(0)
    })

    it("returns the secret's fields", async () => {
      await expect(backend.getSecret("riskdb-creds")).resolves.toEqual({
        username: "risk_user",
        password: "test-secret",
      })
    })

    it("rejects for a missing secret", async () => {
      await expect(backend.getSecret("does-not-exist")).rejects.toBeInstanceOf(Error)
    })

    it("returns independent results", async () => {
      const first = await backend.getSecret("riskdb-creds")
      const second = await backend.getSecret("riskdb-creds")

      expect(second).toEqual(first)
      expect(Reflect.set(first, "password", "changed")).toBe(false)
    })
  })
}
