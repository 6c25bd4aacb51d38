import { ConfigValidationError } from "../../errors/config-error"
import { parseSecretPayload } from "../parse-secret-payload"

describe("parseSecretPayload", () => {
  it("returns string fields and stringifies numbers and booleans", () => {
    expect(
      parseSecretPayload("riskdb-creds", '{"username":"u","password":"p","port":5433,"ssl":true}'),
    ).toEqual({ username: "u", password: "p", port: "5433", ssl: "true" })
  })

  it("drops reserved keys", () => {
    expect(parseSecretPayload("riskdb-creds", '{"__proto__":"x","username":"u"}')).toEqual({
      username: "u",
    })
  })

  it("rejects invalid JSON", () => {
    expect(() => parseSecretPayload("riskdb-creds", "password=p")).toThrow(
      "Secret riskdb-creds is not valid JSON",
    )
  })

  it("rejects non-object payloads", () => {
    expect(() => parseSecretPayload("riskdb-creds", '"just a string"')).toThrow(
      "Secret riskdb-creds must be a JSON object",
    )
  })

  it("rejects nested values", () => {
    try {
      parseSecretPayload("riskdb-creds", '{"creds":{"password":"p"}}')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError)
      expect(err).toMatchObject({
        code: "config_validation_failed",
        context: { secretName: "riskdb-creds", field: "creds" },
      })
    }
  })
})
