import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  kind: "env",
  make: () =>
    new EnvSource({
      names: ["AWS_REGION"],
      prefix: "CONFIG__",
      env: { AWS_REGION: "eu-west-1", CONFIG__APP__DEBUG: "true", HOME: "/home/test" },
    }),
  expected: { AWS_REGION: "eu-west-1", CONFIG__APP__DEBUG: "true" },
})
