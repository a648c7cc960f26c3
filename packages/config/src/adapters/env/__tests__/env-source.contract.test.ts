import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  setup: async () => {},
  make: () =>
    new EnvSource({
      prefix: "DOCKET_",
      env: { DOCKET_DB_HOST: "cache.internal", PATH: "/usr/bin" },
    }),
  expectedValue: { DB_HOST: "cache.internal" },
})
