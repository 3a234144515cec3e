import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("maps double underscores to path separators", async () => {
    const source = new EnvSource({
      env: { Retry__MaxAttempts: "5", Feature__Tags__0: "a", PORT: "3000" },
    })

    expect(await source.load()).toEqual({
      "Retry:MaxAttempts": "5",
      "Feature:Tags:0": "a",
      PORT: "3000",
    })
  })

  it("filters and strips the prefix", async () => {
    const source = new EnvSource({
      env: { APP_Retry__Timeout: "00:00:30", APP_: "empty name", PATH: "/usr/bin" },
      prefix: "APP_",
    })

    expect(await source.load()).toEqual({ "Retry:Timeout": "00:00:30" })
  })

  it("accepts a custom separator", async () => {
    const source = new EnvSource({ env: { "Retry.Timeout": "00:00:30" }, separator: "." })

    expect(await source.load()).toEqual({ "Retry:Timeout": "00:00:30" })
  })

  it("uses injected env over process.env", async () => {
    const result = await new EnvSource({ env: { CUSTOM: "injected_value" } }).load()

    expect(result).toEqual({ CUSTOM: "injected_value" })
    expect(result).not.toHaveProperty("PATH")
  })

  it("defaults to process.env", async () => {
    vi.stubEnv("CONFBIND_ENV_SOURCE_TEST__Key", "from-process")

    try {
      const result = await new EnvSource({ prefix: "CONFBIND_ENV_SOURCE_TEST__" }).load()

      expect(result).toEqual({ Key: "from-process" })
    } finally {
      vi.unstubAllEnvs()
    }
  })
})
