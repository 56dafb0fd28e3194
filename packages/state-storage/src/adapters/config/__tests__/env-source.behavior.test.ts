import { EnvSource } from "../env-source"
import { ObjectSource } from "../object-source"

describe("EnvSource", () => {
  it("reads prefixed variables with the prefix stripped", async () => {
    const source = new EnvSource({
      env: { STATE_STORAGE_BYTE_ORDER: "be", STATE_STORAGE_SIZE_WIDTH: "4", HOME: "/root" },
    })

    await expect(source.load()).resolves.toEqual({ BYTE_ORDER: "be", SIZE_WIDTH: "4" })
  })

  it("names itself after its prefix", () => {
    expect(new EnvSource({ env: {} }).name).toBe("env:STATE_STORAGE_")
    expect(new EnvSource({ prefix: "ARCHIVE_", env: {} }).name).toBe("env:ARCHIVE_")
  })

  it("honours a custom prefix", async () => {
    const source = new EnvSource({
      prefix: "ARCHIVE_",
      env: { ARCHIVE_LOG_LEVEL: "debug", STATE_STORAGE_LOG_LEVEL: "warn" },
    })

    await expect(source.load()).resolves.toEqual({ LOG_LEVEL: "debug" })
  })

  it("reads process.env by default", async () => {
    vi.stubEnv("STATE_STORAGE_LOG_PRETTY", "true")

    try {
      await expect(new EnvSource().load()).resolves.toMatchObject({ LOG_PRETTY: "true" })
    } finally {
      vi.unstubAllEnvs()
    }
  })
})

describe("ObjectSource", () => {
  it("returns a copy of its values", async () => {
    const values = { SIZE_WIDTH: 4 }
    const source = new ObjectSource(values)

    const loaded = await source.load()
    loaded.SIZE_WIDTH = 8

    await expect(source.load()).resolves.toEqual({ SIZE_WIDTH: 4 })
    expect(source.name).toBe("object:overrides")
  })
})
