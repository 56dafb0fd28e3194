import { EnvSource } from "../../../adapters/config/env-source"
import { ObjectSource } from "../../../adapters/config/object-source"
import { hostByteOrder } from "../../codec/archive-format"
import { loadStateStorageConfig, toArchiveFormat, toLoggerOptions } from "../load-config"

describe("loadStateStorageConfig", () => {
  it("applies defaults when no source provides a value", async () => {
    const config = await loadStateStorageConfig({ sources: [new ObjectSource({})] })

    expect(config.value).toEqual({
      BYTE_ORDER: hostByteOrder(),
      SIZE_WIDTH: 8,
      LOG_LEVEL: "info",
      LOG_PRETTY: false,
    })
    expect(config.sourcesUsed()).toEqual(["default"])
  })

  it("lets later sources override earlier ones and records provenance", async () => {
    const config = await loadStateStorageConfig({
      sources: [
        new EnvSource({
          env: {
            STATE_STORAGE_BYTE_ORDER: "be",
            STATE_STORAGE_SIZE_WIDTH: "8",
            STATE_STORAGE_TYPO: "1",
          },
        }),
        new ObjectSource({ SIZE_WIDTH: 4 }),
      ],
    })

    expect(config.value.BYTE_ORDER).toBe("be")
    expect(config.value.SIZE_WIDTH).toBe(4)
    expect(config.explain("BYTE_ORDER")).toBe("env:STATE_STORAGE_")
    expect(config.explain("SIZE_WIDTH")).toBe("object:overrides")
    expect(config.explain("LOG_LEVEL")).toBe("default")
    expect(config.sourcesUsed()).toEqual(["env:STATE_STORAGE_", "object:overrides", "default"])
    expect(config.unknownKeys()).toEqual(["TYPO"])
  })

  it("reads prefixed environment variables when no sources are given", async () => {
    vi.stubEnv("STATE_STORAGE_SIZE_WIDTH", "4")

    try {
      const config = await loadStateStorageConfig()

      expect(config.value.SIZE_WIDTH).toBe(4)
      expect(config.explain("SIZE_WIDTH")).toBe("env:STATE_STORAGE_")
    } finally {
      vi.unstubAllEnvs()
    }
  })

  it("ignores the environment when sources are given", async () => {
    vi.stubEnv("STATE_STORAGE_SIZE_WIDTH", "4")

    try {
      const config = await loadStateStorageConfig({ sources: [] })

      expect(config.value.SIZE_WIDTH).toBe(8)
      expect(config.explain("SIZE_WIDTH")).toBe("default")
    } finally {
      vi.unstubAllEnvs()
    }
  })

  it("parses boolean strings", async () => {
    const config = await loadStateStorageConfig({
      sources: [new EnvSource({ env: { STATE_STORAGE_LOG_PRETTY: "true" } })],
    })

    expect(config.value.LOG_PRETTY).toBe(true)
  })

  it("rejects unsupported size widths", async () => {
    await expect(
      loadStateStorageConfig({
        sources: [new EnvSource({ env: { STATE_STORAGE_SIZE_WIDTH: "16" } })],
      }),
    ).rejects.toThrow(/^Configuration validation failed:\n/)
  })

  it("rejects unknown byte orders", async () => {
    await expect(
      loadStateStorageConfig({ sources: [new ObjectSource({ BYTE_ORDER: "middle" })] }),
    ).rejects.toThrow("Configuration validation failed")
  })

  it("freezes the resulting values", async () => {
    const config = await loadStateStorageConfig({ sources: [new ObjectSource({})] })

    expect(Object.isFrozen(config.value)).toBe(true)
  })
})

describe("config mapping", () => {
  it("maps settings onto the archive format and logger options", async () => {
    const config = await loadStateStorageConfig({
      sources: [
        new ObjectSource({ BYTE_ORDER: "le", SIZE_WIDTH: "4", LOG_LEVEL: "debug" }),
      ],
    })

    expect(toArchiveFormat(config)).toEqual({ byteOrder: "le", sizeWidth: 4 })
    expect(toLoggerOptions(config)).toEqual({ level: "debug", prettify: false })
  })
})
