import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../../adapters/env/env-source"
import { ObjectSource } from "../../../adapters/object/object-source"
import { captureError } from "../../../tests/utils/documents"
import { isResolverError } from "../../errors/resolver-error"
import { loadSettings } from "../load-settings"
import { SETTINGS_PREFIX, settingsSchema } from "../settings-schema"

describe("loadSettings", () => {
  it("applies defaults", () => {
    const settings = loadSettings({ schema: settingsSchema, sources: [new ObjectSource({})] })

    expect(settings.value).toEqual({
      VARIABLE: "MASK_CONFIG",
      LOG_LEVEL: "warn",
      LOG_PRETTY: false,
      LOGGER: "console",
    })
    expect(settings.explain("LOG_LEVEL")).toBe("default")
  })

  it("strips the prefix from env keys", () => {
    const settings = loadSettings({
      schema: settingsSchema,
      sources: [
        new EnvSource({
          env: { ENVDOC_LOG_LEVEL: "debug", ENVDOC_VARIABLE: "APP_CONFIG", LOG_LEVEL: "fatal" },
          prefix: SETTINGS_PREFIX,
        }),
      ],
    })

    expect(settings.get("LOG_LEVEL")).toBe("debug")
    expect(settings.get("VARIABLE")).toBe("APP_CONFIG")
    expect(settings.explain("VARIABLE")).toBe("env:ENVDOC_")
  })

  it("lets later sources override earlier ones", () => {
    const settings = loadSettings({
      schema: settingsSchema,
      sources: [
        new ObjectSource({ LOG_LEVEL: "info", LOGGER: "pino" }, "object:base"),
        new ObjectSource({ LOG_LEVEL: "error" }, "object:override"),
      ],
    })

    expect(settings.get("LOG_LEVEL")).toBe("error")
    expect(settings.explain("LOG_LEVEL")).toBe("object:override")
    expect(settings.get("LOGGER")).toBe("pino")
    expect(settings.explain("LOGGER")).toBe("object:base")
  })

  it("does not let undefined values override defined ones", () => {
    const settings = loadSettings({
      schema: settingsSchema,
      sources: [new ObjectSource({ LOGGER: "pino" }), new ObjectSource({ LOGGER: undefined })],
    })

    expect(settings.get("LOGGER")).toBe("pino")
  })

  it("parses boolean strings", () => {
    const on = loadSettings({ schema: settingsSchema, sources: [new ObjectSource({ LOG_PRETTY: "yes" })] })
    const off = loadSettings({ schema: settingsSchema, sources: [new ObjectSource({ LOG_PRETTY: "0" })] })

    expect(on.get("LOG_PRETTY")).toBe(true)
    expect(off.get("LOG_PRETTY")).toBe(false)
  })

  it("reports unknown keys", () => {
    const settings = loadSettings({
      schema: settingsSchema,
      sources: [new ObjectSource({ LOGLEVEL: "debug", LOGGER: "console" })],
    })

    expect(settings.unknownKeys()).toEqual(["LOGLEVEL"])
  })

  it("throws invalid_settings for an unknown log level", () => {
    const err = captureError(() =>
      loadSettings({ schema: settingsSchema, sources: [new ObjectSource({ LOG_LEVEL: "loud" })] }),
    )

    expect(isResolverError(err) && err.code).toBe("invalid_settings")
    expect(err instanceof Error && err.message).toContain("LOG_LEVEL")
  })

  it("throws invalid_settings for an empty variable name", () => {
    const err = captureError(() =>
      loadSettings({ schema: settingsSchema, sources: [new ObjectSource({ VARIABLE: "" })] }),
    )

    expect(isResolverError(err) && err.code).toBe("invalid_settings")
  })

  it("reads ENVDOC_* from process.env by default", () => {
    vi.stubEnv("ENVDOC_LOGGER", "pino")

    const settings = loadSettings({ schema: settingsSchema })

    expect(settings.get("LOGGER")).toBe("pino")
  })

  describe("with a dotenv file", () => {
    let cwd: string

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "settings-test-"))
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true })
    })

    it("lets env override dotenv", async () => {
      await fs.writeFile(path.join(cwd, ".env"), "LOG_LEVEL=info\nVARIABLE=FROM_FILE")

      const settings = loadSettings({
        schema: settingsSchema,
        sources: [
          new DotenvSource({ file: ".env", required: true, cwd }),
          new EnvSource({ env: { ENVDOC_LOG_LEVEL: "trace" }, prefix: SETTINGS_PREFIX }),
        ],
      })

      expect(settings.get("LOG_LEVEL")).toBe("trace")
      expect(settings.get("VARIABLE")).toBe("FROM_FILE")
      expect(settings.explain("VARIABLE")).toBe("dotenv:.env")
    })
  })
})
