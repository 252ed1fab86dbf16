import { ObjectSource } from "../../../adapters/object/object-source"
import type { ValueSource } from "../../../ports/value-source"
import { mockLogger } from "../../../tests/utils/mock-logger"
import { isJsonNumber } from "../../json/json-value"
import { DocumentLoader } from "../document-loader"

describe("DocumentLoader", () => {
  const load = (values: Record<string, string>, variable = "MASK_CONFIG") => {
    const logger = mockLogger()
    const source = new ObjectSource(values)
    const loader = new DocumentLoader({ source, variable, logger })

    return { logger, source, loader }
  }

  describe("chunked input", () => {
    it("concatenates chunks in index order", () => {
      const { loader } = load({
        MASK_CONFIG_1: '{"a":',
        MASK_CONFIG_2: '"x","b"',
        MASK_CONFIG_3: ":true}",
      })

      const doc = loader.materialize()

      expect(doc.get("a")).toBe("x")
      expect(doc.get("b")).toBe(true)
      expect(doc.origin.variables).toEqual(["MASK_CONFIG_1", "MASK_CONFIG_2", "MASK_CONFIG_3"])
    })

    it("prefers chunks over the unchunked variable", () => {
      const { loader } = load({
        MASK_CONFIG_1: '{"a":"chunked"}',
        MASK_CONFIG: '{"a":"whole"}',
      })

      expect(loader.materialize().get("a")).toBe("chunked")
    })

    it("stops at the first missing index", () => {
      const { loader } = load({
        MASK_CONFIG_1: '{"a":1}',
        MASK_CONFIG_3: "not json",
      })

      const value = loader.materialize().get("a")

      expect(isJsonNumber(value) && value.toBigInt()).toBe(1n)
    })

    it("falls back to the unchunked variable when chunks are empty", () => {
      const { loader } = load({
        MASK_CONFIG_1: "",
        MASK_CONFIG: '{"a":"whole"}',
      })

      const doc = loader.materialize()

      expect(doc.get("a")).toBe("whole")
      expect(doc.origin.variables).toEqual(["MASK_CONFIG"])
    })

    it("reads the configured variable name", () => {
      const { loader } = load({ APP_CONFIG_1: '{"k":"v"}' }, "APP_CONFIG")

      expect(loader.materialize().get("k")).toBe("v")
    })
  })

  it("uses an empty document when there is no input", () => {
    const { loader, logger } = load({})

    const doc = loader.materialize()

    expect(doc.size).toBe(0)
    expect(doc.origin.status).toBe("empty")
    expect(logger.error).not.toHaveBeenCalled()
  })

  describe("invalid input", () => {
    it("logs once and uses an empty document for malformed JSON", () => {
      const { loader, logger } = load({ MASK_CONFIG: '{"a":' })

      const doc = loader.materialize()
      loader.materialize()

      expect(doc.size).toBe(0)
      expect(doc.origin.status).toBe("invalid")
      expect(logger.error).toHaveBeenCalledTimes(1)
      expect(logger.error).toHaveBeenCalledWith(
        "Invalid JSON passed to MASK_CONFIG",
        expect.objectContaining({ chunks: 1, variables: ["MASK_CONFIG"] }),
      )
    })

    it("treats a non-object root as invalid", () => {
      const { loader, logger } = load({ MASK_CONFIG: "[1,2,3]" })

      expect(loader.materialize().origin.status).toBe("invalid")
      expect(logger.error).toHaveBeenCalledWith(
        "Invalid JSON passed to MASK_CONFIG",
        expect.objectContaining({ err: expect.objectContaining({ code: "invalid_root" }) }),
      )
    })

    it("treats an unrepresentable number as invalid", () => {
      const { loader, logger } = load({ MASK_CONFIG: '{"n":18446744073709551616}' })

      expect(loader.materialize().origin.status).toBe("invalid")
      expect(logger.error).toHaveBeenCalledWith(
        "Invalid JSON passed to MASK_CONFIG",
        expect.objectContaining({ err: expect.objectContaining({ code: "number_out_of_range" }) }),
      )
    })

    it("degrades when the value source throws", () => {
      const logger = mockLogger()
      const source: ValueSource = {
        name: "broken",
        read: () => {
          throw new Error("boom")
        },
        load: () => ({}),
      }

      const doc = new DocumentLoader({ source, variable: "MASK_CONFIG", logger }).materialize()

      expect(doc.origin.status).toBe("invalid")
      expect(logger.error).toHaveBeenCalledWith(
        "Invalid JSON passed to MASK_CONFIG",
        expect.objectContaining({ err: expect.objectContaining({ code: "source_unavailable" }) }),
      )
    })
  })

  describe("materialize", () => {
    it("loads on first use only", () => {
      const { loader, source } = load({ MASK_CONFIG: "{}" })
      const read = vi.spyOn(source, "read")

      expect(loader.isMaterialized).toBe(false)

      const first = loader.materialize()
      const second = loader.materialize()

      expect(loader.isMaterialized).toBe(true)
      expect(second).toBe(first)
      // MASK_CONFIG_1, then MASK_CONFIG
      expect(read).toHaveBeenCalledTimes(2)
    })

    it("scopes its logger to the variable", () => {
      const { logger } = load({}, "APP_CONFIG")

      expect(logger.child).toHaveBeenCalledWith({
        module: "document-loader",
        source: "object",
        variable: "APP_CONFIG",
      })
    })
  })
})
