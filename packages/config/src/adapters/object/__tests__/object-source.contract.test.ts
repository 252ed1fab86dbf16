import { describeValueSourceContract } from "../../../ports/__tests__/value-source.contract"
import { ObjectSource } from "../object-source"

describeValueSourceContract({
  name: "ObjectSource",
  make: async () => ({
    source: new ObjectSource({ TEST_KEY: "test_value", EMPTY_KEY: "" }),
  }),
  setup: async () => {},
})

describe("ObjectSource behavior", () => {
  it("defaults its name to object", () => {
    expect(new ObjectSource({}).name).toBe("object")
  })

  it("accepts a custom name", () => {
    expect(new ObjectSource({}, "object:overrides").name).toBe("object:overrides")
  })

  it("is not affected by later changes to the input record", () => {
    const values: Record<string, string | undefined> = { KEY: "before" }
    const source = new ObjectSource(values)

    values.KEY = "after"

    expect(source.read("KEY")).toBe("before")
  })
})
