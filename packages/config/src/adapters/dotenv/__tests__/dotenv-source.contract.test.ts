import fs from "node:fs/promises"
import path from "node:path"
import { describeValueSourceContract } from "../../../ports/__tests__/value-source.contract"
import { DotenvSource } from "../dotenv-source"

describeValueSourceContract({
  name: "DotenvSource",
  make: async (cwd) => ({
    source: new DotenvSource({ file: ".env", required: true, cwd }),
  }),
  setup: async (cwd) => {
    await fs.writeFile(path.join(cwd, ".env"), "TEST_KEY=test_value\nEMPTY_KEY=\n")
  },
})
