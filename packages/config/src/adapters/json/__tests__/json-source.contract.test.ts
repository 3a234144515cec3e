import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { JsonSource } from "../json-source"

describeConfigSourceContract({
  name: "JsonSource",
  make: async (cwd) => ({
    source: new JsonSource({ file: "appsettings.json", required: true, cwd }),
  }),
  setup: async (cwd) => {
    await fs.writeFile(
      path.join(cwd, "appsettings.json"),
      JSON.stringify({ "Retry:MaxAttempts": "5" }),
    )
  },
  expectedValue: () => ({ "Retry:MaxAttempts": "5" }),
})
