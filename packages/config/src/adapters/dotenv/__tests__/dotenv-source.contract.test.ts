import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { DotenvSource } from "../dotenv-source"

describeConfigSourceContract({
  name: "DotenvSource",
  make: async (dir, entries) => {
    const body = Object.entries(entries)
      .map(([key, value]) => `${key}=${value}\n`)
      .join("")
    await fs.writeFile(path.join(dir, "logging.env"), body)

    return { source: new DotenvSource({ file: "logging.env", required: true, cwd: dir }) }
  },
})
