import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { describeSinkContract } from "../../../ports/__tests__/sink.contract"
import { FdSink } from "../fd-sink"

describeSinkContract({
  name: "FdSink",
  make: () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "fd-sink-"))
    const file = path.join(dir, "out.log")
    const fd = fs.openSync(file, "w")

    return {
      sink: new FdSink(fd),
      read: () => fs.readFileSync(file, "utf8"),
      cleanup: () => {
        fs.closeSync(fd)
        fs.rmSync(dir, { recursive: true, force: true })
      },
    }
  },
})
