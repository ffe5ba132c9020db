#!/usr/bin/env node
import { main, processIO } from "../fieldshift"

// First Ctrl-C stops after the current batch; a second one exits immediately
const controller = new AbortController()
process.once("SIGINT", () => {
  process.stderr.write("\nStopping after the current batch (Ctrl-C again to exit now)\n")
  controller.abort()
  process.once("SIGINT", () => process.exit(130))
})

main(process.argv.slice(2), processIO(controller.signal)).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(err)
    process.exitCode = 1
  }
)
