import { run } from "./run"

run().catch((err: unknown) => {
  console.error("Failed to start server", err)
  process.exitCode = 1
})
