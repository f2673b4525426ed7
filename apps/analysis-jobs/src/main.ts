import { run } from "./server"

run().catch((err: unknown) => {
  console.error("Failed to start server", err)
  process.exit(1)
})
