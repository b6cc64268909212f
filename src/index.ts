#!/usr/bin/env node
import { preview } from "@/src/commands/preview"
import { handleError } from "@/src/utils/handle-error"

import { getPackageInfo } from "./utils/get-package-info"

process.on("SIGINT", () => process.exit(0))
process.on("SIGTERM", () => process.exit(0))

async function main() {
  const packageInfo = await getPackageInfo()

  preview.version(packageInfo.version || "0.1.0", "-v, --version", "display the version number")

  await preview.parseAsync()
}

main().catch(handleError)
