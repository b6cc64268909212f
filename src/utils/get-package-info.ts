import { existsSync, promises as fs } from "fs"
import path from "path"
import { fileURLToPath } from "url"
import { z } from "zod"

const packageInfoSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
  })
  .passthrough()

export type PackageInfo = z.infer<typeof packageInfoSchema>

/** Finds the nearest package.json above this module, in the sources or the bundle. */
export async function getPackageInfo(from: string = fileURLToPath(import.meta.url)): Promise<PackageInfo> {
  let dir = path.dirname(from)
  while (true) {
    const candidate = path.join(dir, "package.json")
    if (existsSync(candidate)) {
      return packageInfoSchema.parse(JSON.parse(await fs.readFile(candidate, "utf8")))
    }
    const parent = path.dirname(dir)
    if (parent === dir) return {}
    dir = parent
  }
}
