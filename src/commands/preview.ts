import path from "path"
import { Command } from "commander"
import ora from "ora"
import { z } from "zod"

import type { FinderOptions } from "@/src/finder/finder"
import { debug, debugFromEnv, setDebug } from "@/src/observability/debug"
import { resolveRenderConfig } from "@/src/renderer/config"
import { stdoutOutput, type BufferedOutput } from "@/src/renderer/output"
import { MarkdownRenderer, type MarkdownRendererOptions } from "@/src/renderer/renderer"
import { App } from "@/src/tui/app"
import { TerminalSession } from "@/src/tui/terminal"
import { RenderError, isBrokenPipe } from "@/src/utils/errors"
import { handleError } from "@/src/utils/handle-error"
import { loadMarkdownFile } from "@/src/utils/load-file"
import { logger } from "@/src/utils/logger"

// --- `mp [file]`: print one file, or browse the directory ---

export const previewOptionsSchema = z.object({
  hidden: z.boolean().default(false),
  // commander turns `--no-ignore` into `ignore: false`
  ignore: z.boolean().default(true),
  ignoreParent: z.boolean().default(true),
  globalIgnoreFile: z.boolean().default(true),
  debug: z.boolean().default(false),
})

export type PreviewOptions = z.infer<typeof previewOptionsSchema>

export function toFinderOptions(options: PreviewOptions): FinderOptions {
  return {
    hidden: options.hidden,
    noIgnore: !options.ignore,
    noIgnoreParent: !options.ignoreParent,
    noGlobalIgnoreFile: !options.globalIgnoreFile,
  }
}

/** Renders one markdown file to `output` (stdout by default). */
export async function renderFile(
  filePath: string,
  options: Omit<MarkdownRendererOptions, "output"> & { output?: BufferedOutput } = {}
): Promise<void> {
  const content = await loadMarkdownFile(filePath)
  const config = resolveRenderConfig({ hyperlinks: process.stdout.isTTY === true, ...options.config })
  const output = options.output ?? stdoutOutput(config.bufferCapacity)
  const renderer = new MarkdownRenderer({ ...options, output, config })
  try {
    renderer.renderContent(content)
    await output.close()
  } catch (error) {
    if (error instanceof RenderError) {
      throw new RenderError(`Failed to render markdown file: ${filePath}`, { cause: error.cause })
    }
    throw error
  }
}

export const preview = new Command()
  .name("mp")
  .description("Markdown previewer in terminal")
  .argument("[file]", "markdown file to render to stdout")
  .option("--hidden", "include hidden files and directories", false)
  .option("--no-ignore", "do not respect .gitignore, .ignore or .mpignore files")
  .option("--no-ignore-parent", "do not read ignore files from parent directories")
  .option("--no-global-ignore-file", "do not read the global git ignore file")
  .option("--debug", "print debug logs to stderr", false)
  .action(async (file: string | undefined, opts) => {
    try {
      const options = previewOptionsSchema.parse(opts)
      setDebug(options.debug || debugFromEnv())
      debug.context("cli", JSON.stringify(options))

      if (file) {
        await renderFile(file)
        return
      }

      if (!process.stdin.isTTY || !process.stdout.isTTY) {
        logger.error("Interactive mode needs a terminal. Pass a file to render it to stdout.")
        process.exit(1)
      }

      const spinner = ora("Finding markdown files...").start()
      const app = await App.create({
        root: path.resolve(process.cwd()),
        finder: toFinderOptions(options),
        columns: process.stdout.columns,
        rows: process.stdout.rows,
      })
      spinner.stop()

      await app.run(new TerminalSession())
    } catch (error) {
      if (isBrokenPipe(error)) process.exit(0)
      handleError(error)
    }
  })
