import { RenderError } from "@/src/utils/errors"
import { logger } from "@/src/utils/logger"

export function handleError(error: unknown): never {
  if (typeof error === "string") {
    logger.error(error)
    process.exit(1)
  }

  if (error instanceof RenderError) {
    logger.error(error.message)
    if (error.cause instanceof Error) {
      logger.error(error.cause.message)
    }
    process.exit(1)
  }

  if (error instanceof Error) {
    logger.error(error.message)
    process.exit(1)
  }

  logger.error("Something went wrong. Please try again.")
  process.exit(1)
}
