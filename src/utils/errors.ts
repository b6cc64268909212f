// --- Error taxonomy ---

/** A write to the output sink failed. Fatal to the render call. */
export class RenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "RenderError"
  }
}

/** A fluent table definition is inconsistent. */
export class TableValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "TableValidationError"
  }
}

export type FileLoadReason = "not-found" | "not-a-file" | "unreadable"

export class FileLoadError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: FileLoadReason,
    options?: { cause?: unknown }
  ) {
    super(FileLoadError.describe(path, reason), options)
    this.name = "FileLoadError"
  }

  private static describe(path: string, reason: FileLoadReason): string {
    switch (reason) {
      case "not-found":
        return `File not found: '${path}'`
      case "not-a-file":
        return `Path is not a file: '${path}'`
      case "unreadable":
        return `Failed to read file: '${path}'`
    }
  }
}

export function isBrokenPipe(error: unknown): boolean {
  if (!(error instanceof Error)) return false
  const cause = error instanceof RenderError ? error.cause : error
  return (
    typeof cause === "object" &&
    cause !== null &&
    "code" in cause &&
    cause.code === "EPIPE"
  )
}
