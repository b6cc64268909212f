import type { Writable } from "stream"

import { RenderError } from "@/src/utils/errors"

// --- Output sinks ---

export interface OutputSink {
  write(text: string): void
  writeln(text: string): void
  newline(): void
  flush(): void
}

/** Where a buffered sink sends its chunks. `write` throws on a known failure. */
export interface OutputTarget {
  write(chunk: string): void
  close?(): Promise<void>
}

export const DEFAULT_BUFFER_CAPACITY = 8192

export class BufferedOutput implements OutputSink {
  private buffer = ""

  constructor(
    private target: OutputTarget,
    private capacity: number = DEFAULT_BUFFER_CAPACITY
  ) {}

  write(text: string): void {
    this.buffer += text
    if (this.buffer.length >= this.capacity) this.flush()
  }

  writeln(text: string): void {
    this.write(text + "\n")
  }

  newline(): void {
    this.write("\n")
  }

  flush(): void {
    if (!this.buffer) return
    const chunk = this.buffer
    this.buffer = ""
    try {
      this.target.write(chunk)
    } catch (error) {
      throw new RenderError("Failed to write output", { cause: error })
    }
  }

  /** Flushes and waits for the target to accept everything written. */
  async close(): Promise<void> {
    this.flush()
    try {
      await this.target.close?.()
    } catch (error) {
      throw new RenderError("Failed to write output", { cause: error })
    }
  }
}

/** Node stream target. Stream errors surface on the next write or on close. */
export class StreamTarget implements OutputTarget {
  private failure: Error | undefined
  private pending: Promise<void> = Promise.resolve()

  constructor(private stream: Writable) {
    stream.on("error", (error) => {
      this.failure ??= error
    })
  }

  write(chunk: string): void {
    if (this.failure) throw this.failure
    this.pending = new Promise((resolve) => {
      this.stream.write(chunk, (error) => {
        if (error) this.failure ??= error
        resolve()
      })
    })
  }

  async close(): Promise<void> {
    await this.pending
    if (this.failure) throw this.failure
  }
}

export class StringTarget implements OutputTarget {
  private chunks: string[] = []

  write(chunk: string): void {
    this.chunks.push(chunk)
  }

  get writes(): number {
    return this.chunks.length
  }

  toString(): string {
    return this.chunks.join("")
  }
}

/** Collects output as a list of lines for the TUI preview. */
export class LineBuffer implements OutputSink {
  private current = ""
  private completed: string[] = []

  write(text: string): void {
    const parts = text.split("\n")
    this.current += parts[0]
    for (const part of parts.slice(1)) {
      this.completed.push(this.current)
      this.current = part
    }
  }

  writeln(text: string): void {
    this.write(text + "\n")
  }

  newline(): void {
    this.write("\n")
  }

  flush(): void {
    // Nothing is held back; lines are complete as soon as they are written.
  }

  /** Completed lines plus any unterminated trailing line. */
  lines(): string[] {
    return this.current ? [...this.completed, this.current] : [...this.completed]
  }
}

export function stdoutOutput(capacity?: number): BufferedOutput {
  return new BufferedOutput(new StreamTarget(process.stdout), capacity)
}
