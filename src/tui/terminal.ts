import { emitKeypressEvents, type Key as ReadlineKey } from "readline"

import { fromKeypress, type Key } from "@/src/tui/keys"
import type { TerminalOutput } from "@/src/tui/screen"
import { AsyncQueue } from "@/src/utils/async-queue"

export type TerminalEvent = { type: "key"; key: Key } | { type: "resize" }

const ENTER_ALT_SCREEN = "\x1b[?1049h"
const LEAVE_ALT_SCREEN = "\x1b[?1049l"
const HIDE_CURSOR = "\x1b[?25l"
const SHOW_CURSOR = "\x1b[?25h"

/**
 * Raw-mode terminal: key and resize events in, escape sequences out.
 * The terminal is restored on stop, exit, SIGINT and SIGTERM.
 */
export class TerminalSession implements TerminalOutput {
  readonly events = new AsyncQueue<TerminalEvent>()

  private started = false
  private stopped = false
  private restoreHandlersInstalled = false
  private handleExit = () => this.stop()
  private handleSigint = () => {
    this.stop()
    process.exit(130)
  }
  private handleSigterm = () => {
    this.stop()
    process.exit(143)
  }
  private handleKeypress = (input: string | undefined, info: ReadlineKey | undefined) => {
    this.events.push({ type: "key", key: fromKeypress(input, info) })
  }
  private handleResize = () => {
    this.events.push({ type: "resize" })
  }

  constructor(
    private input: NodeJS.ReadStream = process.stdin,
    private output: NodeJS.WriteStream = process.stdout
  ) {}

  get columns(): number {
    return this.output.columns || 80
  }

  get rows(): number {
    return this.output.rows || 24
  }

  write(data: string): void {
    this.output.write(data)
  }

  start(): void {
    if (this.started) return
    this.started = true

    emitKeypressEvents(this.input)
    if (this.input.isTTY) this.input.setRawMode(true)
    this.input.on("keypress", this.handleKeypress)
    this.input.resume()
    this.output.on("resize", this.handleResize)

    this.write(ENTER_ALT_SCREEN + HIDE_CURSOR)
    this.installRestoreHandlers()
  }

  stop(): void {
    if (!this.started || this.stopped) return
    this.stopped = true

    this.input.off("keypress", this.handleKeypress)
    this.output.off("resize", this.handleResize)
    if (this.input.isTTY) this.input.setRawMode(false)
    this.input.pause()

    this.write(SHOW_CURSOR + LEAVE_ALT_SCREEN)
    this.events.close()
    this.uninstallRestoreHandlers()
  }

  private installRestoreHandlers(): void {
    if (this.restoreHandlersInstalled) return
    this.restoreHandlersInstalled = true
    process.once("exit", this.handleExit)
    process.once("SIGINT", this.handleSigint)
    process.once("SIGTERM", this.handleSigterm)
  }

  private uninstallRestoreHandlers(): void {
    if (!this.restoreHandlersInstalled) return
    this.restoreHandlersInstalled = false
    process.off("exit", this.handleExit)
    process.off("SIGINT", this.handleSigint)
    process.off("SIGTERM", this.handleSigterm)
  }
}
