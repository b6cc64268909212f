// --- Debug mode: timestamped verbose logging ---

import chalk from "chalk"

let debugEnabled = false
let held: string[] | undefined

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled
}

/** Reads MP_DEBUG (1, true, yes). */
export function debugFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.MP_DEBUG?.trim().toLowerCase()
  return value === "1" || value === "true" || value === "yes"
}

/** Buffer debug lines while something else owns the terminal. */
export function holdDebugOutput(): void {
  held ??= []
}

export function releaseDebugOutput(): void {
  const lines = held
  held = undefined
  for (const line of lines ?? []) emit(line)
}

function timestamp(): string {
  return new Date().toISOString().slice(11, 23) // HH:mm:ss.SSS
}

function emit(line: string): void {
  if (held) {
    held.push(line)
    return
  }
  process.stderr.write(line + "\n")
}

export const debug = {
  log(...args: unknown[]): void {
    if (!debugEnabled) return
    emit([chalk.dim(`[${timestamp()}]`), ...args.map(String)].join(" "))
  },

  step(step: number, message: string): void {
    if (!debugEnabled) return
    emit(`${chalk.dim(`[${timestamp()}]`)} ${chalk.blue(`[step ${step}]`)} ${message}`)
  },

  context(label: string, detail: string): void {
    if (!debugEnabled) return
    emit(`${chalk.dim(`[${timestamp()}]`)} ${chalk.cyan(`[${label}]`)} ${detail}`)
  },
}
