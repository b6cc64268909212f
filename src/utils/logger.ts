import chalk from "chalk"

export const logger = {
  error(...args: unknown[]) {
    console.error(chalk.red(...args))
  },
}
